import { AccountId, CallContext } from './types.js';
import { AccessControl } from '../access/accessControl.js';
import { AirlineRegistry } from '../airline/airlineRegistry.js';
import { FlightRegistry, Flight, flightKey } from '../flight/flightRegistry.js';
import { FlightStatusCode, isDelayStatus } from '../flight/flightStatus.js';
import { InsurancePool, PayoutOutcome } from '../insurance/insurancePool.js';
import { FundLedger, LedgerSnapshot } from '../ledger/fundLedger.js';
import { ValueTransfer } from '../ledger/transfers.js';
import { NotificationOutbox } from '../events/notifications.js';
import { FlightQuery, OracleConsensus, StatusResolutionSink } from '../oracle/oracleConsensus.js';
import { HashIndexSource, IndexSource } from '../oracle/indexSource.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('FlightSuretyCore');

export interface FlightSuretyCoreOptions {
    readonly owner: AccountId;
    readonly firstAirline: AccountId;
    readonly transfers: ValueTransfer;
    readonly indexSource?: IndexSource;
    readonly outbox?: NotificationOutbox;
}

/**
 * Composition root. Owns one instance of every component and routes the
 * cross-component effects of a status change (flight write, then payout).
 *
 * Membership escrow is one pool shared by every airline. Payouts draw on
 * premiums first and then on that escrow, so a delay an airline reports
 * for its own flight can be paid from fees other airlines put in.
 */
export class FlightSuretyCore implements StatusResolutionSink {
    public readonly access: AccessControl;
    public readonly airlines: AirlineRegistry;
    public readonly flights: FlightRegistry;
    public readonly insurance: InsurancePool;
    public readonly oracles: OracleConsensus;
    public readonly outbox: NotificationOutbox;
    private readonly ledger: FundLedger;

    constructor(options: FlightSuretyCoreOptions) {
        this.outbox = options.outbox ?? new NotificationOutbox();
        this.ledger = new FundLedger(options.transfers);
        this.access = new AccessControl(options.owner);
        this.airlines = new AirlineRegistry(this.access, this.ledger, this.outbox, options.firstAirline);
        this.flights = new FlightRegistry(this.access, this.airlines, this.outbox);
        this.insurance = new InsurancePool(this.access, this.airlines, this.flights, this.ledger, this.outbox);
        this.oracles = new OracleConsensus(
            this.access,
            this.flights,
            this.ledger,
            options.indexSource ?? new HashIndexSource(),
            this.outbox,
            this
        );

        logger.info({ owner: options.owner, firstAirline: options.firstAirline }, 'Flight surety core initialized');
    }

    /**
     * Direct status update by the owning airline; a delay triggers payout,
     * which may draw on the shared membership escrow.
     */
    public setFlightStatus(ctx: CallContext, flight: string, timestamp: number, status: number): Flight {
        const updated = this.flights.setStatus(ctx, flightKey(ctx.sender, flight, timestamp), status);
        this.settle(ctx, updated);
        return updated;
    }

    public onStatusResolved(ctx: CallContext, query: FlightQuery, status: FlightStatusCode): void {
        const updated = this.flights.applyResolvedStatus(ctx, flightKey(query.airline, query.flight, query.timestamp), status);
        this.settle(ctx, updated);
    }

    public ledgerSnapshot(): LedgerSnapshot {
        return this.ledger.snapshot();
    }

    public isLedgerConserved(): boolean {
        return this.ledger.isConserved();
    }

    private settle(ctx: CallContext, flight: Flight): PayoutOutcome[] {
        if (!isDelayStatus(flight.status)) return [];

        const outcomes = this.insurance.resolveDelay(ctx, flight.key);
        const underfunded = outcomes.filter(o => o.status === 'UNDERFUNDED').length;
        if (underfunded > 0) {
            logger.warn({ flightKey: flight.key, underfunded }, 'Delay settled with underfunded claims');
        }
        this.ledger.assertConservation();
        return outcomes;
    }
}
