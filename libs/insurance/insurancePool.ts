import { AccountId, Amount, CallContext } from '../surety/types.js';
import { AccessControl } from '../access/accessControl.js';
import { AirlineDirectory } from '../airline/airlineRegistry.js';
import { FlightDirectory, flightKey } from '../flight/flightRegistry.js';
import { PremiumBook } from '../ledger/fundLedger.js';
import { NotificationSink } from '../events/notifications.js';
import { FlightSuretyError, isFlightSuretyError } from '../errors/FlightSuretyError.js';
import { compositeKey } from '../keys/compositeKey.js';
import { getComponentLogger } from '../logging/logger.js';
import { MAX_INSURANCE_AMOUNT, PAYOUT_DENOMINATOR, PAYOUT_NUMERATOR } from '../surety/constants.js';

const logger = getComponentLogger('InsurancePool');

export interface Claim {
    readonly key: string;
    readonly passenger: AccountId;
    readonly flightKey: string;
    readonly premiumPaid: Amount;
    readonly payoutIssued: boolean;
}

/**
 * The payer is the calling participant; any excess over the declared amount
 * is refunded to it, not to the passenger.
 */
export interface InsurancePurchase {
    readonly passenger: AccountId;
    readonly airline: AccountId;
    readonly flight: string;
    readonly timestamp: number;
    readonly declaredAmount: Amount;
    readonly paidAmount: Amount;
}

export type PayoutOutcome =
    | { readonly claimKey: string; readonly passenger: AccountId; readonly status: 'CREDITED'; readonly amount: Amount }
    | { readonly claimKey: string; readonly passenger: AccountId; readonly status: 'ALREADY_PAID' }
    | { readonly claimKey: string; readonly passenger: AccountId; readonly status: 'UNDERFUNDED'; readonly amount: Amount };

export function claimKey(passenger: AccountId, flight: string): string {
    return compositeKey('claim', passenger, flight);
}

/**
 * premium * 3 / 2, rounded down.
 */
export function payoutFor(premium: Amount): Amount {
    return (premium * PAYOUT_NUMERATOR) / PAYOUT_DENOMINATOR;
}

/**
 * Premium intake, delay payout and credit withdrawal.
 */
export class InsurancePool {
    private readonly claims = new Map<string, Claim>();
    /** flightKey -> claim keys in purchase order */
    private readonly claimsByFlight = new Map<string, string[]>();

    constructor(
        private readonly access: AccessControl,
        private readonly airlines: AirlineDirectory,
        private readonly flights: FlightDirectory,
        private readonly book: PremiumBook,
        private readonly notifications: NotificationSink
    ) { }

    public buyInsurance(ctx: CallContext, purchase: InsurancePurchase): Claim {
        this.access.requireCallable(ctx.invoker);
        const { passenger, declaredAmount, paidAmount } = purchase;

        if (this.airlines.isRegistered(passenger)) {
            throw new FlightSuretyError('InvalidBuyer', 'Registered airlines cannot buy insurance', { passenger });
        }

        const key = flightKey(purchase.airline, purchase.flight, purchase.timestamp);
        if (!this.flights.getFlight(key)) {
            throw new FlightSuretyError('UnknownFlight', 'Flight is not registered', { flightKey: key });
        }
        if (declaredAmount <= 0n || declaredAmount > MAX_INSURANCE_AMOUNT) {
            throw new FlightSuretyError('InvalidAmount', 'Insurance amount out of range', {
                declared: declaredAmount.toString(),
                max: MAX_INSURANCE_AMOUNT.toString()
            });
        }
        if (paidAmount < declaredAmount) {
            throw new FlightSuretyError('InsufficientPayment', 'Payment below declared insurance amount', {
                declared: declaredAmount.toString(),
                paid: paidAmount.toString()
            });
        }

        const ck = claimKey(passenger, key);
        if (this.claims.has(ck)) {
            throw new FlightSuretyError('DuplicateClaim', 'Insurance already purchased for this flight', { claimKey: ck });
        }

        const claim: Claim = Object.freeze({
            key: ck,
            passenger,
            flightKey: key,
            premiumPaid: declaredAmount,
            payoutIssued: false
        });
        this.claims.set(ck, claim);
        this.claimsByFlight.set(key, [...(this.claimsByFlight.get(key) ?? []), ck]);

        // Claim is recorded before any refund leaves the system.
        this.book.receivePremium(ctx.sender, paidAmount, declaredAmount);

        logger.info({ claimKey: ck, passenger, flightKey: key, premium: declaredAmount.toString() }, 'Insurance purchased');
        this.notifications.publish({
            type: 'InsurancePurchased',
            claimKey: ck,
            passenger,
            flightKey: key,
            premium: declaredAmount.toString()
        });
        return claim;
    }

    /**
     * Credits every unpaid claim on a delayed flight.
     * Claims the pool cannot cover are left unpaid and reported as UNDERFUNDED;
     * the remaining claims still proceed. Safe to call repeatedly.
     */
    public resolveDelay(ctx: CallContext, flight: string): PayoutOutcome[] {
        this.access.requireCallable(ctx.invoker);

        const outcomes: PayoutOutcome[] = [];
        for (const ck of this.claimsByFlight.get(flight) ?? []) {
            const claim = this.claims.get(ck);
            if (!claim) continue;

            if (claim.payoutIssued) {
                outcomes.push({ claimKey: ck, passenger: claim.passenger, status: 'ALREADY_PAID' });
                continue;
            }

            const amount = payoutFor(claim.premiumPaid);
            try {
                this.book.creditFromPool(claim.passenger, amount);
            } catch (err: unknown) {
                if (!isFlightSuretyError(err, 'PoolUnderfunded')) throw err;
                logger.warn({ claimKey: ck, amount: amount.toString(), capacity: this.book.payoutCapacity().toString() }, 'Payout halted: pool underfunded');
                outcomes.push({ claimKey: ck, passenger: claim.passenger, status: 'UNDERFUNDED', amount });
                continue;
            }

            this.claims.set(ck, Object.freeze({ ...claim, payoutIssued: true }));
            outcomes.push({ claimKey: ck, passenger: claim.passenger, status: 'CREDITED', amount });

            logger.info({ claimKey: ck, passenger: claim.passenger, amount: amount.toString() }, 'Insurance payout credited');
            this.notifications.publish({
                type: 'InsurancePaidOut',
                claimKey: ck,
                passenger: claim.passenger,
                flightKey: flight,
                amount: amount.toString()
            });
        }
        return outcomes;
    }

    public withdraw(ctx: CallContext, amount: Amount): void {
        this.access.requireCallable(ctx.invoker);
        this.book.withdrawCredit(ctx.sender, amount);
        this.notifications.publish({ type: 'CreditWithdrawn', account: ctx.sender, amount: amount.toString() });
    }

    /**
     * Premium recorded for a passenger on a flight; 0 when none was bought.
     */
    public checkInsuranceAmount(passenger: AccountId, airline: AccountId, flight: string, timestamp: number): Amount {
        return this.claims.get(claimKey(passenger, flightKey(airline, flight, timestamp)))?.premiumPaid ?? 0n;
    }

    public getClaim(key: string): Claim | undefined {
        return this.claims.get(key);
    }

    public getPassengerBalance(passenger: AccountId): Amount {
        return this.book.creditOf(passenger);
    }
}
