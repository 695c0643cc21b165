import { AccountId, Amount, CallContext } from './types.js';
import { FlightSuretyCore } from './flightSuretyCore.js';
import { AdmissionResult } from '../airline/airlineRegistry.js';
import { Flight, flightKey } from '../flight/flightRegistry.js';
import { FlightStatusCode } from '../flight/flightStatus.js';
import { Claim } from '../insurance/insurancePool.js';
import { LedgerSnapshot } from '../ledger/fundLedger.js';
import { OracleIndexes, ResponseReceipt, StatusRequestTicket } from '../oracle/oracleConsensus.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { FlightSuretyError } from '../errors/FlightSuretyError.js';
import { createValidator } from '../validation/zod-middleware.js';
import {
    AccountIdSchema,
    AmountSchema,
    FlightCodeSchema,
    FlightRefSchema,
    InsurancePurchaseInput,
    InsurancePurchaseSchema,
    OracleResponseInput,
    OracleResponseSchema,
    StatusCodeSchema,
    TimestampSchema,
} from '../validation/schema.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('SuretyGateway');

const validateAccount = createValidator(AccountIdSchema);
const validateAmount = createValidator(AmountSchema);
const validateFlightCode = createValidator(FlightCodeSchema);
const validateTimestamp = createValidator(TimestampSchema);
const validateStatus = createValidator(StatusCodeSchema);
const validateFlightRef = createValidator(FlightRefSchema);
const validatePurchase = createValidator(InsurancePurchaseSchema);
const validateResponse = createValidator(OracleResponseSchema);

/**
 * Participant-facing surface. Validates input, then forwards to the core
 * under its own invoker identity. Domain rejections pass through unchanged;
 * anything unexpected is sanitized.
 */
export class SuretyGateway {
    constructor(
        private readonly core: FlightSuretyCore,
        public readonly invokerId: AccountId
    ) { }

    /**
     * Creates a gateway and has the owner authorize it with access control.
     */
    static attach(core: FlightSuretyCore, invokerId: AccountId, owner: AccountId): SuretyGateway {
        const gateway = new SuretyGateway(core, invokerId);
        gateway.authorize(owner, invokerId);
        return gateway;
    }

    // --- Admin ---

    public setOperational(sender: AccountId, mode: boolean): void {
        const caller = validateAccount(sender, 'Gateway:setOperational');
        this.run('Gateway:setOperational', () => this.core.access.setOperational(caller, mode));
    }

    public authorize(sender: AccountId, invoker: AccountId): void {
        const caller = validateAccount(sender, 'Gateway:authorize');
        const target = validateAccount(invoker, 'Gateway:authorize');
        this.run('Gateway:authorize', () => this.core.access.authorize(caller, target));
    }

    public revoke(sender: AccountId, invoker: AccountId): void {
        const caller = validateAccount(sender, 'Gateway:revoke');
        const target = validateAccount(invoker, 'Gateway:revoke');
        this.run('Gateway:revoke', () => this.core.access.revoke(caller, target));
    }

    // --- Airline ---

    public registerAirline(sender: AccountId, target: AccountId): AdmissionResult {
        const ctx = this.context(sender, 'Gateway:registerAirline');
        const airline = validateAccount(target, 'Gateway:registerAirline');
        return this.run('Gateway:registerAirline', () => this.core.airlines.registerAirline(ctx, airline));
    }

    public payMembershipFund(sender: AccountId, value: Amount | string): void {
        const ctx = this.context(sender, 'Gateway:payMembershipFund');
        const amount = validateAmount(value, 'Gateway:payMembershipFund');
        this.run('Gateway:payMembershipFund', () => this.core.airlines.payMembershipFund(ctx, amount));
    }

    public registerFlight(sender: AccountId, flight: string, timestamp: number): Flight {
        const ctx = this.context(sender, 'Gateway:registerFlight');
        const code = validateFlightCode(flight, 'Gateway:registerFlight');
        const ts = validateTimestamp(timestamp, 'Gateway:registerFlight');
        return this.run('Gateway:registerFlight', () => this.core.flights.registerFlight(ctx, code, ts));
    }

    public setFlightStatus(sender: AccountId, flight: string, timestamp: number, status: number): Flight {
        const ctx = this.context(sender, 'Gateway:setFlightStatus');
        const code = validateFlightCode(flight, 'Gateway:setFlightStatus');
        const ts = validateTimestamp(timestamp, 'Gateway:setFlightStatus');
        const statusCode = validateStatus(status, 'Gateway:setFlightStatus');
        return this.run('Gateway:setFlightStatus', () => this.core.setFlightStatus(ctx, code, ts, statusCode));
    }

    // --- Passenger ---

    public buyInsurance(sender: AccountId, input: InsurancePurchaseInput): Claim {
        const ctx = this.context(sender, 'Gateway:buyInsurance');
        const purchase = validatePurchase(input, 'Gateway:buyInsurance');
        return this.run('Gateway:buyInsurance', () => this.core.insurance.buyInsurance(ctx, {
            passenger: purchase.passenger,
            airline: purchase.airline,
            flight: purchase.flight,
            timestamp: purchase.timestamp,
            declaredAmount: purchase.amount,
            paidAmount: purchase.value
        }));
    }

    public checkInsuranceAmount(passenger: AccountId, airline: AccountId, flight: string, timestamp: number): Amount {
        const who = validateAccount(passenger, 'Gateway:checkInsuranceAmount');
        const ref = validateFlightRef({ airline, flight, timestamp }, 'Gateway:checkInsuranceAmount');
        return this.core.insurance.checkInsuranceAmount(who, ref.airline, ref.flight, ref.timestamp);
    }

    public withdraw(sender: AccountId, value: Amount | string): void {
        const ctx = this.context(sender, 'Gateway:withdraw');
        const amount = validateAmount(value, 'Gateway:withdraw');
        this.run('Gateway:withdraw', () => this.core.insurance.withdraw(ctx, amount));
    }

    // --- Oracle ---

    public registerOracle(sender: AccountId, value: Amount | string): OracleIndexes {
        const ctx = this.context(sender, 'Gateway:registerOracle');
        const amount = validateAmount(value, 'Gateway:registerOracle');
        return this.run('Gateway:registerOracle', () => this.core.oracles.registerOracle(ctx, amount));
    }

    public getMyIndexes(sender: AccountId): OracleIndexes {
        const oracle = validateAccount(sender, 'Gateway:getMyIndexes');
        return this.run('Gateway:getMyIndexes', () => this.core.oracles.getMyIndexes(oracle));
    }

    public requestFlightStatus(sender: AccountId, airline: AccountId, flight: string, timestamp: number): StatusRequestTicket {
        const ctx = this.context(sender, 'Gateway:requestFlightStatus');
        const ref = validateFlightRef({ airline, flight, timestamp }, 'Gateway:requestFlightStatus');
        return this.run('Gateway:requestFlightStatus', () => this.core.oracles.requestStatus(ctx, ref));
    }

    public submitResponse(sender: AccountId, input: OracleResponseInput): ResponseReceipt {
        const ctx = this.context(sender, 'Gateway:submitResponse');
        const { index, status, ...ref } = validateResponse(input, 'Gateway:submitResponse');
        return this.run('Gateway:submitResponse', () => this.core.oracles.submitResponse(ctx, index, ref, status));
    }

    // --- Queries ---

    public isOperational(): boolean {
        return this.core.access.isOperational();
    }

    public getRegisteredAirlineCount(): number {
        return this.core.airlines.getRegisteredAirlineCount();
    }

    public checkAirlineIsRegistered(airline: AccountId): boolean {
        return this.core.airlines.isRegistered(airline);
    }

    public checkAirlineIsPaidFund(airline: AccountId): boolean {
        return this.core.airlines.isFunded(airline);
    }

    public checkAirlineIsPending(airline: AccountId): boolean {
        return this.core.airlines.isPending(airline);
    }

    public getFlightStatus(airline: AccountId, flight: string, timestamp: number): FlightStatusCode {
        const ref = validateFlightRef({ airline, flight, timestamp }, 'Gateway:getFlightStatus');
        return this.run('Gateway:getFlightStatus', () =>
            this.core.flights.getFlightStatus(flightKey(ref.airline, ref.flight, ref.timestamp)));
    }

    public getPassengerBalance(passenger: AccountId): Amount {
        return this.core.insurance.getPassengerBalance(passenger);
    }

    public getLedgerSnapshot(): LedgerSnapshot {
        return this.core.ledgerSnapshot();
    }

    private context(sender: AccountId, label: string): CallContext {
        return { invoker: this.invokerId, sender: validateAccount(sender, label) };
    }

    private run<T>(label: string, fn: () => T): T {
        try {
            return fn();
        } catch (err: unknown) {
            const sanitized = ErrorSanitizer.sanitize(err, label);
            logger.warn({ label, code: sanitized instanceof FlightSuretyError ? sanitized.code : 'INTERNAL' }, 'Call rejected');
            throw sanitized;
        }
    }
}
