import { AccountId, Amount, CallContext } from '../surety/types.js';
import { AccessControl } from '../access/accessControl.js';
import { FlightDirectory, flightKey } from '../flight/flightRegistry.js';
import { FlightStatusCode, isFlightStatusCode, statusName } from '../flight/flightStatus.js';
import { OracleFeeBox } from '../ledger/fundLedger.js';
import { NotificationSink } from '../events/notifications.js';
import { FlightSuretyError } from '../errors/FlightSuretyError.js';
import { compositeKey } from '../keys/compositeKey.js';
import { getComponentLogger } from '../logging/logger.js';
import { INDEX_RANGE, MIN_RESPONSES, REGISTRATION_FEE } from '../surety/constants.js';
import { IndexSource } from './indexSource.js';

const logger = getComponentLogger('OracleConsensus');

/** Draws allowed per index before the source is treated as unable to supply three distinct values. */
const MAX_DRAW_ATTEMPTS = 100;

export type OracleIndexes = readonly [number, number, number];

export interface StatusRequestTicket {
    readonly key: string;
    readonly index: number;
    readonly reopened: boolean;
}

export interface ResponseRequestView {
    readonly key: string;
    readonly index: number;
    readonly requester: AccountId;
    readonly airline: AccountId;
    readonly flight: string;
    readonly timestamp: number;
    readonly isOpen: boolean;
    readonly resolvedStatus?: FlightStatusCode;
    readonly reports: ReadonlyMap<FlightStatusCode, readonly AccountId[]>;
}

export interface ResponseReceipt {
    /** false when this oracle had already reported the same status */
    readonly counted: boolean;
    readonly reports: number;
    readonly resolvedStatus?: FlightStatusCode;
}

export interface FlightQuery {
    readonly airline: AccountId;
    readonly flight: string;
    readonly timestamp: number;
}

/**
 * Receives the quorum result. Wired by the core to the flight registry and
 * the payout path.
 */
export interface StatusResolutionSink {
    onStatusResolved(ctx: CallContext, query: FlightQuery, status: FlightStatusCode): void;
}

interface ResponseRequest {
    readonly key: string;
    readonly index: number;
    readonly requester: AccountId;
    readonly query: FlightQuery;
    isOpen: boolean;
    resolvedStatus?: FlightStatusCode;
    /** status -> distinct reporters, in arrival order */
    readonly reports: Map<FlightStatusCode, Set<AccountId>>;
}

export function requestKey(index: number, query: FlightQuery): string {
    return compositeKey('oracle-request', index, query.airline, query.flight, query.timestamp);
}

/**
 * Oracle registration, index-sharded status requests and quorum resolution.
 *
 * Each oracle holds three distinct indexes; a request carries one index and
 * only oracles holding it may answer. The first status whose distinct
 * reporter count reaches MIN_RESPONSES closes the request.
 * Requests have no timeout: an unanswered request stays open.
 */
export class OracleConsensus {
    private readonly oracles = new Map<AccountId, OracleIndexes>();
    private readonly requests = new Map<string, ResponseRequest>();

    constructor(
        private readonly access: AccessControl,
        private readonly flights: FlightDirectory,
        private readonly fees: OracleFeeBox,
        private readonly indexSource: IndexSource,
        private readonly notifications: NotificationSink,
        private readonly resolution: StatusResolutionSink
    ) { }

    public registerOracle(ctx: CallContext, payment: Amount): OracleIndexes {
        this.access.requireCallable(ctx.invoker);

        if (this.oracles.has(ctx.sender)) {
            throw new FlightSuretyError('AlreadyRegistered', `Oracle ${ctx.sender} is already registered`, { oracle: ctx.sender });
        }
        if (payment < REGISTRATION_FEE) {
            throw new FlightSuretyError('InsufficientPayment', 'Oracle registration fee not met', {
                required: REGISTRATION_FEE.toString(),
                paid: payment.toString()
            });
        }

        const indexes = this.generateIndexes(ctx.sender);
        this.oracles.set(ctx.sender, indexes);
        this.fees.receiveOracleFee(ctx.sender, payment, REGISTRATION_FEE);

        logger.info({ oracle: ctx.sender, indexes }, 'Oracle registered');
        this.notifications.publish({ type: 'OracleRegistered', oracle: ctx.sender, indexes });
        return indexes;
    }

    public getMyIndexes(oracle: AccountId): OracleIndexes {
        const indexes = this.oracles.get(oracle);
        if (!indexes) {
            throw new FlightSuretyError('UnknownOracle', `Oracle ${oracle} is not registered`, { oracle });
        }
        return indexes;
    }

    public isOracleRegistered(oracle: AccountId): boolean {
        return this.oracles.has(oracle);
    }

    /**
     * Opens a request for oracles holding a freshly drawn index. An open
     * request at the same key is returned as is; a closed one is reopened
     * with empty report sets.
     */
    public requestStatus(ctx: CallContext, query: FlightQuery): StatusRequestTicket {
        this.access.requireCallable(ctx.invoker);

        if (!this.flights.getFlight(flightKey(query.airline, query.flight, query.timestamp))) {
            throw new FlightSuretyError('UnknownFlight', 'Flight is not registered', { flight: query.flight });
        }

        const index = this.drawIndex(ctx.sender);
        const key = requestKey(index, query);
        const existing = this.requests.get(key);

        if (existing?.isOpen) {
            logger.info({ requestKey: key, index }, 'Status request already open');
            return { key, index, reopened: false };
        }

        this.requests.set(key, {
            key,
            index,
            requester: ctx.sender,
            query: { ...query },
            isOpen: true,
            reports: new Map()
        });

        logger.info({ requestKey: key, index, requester: ctx.sender, flight: query.flight }, 'Status request opened');
        this.notifications.publish({ type: 'StatusRequestOpened', index, ...query });
        return { key, index, reopened: existing !== undefined };
    }

    public submitResponse(ctx: CallContext, index: number, query: FlightQuery, status: number): ResponseReceipt {
        this.access.requireCallable(ctx.invoker);

        const indexes = this.getMyIndexes(ctx.sender);
        if (!indexes.includes(index)) {
            throw new FlightSuretyError('IndexMismatch', 'Index does not match oracle assignment', { oracle: ctx.sender });
        }
        if (!isFlightStatusCode(status)) {
            throw new FlightSuretyError('InvalidStatus', `Unknown flight status code ${status}`);
        }

        const request = this.requests.get(requestKey(index, query));
        if (!request?.isOpen) {
            throw new FlightSuretyError('NoMatchingRequest', 'No open request matches this response', { flight: query.flight });
        }

        const reporters = request.reports.get(status) ?? new Set<AccountId>();
        if (reporters.has(ctx.sender)) {
            logger.info({ oracle: ctx.sender, requestKey: request.key, status: statusName(status) }, 'Duplicate oracle report ignored');
            return { counted: false, reports: reporters.size };
        }

        reporters.add(ctx.sender);
        request.reports.set(status, reporters);
        this.notifications.publish({ type: 'OracleReportReceived', oracle: ctx.sender, ...request.query, status });

        if (reporters.size < MIN_RESPONSES) {
            return { counted: true, reports: reporters.size };
        }

        request.isOpen = false;
        request.resolvedStatus = status;
        this.resolution.onStatusResolved(ctx, request.query, status);

        logger.info({ requestKey: request.key, status: statusName(status), reports: reporters.size }, 'Flight status resolved by quorum');
        this.notifications.publish({ type: 'FlightStatusResolved', ...request.query, status });
        return { counted: true, reports: reporters.size, resolvedStatus: status };
    }

    public getRequest(index: number, query: FlightQuery): ResponseRequestView | undefined {
        const request = this.requests.get(requestKey(index, query));
        if (!request) return undefined;

        const reports = new Map<FlightStatusCode, readonly AccountId[]>();
        for (const [status, reporters] of request.reports) {
            reports.set(status, [...reporters]);
        }
        return Object.freeze({
            key: request.key,
            index: request.index,
            requester: request.requester,
            ...request.query,
            isOpen: request.isOpen,
            ...(request.resolvedStatus !== undefined ? { resolvedStatus: request.resolvedStatus } : {}),
            reports
        });
    }

    /**
     * Three distinct indexes; each draw is retried until it differs from the
     * ones already taken.
     */
    private generateIndexes(account: AccountId): OracleIndexes {
        const first = this.drawIndex(account);
        const second = this.drawDistinct(account, [first]);
        const third = this.drawDistinct(account, [first, second]);
        return Object.freeze([first, second, third] as const);
    }

    private drawDistinct(account: AccountId, taken: readonly number[]): number {
        for (let attempt = 0; attempt < MAX_DRAW_ATTEMPTS; attempt++) {
            const index = this.drawIndex(account);
            if (!taken.includes(index)) {
                return index;
            }
        }
        throw new RangeError(`Index source gave no index outside [${taken.join(', ')}] in ${MAX_DRAW_ATTEMPTS} draws`);
    }

    private drawIndex(account: AccountId): number {
        const index = this.indexSource.next(account);
        if (!Number.isInteger(index) || index < 0 || index >= INDEX_RANGE) {
            throw new RangeError(`Index source produced ${index}, outside [0, ${INDEX_RANGE})`);
        }
        return index;
    }
}
