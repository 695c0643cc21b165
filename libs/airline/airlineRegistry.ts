import { AccountId, Amount, CallContext } from '../surety/types.js';
import { AccessControl } from '../access/accessControl.js';
import { MembershipEscrow } from '../ledger/fundLedger.js';
import { NotificationSink } from '../events/notifications.js';
import { FlightSuretyError } from '../errors/FlightSuretyError.js';
import { getComponentLogger } from '../logging/logger.js';
import { CONSENSUS_THRESHOLD, JOIN_FEE, MULTI_PARTY_RATE } from '../surety/constants.js';

const logger = getComponentLogger('AirlineRegistry');

export type AirlineState = 'UNKNOWN' | 'PENDING' | 'REGISTERED';

export interface AirlineView {
    readonly id: AccountId;
    readonly state: AirlineState;
    readonly hasPaidFund: boolean;
    readonly votesCast: readonly AccountId[];
    readonly pendingVotes: number;
}

export interface AdmissionResult {
    readonly admitted: boolean;
    readonly votes: number;
}

/**
 * Read-only view other components use to check airline standing.
 */
export interface AirlineDirectory {
    isRegistered(airline: AccountId): boolean;
    isFunded(airline: AccountId): boolean;
    isAdmittedAndFunded(airline: AccountId): boolean;
}

interface AirlineRecord {
    isRegistered: boolean;
    hasPaidFund: boolean;
    readonly votesCast: Set<AccountId>;
}

/**
 * Airline admission state machine: UNKNOWN -> PENDING -> REGISTERED.
 *
 * Below CONSENSUS_THRESHOLD registered airlines any funded airline admits a
 * new one directly. From the threshold on, a target needs distinct votes from
 * floor(registered / MULTI_PARTY_RATE) funded airlines. The outcome depends
 * only on the set of voters, never on their order.
 */
export class AirlineRegistry implements AirlineDirectory {
    private readonly airlines = new Map<AccountId, AirlineRecord>();
    /** target -> distinct voters; emptied (kept) on admission */
    private readonly pending = new Map<AccountId, Set<AccountId>>();
    private registeredCount = 0;

    constructor(
        private readonly access: AccessControl,
        private readonly escrow: MembershipEscrow,
        private readonly notifications: NotificationSink,
        firstAirline: AccountId
    ) {
        this.admit(firstAirline, 0);
    }

    public registerAirline(ctx: CallContext, target: AccountId): AdmissionResult {
        this.access.requireCallable(ctx.invoker);
        this.requireFundedAirline(ctx.sender);

        if (this.isRegistered(target)) {
            throw new FlightSuretyError('AlreadyRegistered', `Airline ${target} is already registered`, { airline: target });
        }

        if (this.registeredCount < CONSENSUS_THRESHOLD) {
            this.admit(target, 0);
            return { admitted: true, votes: 0 };
        }

        const voters = this.pending.get(target) ?? new Set<AccountId>();
        const required = this.requiredVotes();

        if (voters.has(ctx.sender)) {
            logger.info({ airline: target, voter: ctx.sender, votes: voters.size }, 'Repeated vote ignored');
            return { admitted: false, votes: voters.size };
        }

        voters.add(ctx.sender);
        this.pending.set(target, voters);
        this.record(ctx.sender).votesCast.add(target);

        const votes = voters.size;
        this.notifications.publish({ type: 'AirlineVoteCast', airline: target, voter: ctx.sender, votes, required });

        if (votes >= required) {
            voters.clear();
            this.admit(target, votes);
            return { admitted: true, votes };
        }

        logger.info({ airline: target, votes, required }, 'Airline admission pending');
        return { admitted: false, votes };
    }

    public payMembershipFund(ctx: CallContext, amount: Amount): void {
        this.access.requireCallable(ctx.invoker);

        const airline = this.airlines.get(ctx.sender);
        if (!airline?.isRegistered) {
            throw new FlightSuretyError('NotAuthorizedAirline', `Airline ${ctx.sender} is not registered`, { airline: ctx.sender });
        }
        if (airline.hasPaidFund) {
            throw new FlightSuretyError('AlreadyFunded', `Airline ${ctx.sender} has already paid its fund`, { airline: ctx.sender });
        }
        if (amount < JOIN_FEE) {
            throw new FlightSuretyError('InsufficientPayment', 'Membership fund below join fee', {
                required: JOIN_FEE.toString(),
                paid: amount.toString()
            });
        }

        // Marked before the refund transfer so a nested call sees AlreadyFunded.
        airline.hasPaidFund = true;
        let refund: Amount;
        try {
            refund = this.escrow.receiveMembershipFee(ctx.sender, amount, JOIN_FEE);
        } catch (err: unknown) {
            airline.hasPaidFund = false;
            throw err;
        }

        logger.info({ airline: ctx.sender, refund: refund.toString() }, 'Membership fund paid');
        this.notifications.publish({ type: 'MembershipFunded', airline: ctx.sender, amount: JOIN_FEE.toString() });
    }

    public getRegisteredAirlineCount(): number {
        return this.registeredCount;
    }

    public isRegistered(airline: AccountId): boolean {
        return this.airlines.get(airline)?.isRegistered ?? false;
    }

    public isFunded(airline: AccountId): boolean {
        return this.airlines.get(airline)?.hasPaidFund ?? false;
    }

    public isAdmittedAndFunded(airline: AccountId): boolean {
        return this.isRegistered(airline) && this.isFunded(airline);
    }

    public isPending(airline: AccountId): boolean {
        return !this.isRegistered(airline) && this.getVoteCount(airline) > 0;
    }

    public getVoteCount(airline: AccountId): number {
        return this.pending.get(airline)?.size ?? 0;
    }

    public requiredVotes(): number {
        return Math.floor(this.registeredCount / MULTI_PARTY_RATE);
    }

    public getAirline(airline: AccountId): AirlineView {
        const record = this.airlines.get(airline);
        const state: AirlineState = record?.isRegistered
            ? 'REGISTERED'
            : this.isPending(airline) ? 'PENDING' : 'UNKNOWN';
        return Object.freeze({
            id: airline,
            state,
            hasPaidFund: record?.hasPaidFund ?? false,
            votesCast: [...(record?.votesCast ?? [])],
            pendingVotes: this.getVoteCount(airline)
        });
    }

    private requireFundedAirline(airline: AccountId): void {
        if (!this.isAdmittedAndFunded(airline)) {
            logger.warn({ airline }, 'Caller is not a registered, funded airline');
            throw new FlightSuretyError('NotAuthorizedAirline', `Airline ${airline} is not registered and funded`, { airline });
        }
    }

    private admit(airline: AccountId, votes: number): void {
        const record = this.record(airline);
        if (record.isRegistered) return;

        record.isRegistered = true;
        this.registeredCount += 1;

        logger.info({ airline, votes, registeredCount: this.registeredCount }, 'Airline admitted');
        this.notifications.publish({ type: 'AirlineAdmitted', airline, registeredCount: this.registeredCount, votes });
    }

    private record(airline: AccountId): AirlineRecord {
        let record = this.airlines.get(airline);
        if (!record) {
            record = { isRegistered: false, hasPaidFund: false, votesCast: new Set() };
            this.airlines.set(airline, record);
        }
        return record;
    }
}
