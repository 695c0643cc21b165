import { AccountId, Amount } from '../surety/types.js';
import { FlightSuretyError, isFlightSuretyError } from '../errors/FlightSuretyError.js';
import { getComponentLogger } from '../logging/logger.js';
import { ValueTransfer } from './transfers.js';

const logger = getComponentLogger('FundLedger');

export interface LedgerSnapshot {
    readonly membershipEscrow: Amount;
    readonly insurancePool: Amount;
    readonly oracleFees: Amount;
    readonly totalCredits: Amount;
    readonly totalReceived: Amount;
    readonly totalPaidOut: Amount;
}

/**
 * Ports handed to the components that own a slice of the ledger.
 * No component receives the FundLedger itself.
 */
export interface MembershipEscrow {
    /** Keeps `fee` of `paid` in escrow and refunds the rest. Returns the refund. */
    receiveMembershipFee(payer: AccountId, paid: Amount, fee: Amount): Amount;
}

export interface PremiumBook {
    receivePremium(payer: AccountId, paid: Amount, premium: Amount): Amount;
    poolBalance(): Amount;
    payoutCapacity(): Amount;
    creditFromPool(account: AccountId, amount: Amount): void;
    creditOf(account: AccountId): Amount;
    withdrawCredit(account: AccountId, amount: Amount): void;
}

export interface OracleFeeBox {
    receiveOracleFee(payer: AccountId, paid: Amount, fee: Amount): Amount;
}

type Bucket = 'membershipEscrow' | 'insurancePool' | 'oracleFees';

/**
 * Aggregate balances held by the system.
 *
 * Invariant: membershipEscrow + insurancePool + oracleFees + sum(credits)
 *            == totalReceived - totalPaidOut
 *
 * Value only leaves through withdrawCredit(), which debits the credit before
 * the external transfer and restores it if the transfer throws.
 */
export class FundLedger implements MembershipEscrow, PremiumBook, OracleFeeBox {
    private readonly buckets: Record<Bucket, Amount> = {
        membershipEscrow: 0n,
        insurancePool: 0n,
        oracleFees: 0n
    };
    private readonly credits = new Map<AccountId, Amount>();
    private totalReceived: Amount = 0n;
    private totalPaidOut: Amount = 0n;

    constructor(private readonly transfers: ValueTransfer) { }

    public receiveMembershipFee(payer: AccountId, paid: Amount, fee: Amount): Amount {
        return this.receive(payer, paid, fee, 'membershipEscrow');
    }

    public receivePremium(payer: AccountId, paid: Amount, premium: Amount): Amount {
        return this.receive(payer, paid, premium, 'insurancePool');
    }

    public receiveOracleFee(payer: AccountId, paid: Amount, fee: Amount): Amount {
        return this.receive(payer, paid, fee, 'oracleFees');
    }

    public poolBalance(): Amount {
        return this.buckets.insurancePool;
    }

    /**
     * Premiums plus the airline membership escrow that underwrites them.
     */
    public payoutCapacity(): Amount {
        return this.buckets.insurancePool + this.buckets.membershipEscrow;
    }

    public creditOf(account: AccountId): Amount {
        return this.credits.get(account) ?? 0n;
    }

    /**
     * Moves `amount` to an account's withdrawable credit. Premiums are drawn
     * first; membership escrow covers the remainder.
     */
    public creditFromPool(account: AccountId, amount: Amount): void {
        if (amount <= 0n) {
            throw new FlightSuretyError('InvalidAmount', 'Credit amount must be positive');
        }
        const capacity = this.payoutCapacity();
        if (amount > capacity) {
            throw new FlightSuretyError('PoolUnderfunded', 'Insurance pool cannot cover credit', {
                account,
                required: amount.toString(),
                available: capacity.toString()
            });
        }
        const fromPool = amount < this.buckets.insurancePool ? amount : this.buckets.insurancePool;
        this.buckets.insurancePool -= fromPool;
        this.buckets.membershipEscrow -= amount - fromPool;
        this.credits.set(account, this.creditOf(account) + amount);
    }

    /**
     * Debit first, transfer second. A transfer that throws restores the debit
     * and surfaces as TransferFailed.
     */
    public withdrawCredit(account: AccountId, amount: Amount): void {
        if (amount <= 0n) {
            throw new FlightSuretyError('InvalidAmount', 'Withdrawal amount must be positive');
        }
        const credit = this.creditOf(account);
        if (amount > credit) {
            throw new FlightSuretyError('InsufficientCredit', 'Withdrawal exceeds available credit', {
                account,
                requested: amount.toString(),
                available: credit.toString()
            });
        }

        this.credits.set(account, credit - amount);
        this.totalPaidOut += amount;

        try {
            this.transfers.send(account, amount);
        } catch (err: unknown) {
            this.credits.set(account, this.creditOf(account) + amount);
            this.totalPaidOut -= amount;
            logger.error({ err, account, amount: amount.toString() }, 'Outbound transfer failed; debit restored');
            throw new FlightSuretyError('TransferFailed', `Transfer to ${account} failed`, { account });
        }

        logger.info({ account, amount: amount.toString() }, 'Credit withdrawn');
    }

    public snapshot(): LedgerSnapshot {
        let totalCredits = 0n;
        for (const credit of this.credits.values()) {
            totalCredits += credit;
        }
        return Object.freeze({
            membershipEscrow: this.buckets.membershipEscrow,
            insurancePool: this.buckets.insurancePool,
            oracleFees: this.buckets.oracleFees,
            totalCredits,
            totalReceived: this.totalReceived,
            totalPaidOut: this.totalPaidOut
        });
    }

    public isConserved(): boolean {
        const s = this.snapshot();
        return s.membershipEscrow + s.insurancePool + s.oracleFees + s.totalCredits
            === s.totalReceived - s.totalPaidOut;
    }

    public assertConservation(): void {
        if (!this.isConserved()) {
            const s = this.snapshot();
            logger.fatal({
                membershipEscrow: s.membershipEscrow.toString(),
                insurancePool: s.insurancePool.toString(),
                oracleFees: s.oracleFees.toString(),
                totalCredits: s.totalCredits.toString(),
                totalReceived: s.totalReceived.toString(),
                totalPaidOut: s.totalPaidOut.toString()
            }, 'Ledger conservation violated');
            throw new Error('LedgerInvariant: conservation of value violated');
        }
    }

    private receive(payer: AccountId, paid: Amount, kept: Amount, bucket: Bucket): Amount {
        if (kept <= 0n) {
            throw new FlightSuretyError('InvalidAmount', 'Received amount must be positive');
        }
        if (paid < kept) {
            throw new FlightSuretyError('InsufficientPayment', 'Payment below required amount', {
                payer,
                required: kept.toString(),
                paid: paid.toString()
            });
        }

        this.totalReceived += paid;
        this.buckets[bucket] += kept;

        const excess = paid - kept;
        if (excess > 0n) {
            this.refund(payer, excess);
        }
        return excess;
    }

    /**
     * Excess is parked as credit and withdrawn straight away. A refusing
     * payer keeps it as withdrawable credit; the call itself still succeeds.
     */
    private refund(payer: AccountId, excess: Amount): void {
        this.credits.set(payer, this.creditOf(payer) + excess);
        try {
            this.withdrawCredit(payer, excess);
        } catch (err: unknown) {
            if (!isFlightSuretyError(err, 'TransferFailed')) throw err;
            logger.warn({ payer, excess: excess.toString() }, 'Refund left as withdrawable credit');
        }
    }
}
