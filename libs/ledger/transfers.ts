import { AccountId, Amount } from '../surety/types.js';

/**
 * Outbound value movement to an external account.
 * Implementations may call back into the core before returning; the ledger
 * always debits before it calls send().
 */
export interface ValueTransfer {
    send(to: AccountId, amount: Amount): void;
}

export type TransferHook = (to: AccountId, amount: Amount) => void;

/**
 * In-process wallet book used by the node entry point and the tests.
 * Accounts listed in `rejecting` refuse every incoming transfer.
 */
export class InMemoryValueTransfer implements ValueTransfer {
    private readonly balances = new Map<AccountId, Amount>();
    private readonly rejecting = new Set<AccountId>();

    constructor(private readonly onTransfer?: TransferHook) { }

    public send(to: AccountId, amount: Amount): void {
        if (this.rejecting.has(to)) {
            throw new Error(`Account ${to} rejected transfer`);
        }
        this.onTransfer?.(to, amount);
        this.balances.set(to, this.balanceOf(to) + amount);
    }

    public balanceOf(account: AccountId): Amount {
        return this.balances.get(account) ?? 0n;
    }

    public rejectTransfersTo(account: AccountId): void {
        this.rejecting.add(account);
    }

    public acceptTransfersTo(account: AccountId): void {
        this.rejecting.delete(account);
    }
}
