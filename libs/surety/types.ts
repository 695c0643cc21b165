/** Opaque participant identity (airline, passenger, oracle, operator, gateway). */
export type AccountId = string;

/** Integer currency amount in base units. */
export type Amount = bigint;

/**
 * Who is calling a core operation.
 * `invoker` is the authorized service (the gateway); `sender` is the
 * participant on whose behalf it acts.
 */
export interface CallContext {
    readonly invoker: AccountId;
    readonly sender: AccountId;
}
