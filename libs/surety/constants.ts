/**
 * Protocol constants.
 * Amounts are integer units; one whole unit is 10^18 base units.
 */

export const UNIT = 10n ** 18n;

/** Registered airlines below this count admit new airlines without a vote. */
export const CONSENSUS_THRESHOLD = 4;

/** Votes required once at threshold: floor(registeredCount / MULTI_PARTY_RATE). */
export const MULTI_PARTY_RATE = 2;

export const JOIN_FEE = 10n * UNIT;

export const MAX_INSURANCE_AMOUNT = 1n * UNIT;

export const REGISTRATION_FEE = 1n * UNIT;

/** Matching oracle reports needed to resolve a status request. */
export const MIN_RESPONSES = 3;

/** Oracle indexes are drawn from [0, INDEX_RANGE). */
export const INDEX_RANGE = 10;

/** Payout = premium * PAYOUT_NUMERATOR / PAYOUT_DENOMINATOR, rounded down. */
export const PAYOUT_NUMERATOR = 3n;
export const PAYOUT_DENOMINATOR = 2n;
