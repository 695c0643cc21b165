/**
 * FlightSuretyError
 * Canonical rejection for every core operation, with a machine-readable code.
 * A thrown FlightSuretyError guarantees the rejected call mutated nothing.
 */

export type FlightSuretyErrorCode =
    | 'NotOperational'
    | 'Unauthorized'
    | 'NotAuthorizedAirline'
    | 'AlreadyRegistered'
    | 'AlreadyFunded'
    | 'InsufficientPayment'
    | 'InvalidAmount'
    | 'InvalidBuyer'
    | 'DuplicateClaim'
    | 'UnknownFlight'
    | 'FlightAlreadyExists'
    | 'StatusFrozen'
    | 'InvalidStatus'
    | 'UnknownOracle'
    | 'IndexMismatch'
    | 'NoMatchingRequest'
    | 'InsufficientCredit'
    | 'PoolUnderfunded'
    | 'TransferFailed';

const STATUS_BY_CODE: Record<FlightSuretyErrorCode, number> = {
    NotOperational: 503,
    Unauthorized: 403,
    NotAuthorizedAirline: 403,
    AlreadyRegistered: 409,
    AlreadyFunded: 409,
    InsufficientPayment: 402,
    InvalidAmount: 400,
    InvalidBuyer: 403,
    DuplicateClaim: 409,
    UnknownFlight: 404,
    FlightAlreadyExists: 409,
    StatusFrozen: 409,
    InvalidStatus: 400,
    UnknownOracle: 403,
    IndexMismatch: 403,
    NoMatchingRequest: 404,
    InsufficientCredit: 402,
    PoolUnderfunded: 409,
    TransferFailed: 502
};

export class FlightSuretyError extends Error {
    readonly code: FlightSuretyErrorCode;
    readonly statusCode: number;
    readonly details: Readonly<Record<string, string>>;

    constructor(code: FlightSuretyErrorCode, message?: string, details: Record<string, string> = {}) {
        super(message || `Rejected: ${code}`);
        this.name = 'FlightSuretyError';
        this.code = code;
        this.statusCode = STATUS_BY_CODE[code];
        this.details = Object.freeze({ ...details });
        Object.setPrototypeOf(this, FlightSuretyError.prototype);
    }
}

export function isFlightSuretyError(err: unknown, code?: FlightSuretyErrorCode): err is FlightSuretyError {
    return err instanceof FlightSuretyError && (code === undefined || err.code === code);
}
