/**
 * Flight status codes as reported by oracles and airlines.
 */
export const FlightStatus = {
    Unknown: 0,
    OnTime: 10,
    LateAirline: 20,
    LateWeather: 30,
    LateTechnical: 40,
    LateOther: 50,
} as const;

export type FlightStatusName = keyof typeof FlightStatus;
export type FlightStatusCode = (typeof FlightStatus)[FlightStatusName];

const STATUS_CODES: ReadonlySet<number> = new Set(Object.values(FlightStatus));

const DELAY_CODES: ReadonlySet<FlightStatusCode> = new Set([
    FlightStatus.LateAirline,
    FlightStatus.LateWeather,
    FlightStatus.LateTechnical,
    FlightStatus.LateOther,
]);

export function isFlightStatusCode(value: number): value is FlightStatusCode {
    return STATUS_CODES.has(value);
}

/**
 * Delay statuses trigger insurance payout.
 */
export function isDelayStatus(status: FlightStatusCode): boolean {
    return DELAY_CODES.has(status);
}

const STATUS_NAMES: Record<FlightStatusCode, FlightStatusName> = {
    0: 'Unknown',
    10: 'OnTime',
    20: 'LateAirline',
    30: 'LateWeather',
    40: 'LateTechnical',
    50: 'LateOther',
};

export function statusName(status: FlightStatusCode): FlightStatusName {
    return STATUS_NAMES[status];
}
