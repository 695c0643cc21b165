import { AccountId, CallContext } from '../surety/types.js';
import { AccessControl } from '../access/accessControl.js';
import { AirlineDirectory } from '../airline/airlineRegistry.js';
import { NotificationSink } from '../events/notifications.js';
import { FlightSuretyError } from '../errors/FlightSuretyError.js';
import { compositeKey } from '../keys/compositeKey.js';
import { getComponentLogger } from '../logging/logger.js';
import { FlightStatus, FlightStatusCode, isFlightStatusCode, statusName } from './flightStatus.js';

const logger = getComponentLogger('FlightRegistry');

export type StatusSource = 'NONE' | 'AIRLINE' | 'ORACLE';

export interface Flight {
    readonly key: string;
    readonly airline: AccountId;
    readonly code: string;
    readonly timestamp: number;
    readonly status: FlightStatusCode;
    readonly statusSource: StatusSource;
}

/**
 * Read-only flight lookup for the insurance and oracle components.
 */
export interface FlightDirectory {
    getFlight(key: string): Flight | undefined;
}

export function flightKey(airline: AccountId, code: string, timestamp: number): string {
    return compositeKey('flight', airline, code, timestamp);
}

/**
 * Flights keyed by (airline, code, timestamp).
 *
 * Status precedence: an airline may overwrite the status of its own flight
 * until an oracle quorum resolves it; after that only further oracle
 * resolutions may change it.
 */
export class FlightRegistry implements FlightDirectory {
    private readonly flights = new Map<string, Flight>();

    constructor(
        private readonly access: AccessControl,
        private readonly airlines: AirlineDirectory,
        private readonly notifications: NotificationSink
    ) { }

    public registerFlight(ctx: CallContext, code: string, timestamp: number): Flight {
        this.access.requireCallable(ctx.invoker);

        if (!this.airlines.isAdmittedAndFunded(ctx.sender)) {
            throw new FlightSuretyError('NotAuthorizedAirline', `Airline ${ctx.sender} is not registered and funded`, { airline: ctx.sender });
        }

        const key = flightKey(ctx.sender, code, timestamp);
        if (this.flights.has(key)) {
            throw new FlightSuretyError('FlightAlreadyExists', `Flight ${code}@${timestamp} already registered`, { flightKey: key });
        }

        const flight: Flight = Object.freeze({
            key,
            airline: ctx.sender,
            code,
            timestamp,
            status: FlightStatus.Unknown,
            statusSource: 'NONE'
        });
        this.flights.set(key, flight);

        logger.info({ flightKey: key, airline: ctx.sender, code, timestamp }, 'Flight registered');
        this.notifications.publish({ type: 'FlightRegistered', flightKey: key, airline: ctx.sender, flight: code, timestamp });
        return flight;
    }

    /**
     * Direct update by the owning airline.
     */
    public setStatus(ctx: CallContext, key: string, status: number): Flight {
        this.access.requireCallable(ctx.invoker);
        const code = this.requireStatusCode(status);
        const flight = this.requireFlight(key);

        if (flight.airline !== ctx.sender) {
            throw new FlightSuretyError('NotAuthorizedAirline', 'Only the owning airline may update flight status', { flightKey: key });
        }
        if (flight.statusSource === 'ORACLE') {
            throw new FlightSuretyError('StatusFrozen', 'Flight status was resolved by oracle consensus', { flightKey: key });
        }

        return this.write(flight, code, 'AIRLINE');
    }

    /**
     * Oracle quorum result. Always overwrites; the last resolution wins.
     */
    public applyResolvedStatus(ctx: CallContext, key: string, status: FlightStatusCode): Flight {
        this.access.requireCallable(ctx.invoker);
        return this.write(this.requireFlight(key), status, 'ORACLE');
    }

    public getFlight(key: string): Flight | undefined {
        return this.flights.get(key);
    }

    public getFlightStatus(key: string): FlightStatusCode {
        return this.requireFlight(key).status;
    }

    private write(flight: Flight, status: FlightStatusCode, source: 'AIRLINE' | 'ORACLE'): Flight {
        const updated: Flight = Object.freeze({ ...flight, status, statusSource: source });
        this.flights.set(flight.key, updated);

        logger.info({ flightKey: flight.key, status: statusName(status), source }, 'Flight status updated');
        this.notifications.publish({ type: 'FlightStatusUpdated', flightKey: flight.key, status, source });
        return updated;
    }

    private requireFlight(key: string): Flight {
        const flight = this.flights.get(key);
        if (!flight) {
            throw new FlightSuretyError('UnknownFlight', 'Flight is not registered', { flightKey: key });
        }
        return flight;
    }

    private requireStatusCode(status: number): FlightStatusCode {
        if (!isFlightStatusCode(status)) {
            throw new FlightSuretyError('InvalidStatus', `Unknown flight status code ${status}`);
        }
        return status;
    }
}
