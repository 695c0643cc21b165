/**
 * Unit Tests: FlightRegistry
 *
 * Registration by funded airlines, direct status updates and the freeze
 * applied once an oracle quorum has resolved a flight.
 *
 * @see libs/flight/flightRegistry.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AccessControl } from '../../libs/access/accessControl.js';
import { AirlineRegistry } from '../../libs/airline/airlineRegistry.js';
import { FlightRegistry, flightKey } from '../../libs/flight/flightRegistry.js';
import { FlightStatus, isDelayStatus, statusName } from '../../libs/flight/flightStatus.js';
import { FundLedger } from '../../libs/ledger/fundLedger.js';
import { InMemoryValueTransfer } from '../../libs/ledger/transfers.js';
import { NotificationOutbox, SuretyNotification } from '../../libs/events/notifications.js';
import { FlightSuretyError } from '../../libs/errors/FlightSuretyError.js';
import { CallContext } from '../../libs/surety/types.js';
import { JOIN_FEE } from '../../libs/surety/constants.js';

const ctxOf = (sender: string): CallContext => ({ invoker: 'gateway', sender });

describe('FlightRegistry', () => {
    let airlines: AirlineRegistry;
    let flights: FlightRegistry;
    let published: SuretyNotification[];

    beforeEach(() => {
        const access = new AccessControl('owner');
        access.authorize('owner', 'gateway');
        const outbox = new NotificationOutbox();
        airlines = new AirlineRegistry(access, new FundLedger(new InMemoryValueTransfer()), outbox, 'air-1');
        airlines.payMembershipFund(ctxOf('air-1'), JOIN_FEE);
        airlines.registerAirline(ctxOf('air-1'), 'air-2');
        flights = new FlightRegistry(access, airlines, outbox);
        published = [];
        outbox.subscribe(envelope => published.push(envelope.notification));
    });

    describe('flight status codes', () => {
        it('should treat only the late statuses as delays', () => {
            assert.strictEqual(isDelayStatus(FlightStatus.Unknown), false);
            assert.strictEqual(isDelayStatus(FlightStatus.OnTime), false);
            assert.strictEqual(isDelayStatus(FlightStatus.LateAirline), true);
            assert.strictEqual(isDelayStatus(FlightStatus.LateWeather), true);
            assert.strictEqual(isDelayStatus(FlightStatus.LateTechnical), true);
            assert.strictEqual(isDelayStatus(FlightStatus.LateOther), true);
            assert.strictEqual(statusName(FlightStatus.LateWeather), 'LateWeather');
        });
    });

    describe('registerFlight', () => {
        it('should register a flight with unknown status', () => {
            const flight = flights.registerFlight(ctxOf('air-1'), 'ND1309', 1700000000);

            assert.strictEqual(flight.key, flightKey('air-1', 'ND1309', 1700000000));
            assert.strictEqual(flight.status, FlightStatus.Unknown);
            assert.strictEqual(flight.statusSource, 'NONE');
            assert.strictEqual(flights.getFlightStatus(flight.key), FlightStatus.Unknown);
            assert.deepStrictEqual(published, [
                { type: 'FlightRegistered', flightKey: flight.key, airline: 'air-1', flight: 'ND1309', timestamp: 1700000000 }
            ]);
        });

        it('should reject a duplicate flight', () => {
            flights.registerFlight(ctxOf('air-1'), 'ND1309', 1700000000);
            assert.throws(
                () => flights.registerFlight(ctxOf('air-1'), 'ND1309', 1700000000),
                (err: FlightSuretyError) => err.code === 'FlightAlreadyExists'
            );
        });

        it('should key the same code separately per airline and timestamp', () => {
            airlines.payMembershipFund(ctxOf('air-2'), JOIN_FEE);
            const a = flights.registerFlight(ctxOf('air-1'), 'ND1309', 1700000000);
            const b = flights.registerFlight(ctxOf('air-2'), 'ND1309', 1700000000);
            const c = flights.registerFlight(ctxOf('air-1'), 'ND1309', 1700003600);

            assert.notStrictEqual(a.key, b.key);
            assert.notStrictEqual(a.key, c.key);
        });

        it('should reject a registered but unfunded airline', () => {
            assert.throws(
                () => flights.registerFlight(ctxOf('air-2'), 'ND1309', 1700000000),
                (err: FlightSuretyError) => err.code === 'NotAuthorizedAirline'
            );
        });

        it('should reject an unknown flight lookup', () => {
            assert.throws(
                () => flights.getFlightStatus(flightKey('air-1', 'XX1', 1)),
                (err: FlightSuretyError) => err.code === 'UnknownFlight'
            );
        });
    });

    describe('status updates', () => {
        let key: string;

        beforeEach(() => {
            key = flights.registerFlight(ctxOf('air-1'), 'ND1309', 1700000000).key;
            published = [];
        });

        it('should let the owning airline overwrite its status', () => {
            flights.setStatus(ctxOf('air-1'), key, FlightStatus.OnTime);
            const updated = flights.setStatus(ctxOf('air-1'), key, FlightStatus.LateWeather);

            assert.strictEqual(updated.status, FlightStatus.LateWeather);
            assert.strictEqual(updated.statusSource, 'AIRLINE');
            assert.deepStrictEqual(published.map(n => n.type), ['FlightStatusUpdated', 'FlightStatusUpdated']);
        });

        it('should reject another airline', () => {
            assert.throws(
                () => flights.setStatus(ctxOf('air-2'), key, FlightStatus.OnTime),
                (err: FlightSuretyError) => err.code === 'NotAuthorizedAirline'
            );
        });

        it('should reject an undefined status code', () => {
            assert.throws(
                () => flights.setStatus(ctxOf('air-1'), key, 15),
                (err: FlightSuretyError) => err.code === 'InvalidStatus'
            );
            assert.strictEqual(flights.getFlightStatus(key), FlightStatus.Unknown);
        });

        it('should freeze direct updates after an oracle resolution', () => {
            flights.setStatus(ctxOf('air-1'), key, FlightStatus.OnTime);
            flights.applyResolvedStatus(ctxOf('oracle-1'), key, FlightStatus.LateTechnical);

            assert.throws(
                () => flights.setStatus(ctxOf('air-1'), key, FlightStatus.OnTime),
                (err: FlightSuretyError) => err.code === 'StatusFrozen'
            );
            assert.strictEqual(flights.getFlight(key)?.statusSource, 'ORACLE');

            flights.applyResolvedStatus(ctxOf('oracle-2'), key, FlightStatus.LateOther);
            assert.strictEqual(flights.getFlightStatus(key), FlightStatus.LateOther);
        });
    });
});
