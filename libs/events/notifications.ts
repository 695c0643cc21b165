import { AccountId } from '../surety/types.js';
import { FlightStatusCode } from '../flight/flightStatus.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('NotificationOutbox');

/**
 * Observable notifications consumed by oracle nodes and dashboards.
 * Amounts are decimal strings so every payload is JSON-safe.
 */
export type SuretyNotification =
    | { type: 'AirlineAdmitted'; airline: AccountId; registeredCount: number; votes: number }
    | { type: 'AirlineVoteCast'; airline: AccountId; voter: AccountId; votes: number; required: number }
    | { type: 'MembershipFunded'; airline: AccountId; amount: string }
    | { type: 'FlightRegistered'; flightKey: string; airline: AccountId; flight: string; timestamp: number }
    | { type: 'FlightStatusUpdated'; flightKey: string; status: FlightStatusCode; source: 'AIRLINE' | 'ORACLE' }
    | { type: 'InsurancePurchased'; claimKey: string; passenger: AccountId; flightKey: string; premium: string }
    | { type: 'InsurancePaidOut'; claimKey: string; passenger: AccountId; flightKey: string; amount: string }
    | { type: 'CreditWithdrawn'; account: AccountId; amount: string }
    | { type: 'OracleRegistered'; oracle: AccountId; indexes: readonly number[] }
    | { type: 'StatusRequestOpened'; index: number; airline: AccountId; flight: string; timestamp: number }
    | { type: 'OracleReportReceived'; oracle: AccountId; airline: AccountId; flight: string; timestamp: number; status: FlightStatusCode }
    | { type: 'FlightStatusResolved'; airline: AccountId; flight: string; timestamp: number; status: FlightStatusCode };

export type NotificationType = SuretyNotification['type'];

export interface NotificationEnvelope {
    readonly sequence: number;
    readonly emittedAt: string;
    readonly notification: SuretyNotification;
}

/**
 * What core components see: publish only.
 */
export interface NotificationSink {
    publish(notification: SuretyNotification): void;
}

export type NotificationListener = (envelope: NotificationEnvelope) => void;

/**
 * In-process outbox.
 * Listeners run synchronously in publish order. When retention is on,
 * envelopes are also kept until a relay drains them.
 */
export class NotificationOutbox implements NotificationSink {
    private sequence = 0;
    private pending: NotificationEnvelope[] = [];
    private readonly listeners = new Set<NotificationListener>();

    constructor(private readonly retainForRelay: boolean = false) { }

    public publish(notification: SuretyNotification): void {
        const envelope: NotificationEnvelope = Object.freeze({
            sequence: ++this.sequence,
            emittedAt: new Date().toISOString(),
            notification: Object.freeze(notification)
        });

        if (this.retainForRelay) {
            this.pending.push(envelope);
        }

        for (const listener of this.listeners) {
            try {
                listener(envelope);
            } catch (err) {
                // State has already committed; a listener cannot undo it.
                logger.error({ err, sequence: envelope.sequence, type: notification.type }, 'Notification listener failed');
            }
        }
    }

    /**
     * Returns an unsubscribe function.
     */
    public subscribe(listener: NotificationListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Removes and returns up to `max` retained envelopes, oldest first.
     */
    public drain(max: number = Number.POSITIVE_INFINITY): NotificationEnvelope[] {
        const batch = this.pending.slice(0, max);
        this.pending = this.pending.slice(batch.length);
        return batch;
    }

    /**
     * Puts a failed batch back at the head of the queue, preserving order.
     */
    public requeue(batch: readonly NotificationEnvelope[]): void {
        this.pending = [...batch, ...this.pending];
    }

    public pendingCount(): number {
        return this.pending.length;
    }
}
