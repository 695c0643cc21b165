/**
 * Notification journal relay.
 *
 * Drains the in-process outbox into PostgreSQL in one transaction per batch
 * and wakes listeners with NOTIFY. A failed batch is rolled back and put back
 * at the head of the outbox, so sequence order is preserved across retries.
 */

import pino from 'pino';
import { NotificationEnvelope, NotificationOutbox } from '../events/notifications.js';

const logger = pino({ name: 'NotificationRelay', level: process.env.LOG_LEVEL ?? 'info' });

const BATCH_SIZE = 100;
export const NOTIFY_CHANNEL = 'surety_notifications';

export const JOURNAL_DDL = `
    CREATE TABLE IF NOT EXISTS surety_notifications (
        sequence BIGINT PRIMARY KEY,
        event_type TEXT NOT NULL,
        payload JSONB NOT NULL,
        emitted_at TIMESTAMPTZ NOT NULL,
        recorded_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
`;

/**
 * The slice of pg's Pool and PoolClient the relay uses.
 */
export interface JournalClient {
    query(text: string, values?: unknown[]): Promise<unknown>;
    release(): void;
}

export interface JournalPool {
    query(text: string): Promise<unknown>;
    connect(): Promise<JournalClient>;
}

export class RelayError extends Error {
    readonly code = 'RELAY_FAILED';
    readonly statusCode = 503;

    constructor(message: string, public readonly batchSize: number) {
        super(message);
        this.name = 'RelayError';
    }
}

export class NotificationRelay {
    private timer: NodeJS.Timeout | null = null;
    private flushing: Promise<number> | null = null;

    constructor(
        private readonly pool: JournalPool,
        private readonly outbox: NotificationOutbox
    ) { }

    public async ensureSchema(): Promise<void> {
        await this.pool.query(JOURNAL_DDL);
        logger.info({ table: 'surety_notifications' }, 'Journal schema ensured');
    }

    /**
     * Writes every pending notification. Returns the number journaled.
     * Concurrent callers share the in-flight flush.
     */
    public flush(): Promise<number> {
        if (!this.flushing) {
            this.flushing = this.flushAll().finally(() => {
                this.flushing = null;
            });
        }
        return this.flushing;
    }

    public start(intervalMs: number): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            this.flush().catch((err: unknown) => {
                logger.error({ err }, 'Scheduled journal flush failed');
            });
        }, intervalMs);
        logger.info({ intervalMs }, 'Notification relay started');
    }

    public async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await this.flush();
        logger.info('Notification relay stopped');
    }

    private async flushAll(): Promise<number> {
        let written = 0;
        for (;;) {
            const batch = this.outbox.drain(BATCH_SIZE);
            if (batch.length === 0) return written;
            written += await this.writeBatch(batch);
        }
    }

    private async writeBatch(batch: NotificationEnvelope[]): Promise<number> {
        const client = await this.pool.connect().catch((err: unknown) => {
            this.outbox.requeue(batch);
            throw err;
        });

        try {
            await client.query('BEGIN');

            for (const envelope of batch) {
                await client.query(`
                    INSERT INTO surety_notifications (sequence, event_type, payload, emitted_at)
                    VALUES ($1, $2, $3, $4)
                    ON CONFLICT (sequence) DO NOTHING;
                `, [
                    envelope.sequence,
                    envelope.notification.type,
                    JSON.stringify(envelope.notification),
                    envelope.emittedAt
                ]);
            }

            const last = batch[batch.length - 1];
            await client.query('SELECT pg_notify($1, $2)', [NOTIFY_CHANNEL, String(last?.sequence ?? 0)]);
            await client.query('COMMIT');

            logger.info({ event: 'JOURNAL_BATCH_COMMITTED', count: batch.length, lastSequence: last?.sequence });
            return batch.length;
        } catch (error: unknown) {
            this.outbox.requeue(batch);
            await client.query('ROLLBACK');
            const message = error instanceof Error ? error.message : 'Unknown error';
            logger.error({ error: message, batchSize: batch.length }, 'Journal batch rolled back');
            throw new RelayError(message, batch.length);
        } finally {
            client.release();
        }
    }
}
