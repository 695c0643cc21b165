/**
 * Unit Tests: NotificationRelay
 *
 * Batch journaling in a single transaction, NOTIFY on commit, and requeue on
 * failure. The pg pool and client are mocks.
 *
 * @see libs/outbox/NotificationRelay.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { NotificationOutbox } from '../../libs/events/notifications.js';
import {
    JOURNAL_DDL,
    JournalClient,
    NOTIFY_CHANNEL,
    NotificationRelay,
    RelayError,
} from '../../libs/outbox/NotificationRelay.js';

const createMocks = () => {
    const client = {
        query: mock.fn(async (_text: string, _values?: unknown[]): Promise<unknown> => ({ rows: [] })),
        release: mock.fn(() => undefined)
    };
    const pool = {
        query: mock.fn(async (_text: string): Promise<unknown> => ({ rows: [] })),
        connect: mock.fn(async (): Promise<JournalClient> => client)
    };
    return { client, pool };
};

describe('NotificationRelay', () => {
    let outbox: NotificationOutbox;
    let relay: NotificationRelay;
    let mockClient: ReturnType<typeof createMocks>['client'];
    let mockPool: ReturnType<typeof createMocks>['pool'];

    const publishFunded = (airline: string) =>
        outbox.publish({ type: 'MembershipFunded', airline, amount: '10' });

    beforeEach(() => {
        outbox = new NotificationOutbox(true);
        const mocks = createMocks();
        mockClient = mocks.client;
        mockPool = mocks.pool;
        relay = new NotificationRelay(mockPool, outbox);
    });

    it('should create the journal table', async () => {
        await relay.ensureSchema();
        assert.strictEqual(mockPool.query.mock.calls[0]?.arguments[0], JOURNAL_DDL);
    });

    it('should journal a batch in one transaction and notify the last sequence', async () => {
        publishFunded('air-1');
        publishFunded('air-2');

        const written = await relay.flush();

        assert.strictEqual(written, 2);
        assert.strictEqual(outbox.pendingCount(), 0);

        const texts = mockClient.query.mock.calls.map(c => c.arguments[0].trim());
        assert.strictEqual(texts[0], 'BEGIN');
        assert.ok(texts[1]?.startsWith('INSERT INTO surety_notifications'));
        assert.ok(texts[2]?.startsWith('INSERT INTO surety_notifications'));
        assert.strictEqual(texts[3], 'SELECT pg_notify($1, $2)');
        assert.strictEqual(texts[4], 'COMMIT');
        assert.strictEqual(texts.length, 5);

        const insertValues = mockClient.query.mock.calls[1]?.arguments[1];
        assert.ok(Array.isArray(insertValues));
        assert.strictEqual(insertValues[0], 1);
        assert.strictEqual(insertValues[1], 'MembershipFunded');
        assert.strictEqual(insertValues[2], JSON.stringify({ type: 'MembershipFunded', airline: 'air-1', amount: '10' }));

        assert.deepStrictEqual(mockClient.query.mock.calls[3]?.arguments[1], [NOTIFY_CHANNEL, '2']);
        assert.strictEqual(mockClient.release.mock.callCount(), 1);
    });

    it('should do nothing when the outbox is empty', async () => {
        assert.strictEqual(await relay.flush(), 0);
        assert.strictEqual(mockPool.connect.mock.callCount(), 0);
    });

    it('should roll back and requeue a failed batch in order', async () => {
        publishFunded('air-1');
        publishFunded('air-2');
        mockClient.query.mock.mockImplementation(async (text: string): Promise<unknown> => {
            if (text.includes('pg_notify')) throw new Error('notify failed');
            return { rows: [] };
        });

        await assert.rejects(relay.flush(), (err: RelayError) => {
            assert.ok(err instanceof RelayError);
            assert.strictEqual(err.code, 'RELAY_FAILED');
            assert.strictEqual(err.batchSize, 2);
            assert.strictEqual(err.message, 'notify failed');
            return true;
        });

        const texts = mockClient.query.mock.calls.map(c => c.arguments[0].trim());
        assert.strictEqual(texts.at(-1), 'ROLLBACK');
        assert.ok(!texts.includes('COMMIT'));
        assert.strictEqual(mockClient.release.mock.callCount(), 1);
        assert.deepStrictEqual(outbox.drain().map(e => e.sequence), [1, 2]);
    });

    it('should requeue when no connection can be acquired', async () => {
        publishFunded('air-1');
        mockPool.connect.mock.mockImplementation(async (): Promise<JournalClient> => {
            throw new Error('connection refused');
        });

        await assert.rejects(relay.flush(), /connection refused/);
        assert.strictEqual(outbox.pendingCount(), 1);
        assert.strictEqual(mockClient.query.mock.callCount(), 0);
    });

    it('should share one in-flight flush between callers', async () => {
        publishFunded('air-1');

        const [a, b] = await Promise.all([relay.flush(), relay.flush()]);

        assert.strictEqual(a, 1);
        assert.strictEqual(b, 1);
        assert.strictEqual(mockPool.connect.mock.callCount(), 1);
    });

    it('should flush the remainder on stop', async () => {
        relay.start(60000);
        publishFunded('air-1');

        await relay.stop();

        assert.strictEqual(outbox.pendingCount(), 0);
        assert.strictEqual(mockPool.connect.mock.callCount(), 1);
    });
});
