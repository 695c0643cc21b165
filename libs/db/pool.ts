import pg from 'pg';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS, isProtectedEnv } from '../bootstrap/config/db-config.js';

const { Pool } = pg;

/**
 * Connection settings for the notification journal. TLS is forced in
 * production/staging and may not be switched off there.
 */
export function journalPoolConfig(env: NodeJS.ProcessEnv = process.env): pg.PoolConfig {
    const isProtected = isProtectedEnv(env);
    if (isProtected && env.DB_SSL_QUERY === 'false') {
        throw new Error("CRITICAL: DB_SSL_QUERY=false is forbidden in production/staging.");
    }

    const poolMax = env.DB_POOL_MAX ? parseInt(env.DB_POOL_MAX, 10) : 5;
    const useTls = isProtected || env.DB_SSL_QUERY === 'true';

    return {
        host: env.DB_HOST,
        port: Number(env.DB_PORT),
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        database: env.DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: useTls ? { rejectUnauthorized: true, ca: env.DB_CA_CERT } : false
    };
}

/**
 * Pool for the notification journal.
 * Enforces the DB guards against the same env first; nothing here has a fallback value.
 */
export function createJournalPool(env: NodeJS.ProcessEnv = process.env): pg.Pool {
    ConfigGuard.enforce(DB_CONFIG_GUARDS, env);
    return new Pool(journalPoolConfig(env));
}
