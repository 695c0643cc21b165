import { GuardRule } from '../config-guard.js';

export function isProtectedEnv(env: NodeJS.ProcessEnv): boolean {
    return env.NODE_ENV === 'production' || env.NODE_ENV === 'staging';
}

/**
 * Notification journal DB guards.
 * Only enforced when the journal is enabled.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: env => !env.DB_PORT || /^\d+$/.test(env.DB_PORT),
        message: 'DB_PORT must be numeric',
    },

    {
        type: 'assert',
        check: env => !isProtectedEnv(env) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },

    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: env => isProtectedEnv(env) && env.DB_SSL_QUERY === 'false',
        message: 'DB_SSL_QUERY=false is forbidden in production/staging',
    }
];
