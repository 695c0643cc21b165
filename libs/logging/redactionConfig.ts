/**
 * Centralized Redaction Configuration
 * Keys removed from every log line. Account ids and amounts stay visible for
 * audit; connection secrets never do.
 */
export const REDACT_KEYS = [
    // Connection / operator secrets (Root and Nested)
    'password', '*.password',
    'secret', '*.secret',
    'token', '*.token',
    'authorization', '*.authorization',
    'connectionString', '*.connectionString',

    // Journal connection config
    'dbPassword', '*.dbPassword',
    'caCert', '*.caCert',

    // Entropy used for oracle index derivation
    'seed', '*.seed'
];

export const REDACT_CENSOR = '[REDACTED]';
