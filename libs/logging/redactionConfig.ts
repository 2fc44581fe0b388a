/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output. Action configs and event payloads
 * are logged verbatim, so connection secrets are listed at both levels.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Database connection settings
    'connectionString', '*.connectionString',
    'database.password',

    // Event payload passthrough
    'payload.credentials', '*.payload.credentials'
];

export const REDACT_CENSOR = '[REDACTED]';
