/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output: credentials and raw activity payloads.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Database connection settings
    'connectionString', '*.connectionString',
    'ca', '*.ca',

    // Activity payloads are fingerprinted, never logged
    'input', '*.input',
    'output', '*.output',
    'payload', '*.payload'
];

export const REDACT_CENSOR = '[REDACTED]';
