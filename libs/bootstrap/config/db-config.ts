import type { Env, GuardRule } from '../config-guard.js';

const PROTECTED_ENVIRONMENTS = ['production', 'staging'];

function isProtected(env: Env): boolean {
    return PROTECTED_ENVIRONMENTS.includes(env['NODE_ENV'] ?? '');
}

/**
 * DB Configuration Guards
 * Connection parameters must be explicit when the PostgreSQL back end is
 * selected.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    // TLS is mandatory outside development
    {
        type: 'assert',
        check: (env) => !isProtected(env) || !!env['DB_CA_CERT'],
        message: 'DB_CA_CERT is required in production/staging'
    },
    {
        type: 'forbidIf',
        name: 'DB_SSL_DISABLED',
        when: (env) => isProtected(env) && env['DB_SSL'] === 'false',
        message: 'DB_SSL cannot be disabled in production/staging'
    }
];

/**
 * In-memory storage loses every record on restart.
 */
export const MEMORY_BACKEND_GUARDS: GuardRule[] = [
    {
        type: 'forbidIf',
        name: 'MEMORY_BACKEND_IN_PRODUCTION',
        when: (env) => env['NODE_ENV'] === 'production',
        message: 'STORAGE_BACKEND=memory is not allowed in production'
    }
];

export function storageGuards(env: Env): GuardRule[] {
    return env['STORAGE_BACKEND'] === 'memory' ? MEMORY_BACKEND_GUARDS : DB_CONFIG_GUARDS;
}
