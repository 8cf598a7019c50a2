import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { Logger } from '../logging/logger.js';

const { Pool } = pg;

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly poolMax: number;
    readonly ssl: boolean;
    readonly caCert?: string;
}

/**
 * PostgreSQL connection pool. TLS verification is mandatory whenever SSL
 * is enabled; the CA comes from configuration.
 */
export function createPool(config: DatabaseConfig): pg.Pool {
    return new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl
            ? {
                rejectUnauthorized: true,
                ca: config.caCert,
            }
            : false
    });
}

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

export interface Database extends Queryable {
    /**
     * Executes a callback within a managed transaction.
     * Rolls back on any error; nothing the callback wrote stays visible.
     */
    transaction<T>(callback: (tx: TxClient) => Promise<T>): Promise<T>;
    /** Closes the pool. Idempotent. */
    end(): Promise<void>;
}

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string, logger: Logger): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

// Errors after which the connection state is unknown; the client is destroyed.
const taintedErrors = new WeakSet<Error>();

function markTainted(error: Error): Error {
    taintedErrors.add(error);
    return error;
}

function isTainted(error: unknown): boolean {
    return error instanceof Error && taintedErrors.has(error);
}

async function runTransaction<T>(
    client: pg.PoolClient,
    callback: (tx: TxClient) => Promise<T>,
    logger: Logger
): Promise<T> {
    const store = transactionContext.getStore();
    if (store?.inTx) {
        throw new Error('Nested transaction detected: transaction cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');

            const txClient: TxClient = {
                query: <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<T>(text, params)
            };

            const result = await callback(txClient);
            commitAttempted = true;
            await client.query('COMMIT');
            return result;
        } catch (error) {
            let rollbackFailed = false;
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                rollbackFailed = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            const sanitized = ErrorSanitizer.sanitize(error, 'DatabaseLayer:TransactionFailed', logger);
            if (commitAttempted || rollbackFailed) {
                throw markTainted(sanitized);
            }
            throw sanitized;
        }
    });
}

/**
 * Wraps a pool with sanitized query and transaction helpers.
 */
export function createDatabase(pool: pg.Pool, logger: Logger): Database {
    let ended = false;

    return {
        query: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
            text: string,
            params?: unknown[]
        ): Promise<pg.QueryResult<T>> => {
            try {
                return await pool.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryFailure', logger);
            }
        },

        transaction: async <T>(callback: (tx: TxClient) => Promise<T>): Promise<T> => {
            const client = await pool.connect();
            let forceDestroy = false;
            try {
                return await runTransaction(client, callback, logger);
            } catch (error) {
                if (isTainted(error)) {
                    forceDestroy = true;
                }
                throw error;
            } finally {
                releaseClient(client, forceDestroy, 'transaction', logger);
            }
        },

        end: async (): Promise<void> => {
            if (ended) return;
            ended = true;
            await pool.end();
        }
    };
}
