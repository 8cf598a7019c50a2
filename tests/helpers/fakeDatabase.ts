import type { QueryResult, QueryResultRow } from 'pg';
import type { Database } from '../../libs/db/index.js';

export interface RecordedQuery {
    readonly text: string;
    readonly params: unknown[] | undefined;
    readonly inTransaction: boolean;
}

export interface FakeResponse {
    readonly rows?: QueryResultRow[];
    readonly rowCount?: number | null;
}

export type Responder = (text: string, params?: unknown[]) => FakeResponse;

export interface FakeDatabase {
    readonly db: Database;
    readonly queries: RecordedQuery[];
    endCalls(): number;
}

/**
 * In-process Database double: records every statement and answers from a
 * responder. A throwing responder fails the statement.
 */
export function createFakeDatabase(responder: Responder = () => ({})): FakeDatabase {
    const queries: RecordedQuery[] = [];
    let ended = 0;

    const run = async (text: string, params: unknown[] | undefined, inTransaction: boolean): Promise<QueryResult> => {
        queries.push({ text, params, inTransaction });
        const response = responder(text, params);
        return {
            rows: response.rows ?? [],
            rowCount: response.rowCount ?? null,
            command: '',
            oid: 0,
            fields: []
        };
    };

    const db = {
        query: (text: string, params?: unknown[]) => run(text, params, false),
        transaction: async <T>(callback: (tx: { query: (text: string, params?: unknown[]) => Promise<QueryResult> }) => Promise<T>) =>
            callback({ query: (text, params) => run(text, params, true) }),
        end: async () => {
            ended++;
        }
    };

    return {
        db: db as unknown as Database,
        queries,
        endCalls: () => ended
    };
}
