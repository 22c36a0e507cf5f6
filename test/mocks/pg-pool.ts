import type { QueryResultRow } from 'pg';
import type { TPostgresPool } from '../../src/storage/postgres.storage';

export interface IRecordedQuery {
    text: string;
    values: unknown[];
}

export type TQueryResponder = (
    query: IRecordedQuery,
) => { rows?: QueryResultRow[]; rowCount?: number } | Error | undefined;

/**
 * In-process pool that records every statement and answers through a
 * responder. Statements without an answer return no rows.
 */
export class FakePgPool {
    public readonly queries: IRecordedQuery[] = [];
    public readonly release = jest.fn();
    public readonly end = jest.fn(async () => undefined);
    public ended = false;

    constructor(private responder: TQueryResponder = () => undefined) {}

    public respondWith(responder: TQueryResponder): void {
        this.responder = responder;
    }

    public readonly query = jest.fn(async (text: string, values: unknown[] = []) => {
        const recorded = { text: text.replace(/\s+/g, ' ').trim(), values };
        this.queries.push(recorded);
        const answer = this.responder(recorded);
        if (answer instanceof Error) {
            throw answer;
        }
        const rows = answer?.rows ?? [];
        return { rows, rowCount: answer?.rowCount ?? rows.length };
    });

    public readonly connect = jest.fn(async () => ({
        query: this.query,
        release: this.release,
    }));

    /** Statements issued so far, whitespace collapsed. */
    public texts(): string[] {
        return this.queries.map((query) => query.text);
    }

    public asPool(): TPostgresPool {
        return this as unknown as TPostgresPool;
    }
}
