import type { QueryResult, QueryResultRow } from 'pg';
import type { SqlClient } from '../infra/db/database.js';

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

/**
 * What a statement does: affect `rowCount` rows (default 0) or throw `error`.
 */
export interface Reply {
  rowCount?: number;
  error?: unknown;
}

/**
 * SqlClient stand-in that records statements and returns no rows.
 */
export class RecordingClient implements SqlClient {
  readonly queries: RecordedQuery[] = [];
  endCalls = 0;

  constructor(private reply: (text: string) => Reply = () => ({})) {}

  /** Statements with whitespace collapsed. */
  get statements(): string[] {
    return this.queries.map((query) => query.text.replace(/\s+/g, ' ').trim());
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>> {
    this.queries.push({ text, values });
    const { rowCount = 0, error } = this.reply(text);
    if (error !== undefined) {
      throw error;
    }
    return { command: '', rowCount, oid: 0, fields: [], rows: [] };
  }

  async end(): Promise<void> {
    this.endCalls++;
  }
}
