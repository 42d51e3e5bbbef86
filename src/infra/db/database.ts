import pg from 'pg';
import type { ClientConfig, QueryResult, QueryResultRow } from 'pg';
import { translateDbError } from './errors.js';

const { Client } = pg;

/**
 * Anything SQL can be sent through: the session itself, or the
 * connection inside a transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/**
 * The slice of a pg client the session relies on.
 */
export interface SqlClient extends Queryable {
  end(): Promise<void>;
}

/**
 * One database connection held for the length of a user session.
 * Repositories receive it explicitly; nothing reaches for a global handle.
 * Every error leaving it is already translated to a StorageError.
 */
export class Database implements Queryable {
  private closed = false;

  constructor(private client: SqlClient) {}

  static async connect(config: ClientConfig): Promise<Database> {
    const client = new Client(config);

    // An idle connection that drops emits 'error'; unhandled, it would
    // crash the process. The next query reports the failure instead.
    client.on('error', (err) => {
      console.error('Unexpected database error:', err.message);
    });

    try {
      await client.connect();
    } catch (error) {
      throw translateDbError(error);
    }

    return new Database({
      query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
        client.query<R>(text, values),
      end: () => client.end(),
    });
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>> {
    try {
      return await this.client.query<R>(text, values);
    } catch (error) {
      throw translateDbError(error);
    }
  }

  /**
   * Run `work` between BEGIN and COMMIT. Any failure rolls back and is
   * rethrown as a StorageError, leaving the store as it was.
   */
  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    await this.query('BEGIN');
    try {
      const result = await work(this.client);
      await this.client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await this.client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('Rollback failed:', translateDbError(rollbackError).message);
      }
      throw translateDbError(error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.end();
  }
}
