import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';

/**
 * Anything that runs a parameterized query: the pool or a checked-out client
 */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/**
 * A checked-out connection, used for transactions
 */
export interface PooledConnection extends Queryable {
  release(destroy?: boolean): void;
}

/**
 * What the storage needs from a pool
 */
export interface ConnectionSource extends Queryable {
  connect(): Promise<PooledConnection>;
  end(): Promise<void>;
}

/**
 * Create the connection pool
 */
export function createPool(connectionString: string): pg.Pool {
  return new pg.Pool({ connectionString });
}

/**
 * Adapt a pg pool to the storage's connection interface
 */
export function fromPool(source: pg.Pool): ConnectionSource {
  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]) =>
      source.query<R>(text, values),

    async connect(): Promise<PooledConnection> {
      const client = await source.connect();
      return {
        query: <R extends QueryResultRow>(text: string, values?: unknown[]) =>
          client.query<R>(text, values),
        release: (destroy?: boolean) => client.release(destroy),
      };
    },

    end: () => source.end(),
  };
}

