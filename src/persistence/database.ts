import { Pool } from 'pg';
import { logger } from '../observability/logger';
import { RetryOptions, isTransientStorageError, withRetry } from './retry';

export type Row = Record<string, unknown>;

/** One checked-out connection */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<Row[]>;
  /** Passing an error destroys the connection instead of returning it to the pool */
  release(err?: Error): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export interface DatabaseOptions {
  /** Ping a checked-out connection before handing it to a query */
  prePing: boolean;
  retry: RetryOptions;
}

export interface PgPoolOptions {
  connectionString: string;
  poolSize: number;
  maxOverflow: number;
  recycleSeconds: number;
}

/** Wrap a pg Pool sized `poolSize + maxOverflow` that recycles connections after `recycleSeconds` */
export function createPgPool(options: PgPoolOptions): SqlPool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.poolSize + options.maxOverflow,
    maxLifetimeSeconds: options.recycleSeconds,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (err) => {
    logger.warn({ err }, 'Idle database connection failed');
  });

  return {
    async connect(): Promise<SqlClient> {
      const client = await pool.connect();
      return {
        async query(text: string, params: unknown[] = []): Promise<Row[]> {
          const result = await client.query<Row>(text, params);
          return result.rows;
        },
        release(err?: Error): void {
          client.release(err);
        },
      };
    },
    end: () => pool.end(),
  };
}

/**
 * Process-wide handle over the shared pool. Every call runs through
 * withRetry; a connection that failed with a transient error is discarded
 * so the next attempt checks out a fresh one.
 */
export class Database {
  constructor(
    private readonly pool: SqlPool,
    private readonly options: DatabaseOptions,
  ) {}

  async query(operation: string, text: string, params: unknown[] = []): Promise<Row[]> {
    return withRetry(operation, () => this.withClient((client) => client.query(text, params)), this.options.retry);
  }

  /** Run `fn` inside BEGIN … COMMIT on a single connection; rolls back on any failure */
  async transaction<T>(operation: string, fn: (client: SqlClient) => Promise<T>): Promise<T> {
    return withRetry(
      operation,
      () =>
        this.withClient(async (client) => {
          await client.query('BEGIN');
          try {
            const result = await fn(client);
            await client.query('COMMIT');
            return result;
          } catch (err) {
            try {
              await client.query('ROLLBACK');
            } catch (rollbackErr) {
              logger.warn({ err: rollbackErr, operation }, 'Rollback failed');
            }
            throw err;
          }
        }),
      this.options.retry,
    );
  }

  async ping(): Promise<void> {
    await this.withClient((client) => client.query('SELECT 1'));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withClient<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      if (this.options.prePing) {
        await client.query('SELECT 1');
      }
      return await fn(client);
    } catch (err) {
      if (err instanceof Error && isTransientStorageError(err)) broken = err;
      throw err;
    } finally {
      client.release(broken);
    }
  }
}
