import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { logger } from '../utils/logger';

export function buildPoolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
     const isTest = env.NODE_ENV === 'test';
     const connectionString =
          env.DATABASE_URL ||
          `postgresql://${env.DB_USER || 'postgres'}:${env.DB_PASSWORD || 'postgres'}@${
               env.DB_HOST || 'localhost'
          }:${env.DB_PORT || '5432'}/${env.DB_NAME || 'postgres'}`;

     return {
          connectionString,
          // In test mode, use minimal connections and short timeouts
          min: isTest ? 0 : parseInt(env.DB_POOL_MIN || '2', 10),
          max: isTest ? 2 : parseInt(env.DB_POOL_MAX || '10', 10),
          idleTimeoutMillis: isTest ? 100 : parseInt(env.DB_IDLE_TIMEOUT_MS || '10000', 10),
          connectionTimeoutMillis: parseInt(env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
     };
}

export const pool = new Pool(buildPoolConfig());

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

/**
 * Handle on an open BEGIN/COMMIT block. Closed once the enclosing
 * withTransaction call commits or rolls back.
 */
export class Transaction {
     private open = true;

     constructor(readonly client: PoolClient) {}

     get isOpen(): boolean {
          return this.open;
     }

     close(): void {
          this.open = false;
     }

     query<R extends QueryResultRow = QueryResultRow>(
          text: string,
          values?: unknown[]
     ): Promise<QueryResult<R>> {
          return this.client.query<R>(text, values);
     }
}

// Connection health check
export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          try {
               await client.query('SELECT 1');
          } finally {
               client.release();
          }
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

export type TransactionRunner<Tx = Transaction> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

// Transaction helper
export async function withTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     const tx = new Transaction(client);
     try {
          await client.query('BEGIN');
          const result = await fn(tx);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          try {
               await client.query('ROLLBACK');
          } catch (rollbackError) {
               logger.error({ err: rollbackError }, 'Rollback failed');
          }
          throw err;
     } finally {
          tx.close();
          client.release();
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}

