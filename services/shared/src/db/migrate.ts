import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

export const DEFAULT_MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Apply every pending `*.sql` file in name order, one transaction per file.
 * Applied file names are recorded in schema_migrations.
 */
async function runMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
     await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

     const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
     const applied = new Set(rows.map((r) => r.name));

     const files = await fs.readdir(migrationsDir);
     const pending = files.filter((f) => f.endsWith('.sql') && !applied.has(f)).sort();

     logger.info({ pending: pending.length, applied: applied.size }, 'Running database migrations');

     for (const file of pending) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

          logger.info({ file }, 'Executing migration');
          await withTransaction(async (tx) => {
               await tx.query(sql);
               await tx.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
          });
          logger.info({ file }, 'Migration completed');
     }

     logger.info('All migrations completed successfully');
     return pending;
}

// Run if executed directly
if (require.main === module) {
     runMigrations(process.env.MIGRATIONS_DIR)
          .catch((err) => {
               logger.error({ err }, 'Migration failed');
               process.exitCode = 1;
          })
          .then(() => pool.end())
          .catch((err) => logger.error({ err }, 'Failed to close database pool'));
}

export { runMigrations };
