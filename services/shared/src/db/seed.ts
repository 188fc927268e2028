import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const DEMO_STOCK: Array<[string, number]> = [
     ['SKU-TSHIRT-BLK-M', 120],
     ['SKU-TSHIRT-BLK-L', 80],
     ['SKU-MUG-CERAMIC', 45],
     ['SKU-TOTE-CANVAS', 200],
];

async function seedDatabase() {
     try {
          logger.info('Seeding database with demo stock');

          await withTransaction(async (tx) => {
               for (const [sku, quantity] of DEMO_STOCK) {
                    await tx.query(
                         `
          INSERT INTO inventory (sku, quantity)
          VALUES ($1, $2)
          ON CONFLICT (sku) DO NOTHING
        `,
                         [sku, quantity]
                    );
               }
          });

          logger.info({ count: DEMO_STOCK.length }, 'Database seeding completed successfully');
     } catch (error) {
          logger.error({ err: error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch(() => {
          process.exitCode = 1;
     });
}

export { seedDatabase };
