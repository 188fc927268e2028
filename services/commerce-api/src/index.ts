import * as dotenv from 'dotenv';
import { closePool } from '@stockroom/shared/src/db/client';
import { logger } from '@stockroom/shared/src/utils/logger';
import { buildApp } from './app';

// Load environment variables
dotenv.config();

const PORT = parseInt(process.env.COMMERCE_API_PORT || '8000', 10);
const HOST = process.env.COMMERCE_API_HOST || '0.0.0.0';

async function main() {
     const app = await buildApp();

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Commerce API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = () => {
          logger.info('Shutting down gracefully...');
          app.close()
               .then(() => closePool())
               .then(() => process.exit(0))
               .catch((err: unknown) => {
                    logger.error({ err }, 'Shutdown failed');
                    process.exit(1);
               });
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
