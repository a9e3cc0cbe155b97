// Load environment variables FIRST
import './env.js';

import { createServer } from 'http';
import { createApp } from './app.js';
import { end as endPool } from './db/client.js';
import { createLogger } from './services/calendarSync/logger.js';

const logger = createLogger('Server');
const PORT = Number.parseInt(process.env.PORT ?? '3000', 10);

const server = createServer(createApp());

server.listen(PORT, '0.0.0.0', () => {
  logger.info(`Server running on http://localhost:${PORT}`);
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close(() => {
    endPool()
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', {
          error: error instanceof Error ? error.message : String(error)
        });
      })
      .finally(() => process.exit(0));
  });
}

process.once('SIGTERM', () => shutdown('SIGTERM'));
process.once('SIGINT', () => shutdown('SIGINT'));
