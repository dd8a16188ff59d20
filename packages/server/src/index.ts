import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { connectDatabase, createDrizzleStorage, type DatabaseConnection } from './storage/drizzle/index.js';
import { getConfig } from './config/index.js';
import { createConsoleLogger, describeError } from './utils/logger.js';
import { generateRandomBase64Url } from './crypto/random.js';
import type { IStorage } from './storage/interfaces/index.js';

const config = getConfig();
const logger = createConsoleLogger(config.logging.level);

let storage: IStorage;
let database: DatabaseConnection | null = null;

if (config.database.url) {
  logger.info('Using PostgreSQL storage');
  database = connectDatabase(config.database.url);
  storage = createDrizzleStorage(database.db);
} else {
  logger.warn('Using in-memory storage (no DATABASE_URL configured); data is lost on restart');
  storage = createMemoryStorage();
}

let sessionSecret = config.secrets.sessionSecret;
if (!sessionSecret) {
  // Sessions will not survive a restart
  logger.warn('SECRET_KEY is not set; using a random per-process session secret');
  sessionSecret = generateRandomBase64Url(32);
}

const app = createAuthServer({
  storage,
  logger,
  config,
  sessionSecret,
  enableLogging: config.server.nodeEnv !== 'test',
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Authorization server listening', {
      address: info.address,
      port: info.port,
      issuer: config.server.issuer,
    });
  }
);

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });

  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

  if (database) {
    await database.close();
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', describeError(error));
        process.exit(1);
      });
  });
}
