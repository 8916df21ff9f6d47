import "dotenv/config";
import "./types";
import { loadConfig } from "./config/validator";
import { createApp } from "./app";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./memStorage";
import { createDatabase, ensureDatabaseExists } from "./db";
import { logger } from "./utils/logger";

async function main() {
  const config = loadConfig();
  logger.configure({ level: config.logLevel, logDir: config.logDir, toFile: config.logToFile });

  let storage: IStorage;
  let closeStorage = async () => {};

  if (config.storageDriver === 'postgres' && config.databaseUrl) {
    await ensureDatabaseExists(config.databaseUrl);
    const { pool, db } = createDatabase(config.databaseUrl);
    storage = new DatabaseStorage(db);
    closeStorage = () => pool.end();
  } else {
    logger.warn('Using in-memory storage; data is lost on restart');
    storage = new MemStorage();
  }

  const { server, services } = createApp(config, storage);

  // Reconcile changes interrupted by a previous crash before serving traffic
  await services.journal.recoverPending();
  await services.tokens.purgeExpired();

  server.listen({ port: config.port, host: config.host }, () => {
    logger.info('Gallery API started', {
      port: config.port,
      host: config.host,
      environment: config.nodeEnv,
      storage: config.storageDriver,
      mediaRoot: config.mediaRoot,
      nodeVersion: process.version,
    });
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
      closeStorage()
        .catch((error: unknown) => logger.error('Failed to close storage', error))
        .finally(() => {
          logger.info('HTTP server closed');
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', error);
    // Give some time to log the error before exiting
    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
