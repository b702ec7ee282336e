import pino from 'pino';
import { config } from './config/index.js';
import { checkDatabase, pool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { buildServices } from './wiring.js';
import { registerAllJobs } from './services/jobs/register-all.js';
import { stopAllJobs } from './services/jobs/scheduler.js';

const logger = pino({ name: 'server' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${reason}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info('Configuration validated');

  // Step 2: Test database connection
  logger.info('Connecting to database...');
  await checkDatabase();
  logger.info('Database connected');

  // Step 3: Run migrations
  await runMigrations();

  // Step 4: Queue, jobs, HTTP
  const services = buildServices(config, pool);
  registerAllJobs({
    repos: services.repos,
    sweep: services.sweep,
    sweepCron: config.SWEEP_CRON,
  });

  const app = createApp({
    apiToken: config.API_TOKEN,
    repos: services.repos,
    queue: services.queue,
    sweep: services.sweep,
    checkDatabase,
  });

  const server = app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    stopAllJobs();
    server.close();
    services.queue
      .close()
      .then(() => pool.end())
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
