import { runner } from 'node-pg-migrate';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pino from 'pino';
import { config } from '../config/index.js';

const logger = pino({ name: 'migrate' });

// <root>/migrations, from both src/db and dist/db
const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../migrations');

export async function runMigrations(databaseUrl: string = config.DATABASE_URL): Promise<void> {
  logger.info({ dir: MIGRATIONS_DIR }, 'Running database migrations...');

  const applied = await runner({
    databaseUrl,
    dir: MIGRATIONS_DIR,
    direction: 'up',
    migrationsTable: 'pgmigrations',
    log: (msg: string) => logger.info(msg),
  });

  logger.info({ applied: applied.map((m) => m.name) }, 'Migrations completed successfully');
}

// Allow running as standalone script: npm run migrate
if (process.argv[1]?.endsWith('migrate.ts')) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
