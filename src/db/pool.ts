import pg from 'pg';
import pino from 'pino';
import { config } from '../config/index.js';

const logger = pino({ name: 'db' });

export const pool = new pg.Pool({
  connectionString: config.DATABASE_URL,
  application_name: 'pdp-watch',
  max: config.SCAN_CONCURRENCY + 4,
});

pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle database client');
});

export async function checkDatabase(): Promise<void> {
  await pool.query('SELECT 1');
}
