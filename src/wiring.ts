import type pg from 'pg';
import pino from 'pino';
import type { AppConfig } from './config/schema.js';
import type { AlertChannel } from './types/index.js';
import { createPgRepositories } from './db/repositories/index.js';
import type { Repositories } from './db/repositories/index.js';
import { createGeminiAnalyzer, createGeminiClient, httpScreenshotFetcher } from './services/ai/index.js';
import { createEmailNotifier, createTelegramNotifier } from './services/notifications/index.js';
import type { Notifier } from './services/notifications/index.js';
import { createHttpScanEngine, runPageScan } from './services/scanner/index.js';
import type { ScanDeps } from './services/scanner/index.js';
import { ScanQueue } from './services/jobs/scan-queue.js';
import { triggerScheduledSweep } from './services/jobs/sweep.js';
import type { SweepSummary } from './services/jobs/sweep.js';

const log = pino({ name: 'wiring' });

export interface Services {
  repos: Repositories;
  queue: ScanQueue;
  sweep: () => Promise<SweepSummary>;
}

/**
 * Build the production object graph from validated config.
 */
export function buildServices(config: AppConfig, pool: pg.Pool): Services {
  const repos = createPgRepositories(pool);

  const ai = config.GEMINI_API_KEY
    ? createGeminiAnalyzer(createGeminiClient({ apiKey: config.GEMINI_API_KEY, model: config.GEMINI_MODEL }))
    : null;
  if (!ai) {
    log.warn('GEMINI_API_KEY not set, AI confirmation disabled');
  }

  const notifiers: Partial<Record<AlertChannel, Notifier>> = {
    email: createEmailNotifier({
      apiUrl: config.EMAIL_API_URL,
      apiKey: config.EMAIL_API_KEY,
      from: config.ALERT_FROM_EMAIL,
    }),
    admin: createTelegramNotifier({
      botToken: config.TELEGRAM_BOT_TOKEN,
      chatId: config.TELEGRAM_CHAT_ID,
    }),
  };

  const scanDeps: ScanDeps = {
    repos,
    engine: createHttpScanEngine({ baseUrl: config.SCAN_ENGINE_URL, timeoutMs: config.SCAN_ENGINE_TIMEOUT_MS }),
    ai,
    screenshots: ai ? httpScreenshotFetcher : null,
    notifiers,
    scheduleRescan: async (pageId, delayMs) => queue.trigger(pageId, { delayMs }).status === 'enqueued',
    settings: {
      confidenceThreshold: config.CONFIDENCE_THRESHOLD,
      slowPageThresholdMs: config.SLOW_PAGE_THRESHOLD_MS,
      rescanDelayMinutes: config.RESCAN_DELAY_MINUTES,
      deepScanWeekday: config.DEEP_SCAN_WEEKDAY,
      appHost: config.APP_HOST,
    },
  };

  const queue: ScanQueue = new ScanQueue({
    worker: (pageId, options) => runPageScan(pageId, options, scanDeps),
    concurrency: config.SCAN_CONCURRENCY,
    maxAttempts: config.SCAN_MAX_ATTEMPTS,
  });

  const sweep = () =>
    triggerScheduledSweep({
      pages: repos.pages,
      tenants: repos.tenants,
      trigger: (pageId, options) => queue.trigger(pageId, options),
      refreshHours: config.SCAN_REFRESH_HOURS,
    });

  return { repos, queue, sweep };
}
