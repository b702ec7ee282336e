import cron from 'node-cron';
import pino from 'pino';
import { getErrorMessage } from '../../utils/errors.js';

const log = pino({ name: 'scheduler' });

export interface JobStatus {
  isRunning: boolean;
  isPaused: boolean;
  lastRun: Date | null;
  lastError: string | null;
  runCount: number;
}

interface JobEntry extends JobStatus {
  task: cron.ScheduledTask | null;
}

const jobs = new Map<string, JobEntry>();

async function runJob(name: string, job: JobEntry, fn: () => Promise<void>): Promise<void> {
  // Overlap protection
  if (job.isRunning) {
    log.warn({ job: name }, 'Job still running, skipping this cycle');
    return;
  }

  job.isRunning = true;
  const startTime = Date.now();

  try {
    await fn();
    const durationMs = Date.now() - startTime;
    job.lastRun = new Date();
    job.lastError = null;
    job.runCount++;
    log.info({ job: name, durationMs, runCount: job.runCount }, 'Job completed');
  } catch (err) {
    const durationMs = Date.now() - startTime;
    job.lastError = getErrorMessage(err);
    log.error({ job: name, err, durationMs }, 'Job failed');
  } finally {
    job.isRunning = false;
  }
}

/**
 * Register a background job with cron scheduling and overlap protection.
 *
 * @param name - Unique job name (for logging and diagnostics)
 * @param schedule - Cron expression (e.g. '0 6 * * *' for daily at 06:00)
 * @param fn - Async function to execute
 */
export function registerJob(name: string, schedule: string, fn: () => Promise<void>): void {
  if (jobs.has(name)) {
    log.warn({ job: name }, 'Job already registered, skipping');
    return;
  }
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for job '${name}': ${schedule}`);
  }

  const job: JobEntry = {
    task: null,
    isRunning: false,
    isPaused: false,
    lastRun: null,
    lastError: null,
    runCount: 0,
  };
  job.task = cron.schedule(schedule, () => runJob(name, job, fn));
  jobs.set(name, job);

  log.info({ job: name, schedule }, 'Job registered');
}

/**
 * Get status of all registered jobs (for /api/status endpoint).
 */
export function getJobStatuses(): Record<string, JobStatus> {
  const statuses: Record<string, JobStatus> = {};
  for (const [name, entry] of jobs) {
    statuses[name] = {
      isRunning: entry.isRunning,
      isPaused: entry.isPaused,
      lastRun: entry.lastRun,
      lastError: entry.lastError,
      runCount: entry.runCount,
    };
  }
  return statuses;
}

/**
 * Stop all registered jobs (for graceful shutdown).
 */
export function stopAllJobs(): void {
  for (const [name, entry] of jobs) {
    entry.task?.stop();
    entry.isPaused = true;
    log.info({ job: name }, 'Job stopped');
  }
}
