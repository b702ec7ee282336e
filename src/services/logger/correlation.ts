import { randomUUID } from 'crypto';

/**
 * Generate a short correlation ID for tracing a scan through the pipeline.
 * Uses first 8 chars of a UUID for brevity in logs.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context object passed through the pipeline.
 * Spread into every log call made on behalf of one scan pass.
 */
export interface ScanContext {
  correlationId: string;
  pageId: string;
  scanRunId?: string;
  service: string;
}

export function createScanContext(pageId: string): ScanContext {
  return {
    correlationId: generateCorrelationId(),
    pageId,
    service: 'scanner',
  };
}
