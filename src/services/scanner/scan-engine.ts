import pino from 'pino';
import { z } from 'zod';
import type {
  ConsoleEntry,
  JsError,
  NetworkError,
  RawFinding,
  ScanDepth,
} from '../../types/index.js';
import { ExternalApiError } from '../../utils/errors.js';

const logger = pino({ name: 'scan-engine' });

export interface ScanEngineRequest {
  url: string;
  depth: ScanDepth;
}

export type ScanEngineResult =
  | {
      success: true;
      loadTimeMs: number | null;
      rawFindings: RawFinding[];
      jsErrors: JsError[];
      networkErrors: NetworkError[];
      consoleLogs: ConsoleEntry[];
      htmlSnapshotRef: string | null;
      screenshotRef: string | null;
    }
  | { success: false; error: string };

/** Browser automation runs elsewhere; this is all the pipeline sees of it. */
export interface ScanEngine {
  run(request: ScanEngineRequest): Promise<ScanEngineResult>;
}

// --- Wire format ---

const rawFindingSchema = z.object({
  check: z.string(),
  verdict: z.enum(['pass', 'fail', 'warning', 'inconclusive']),
  confidence: z.number().min(0).max(1),
  message: z.string().default(''),
  technicalDetails: z.record(z.unknown()).default({}),
  suggestions: z.array(z.string()).default([]),
  evidence: z.record(z.unknown()).default({}),
});

const scanResponseSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    loadTimeMs: z.number().nonnegative().nullable().default(null),
    rawFindings: z.array(rawFindingSchema).default([]),
    jsErrors: z.array(z.object({ message: z.string(), timestamp: z.string().optional() })).default([]),
    networkErrors: z
      .array(z.object({ url: z.string(), failure: z.string(), resourceType: z.string().optional() }))
      .default([]),
    consoleLogs: z.array(z.object({ type: z.string(), text: z.string() })).default([]),
    htmlSnapshotRef: z.string().nullable().default(null),
    screenshotRef: z.string().nullable().default(null),
  }),
  z.object({
    success: z.literal(false),
    error: z.string().default('Scan engine reported failure'),
  }),
]);

export interface HttpScanEngineOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * POST {baseUrl}/scan with { url, depth }. A page the engine could not load
 * comes back as `success: false`; transport and protocol failures throw.
 */
export function createHttpScanEngine(options: HttpScanEngineOptions): ScanEngine {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/scan`;

  return {
    async run(request: ScanEngineRequest): Promise<ScanEngineResult> {
      const res = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        logger.error({ status: res.status, url: request.url, body: body.slice(0, 500) }, 'Scan engine HTTP error');
        throw new ExternalApiError('ScanEngine', `${res.status} ${res.statusText}`, { statusCode: res.status });
      }

      const parsed = scanResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        logger.error({ url: request.url, issues: parsed.error.issues }, 'Scan engine response failed validation');
        throw new ExternalApiError('ScanEngine', 'Malformed scan response');
      }
      return parsed.data;
    },
  };
}
