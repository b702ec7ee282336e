import type { ScreenshotFetcher } from './types.js';
import { ExternalApiError } from '../../utils/errors.js';

const DOWNLOAD_TIMEOUT_MS = 15_000;

/**
 * Screenshot references from the scan engine are plain (usually signed) URLs.
 */
export const httpScreenshotFetcher: ScreenshotFetcher = {
  async fetch(ref: string): Promise<Buffer> {
    const res = await fetch(ref, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });
    if (!res.ok) {
      throw new ExternalApiError('Screenshot storage', `${res.status} ${res.statusText}`, {
        statusCode: res.status,
      });
    }
    return Buffer.from(await res.arrayBuffer());
  },
};
