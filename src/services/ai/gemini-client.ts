import Bottleneck from 'bottleneck';
import pino from 'pino';
import { z } from 'zod';
import { ExternalApiError } from '../../utils/errors.js';

const logger = pino({ name: 'gemini' });

const API_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';
const REQUEST_TIMEOUT_MS = 30_000;

// --- Rate limiter ---

const limiter = new Bottleneck({
  maxConcurrent: 4,
  minTime: 250,
});

// --- API response types ---

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
}

export interface GeminiClient {
  /** Send a prompt (optionally with a PNG) and return the model's JSON answer, unparsed. */
  generateJson(prompt: string, imagePng?: Buffer | null): Promise<string>;
}

export function createGeminiClient(options: GeminiClientOptions): GeminiClient {
  const url = `${API_BASE}/${encodeURIComponent(options.model)}:generateContent`;

  async function call(prompt: string, imagePng?: Buffer | null): Promise<string> {
    const parts: Array<Record<string, unknown>> = [{ text: prompt }];
    if (imagePng) {
      parts.push({ inline_data: { mime_type: 'image/png', data: imagePng.toString('base64') } });
    }

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': options.apiKey,
      },
      body: JSON.stringify({
        contents: [{ parts }],
        generationConfig: { responseMimeType: 'application/json' },
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      logger.error({ status: res.status, body: body.slice(0, 500) }, 'Gemini API error');
      throw new ExternalApiError('Gemini', `${res.status} ${res.statusText}`, { statusCode: res.status });
    }

    const parsed = geminiResponseSchema.safeParse(await res.json());
    const text = parsed.success ? parsed.data.candidates?.[0]?.content?.parts?.[0]?.text : undefined;
    if (!text) {
      throw new ExternalApiError('Gemini', 'No text in API response');
    }
    return text;
  }

  return {
    generateJson: (prompt, imagePng) => limiter.schedule(() => call(prompt, imagePng)),
  };
}
