import pino from 'pino';
import { z } from 'zod';
import type { IssueType } from '../../types/index.js';
import { SEVERITIES } from '../../types/index.js';
import { ExternalApiError } from '../../utils/errors.js';
import type { GeminiClient } from './gemini-client.js';
import { buildConfirmationPrompt, buildExplanationPrompt, buildPageAnalysisPrompt } from './prompts.js';
import type { AiAnalyzer, AiPageFinding, IssueAnalysis, PageAnalysis } from './types.js';

const log = pino({ name: 'ai-analyzer' });

export const AI_FINDING_MIN_CONFIDENCE = 0.7;

/** Issue vocabulary the model answers in → our issue types. */
const AI_ISSUE_TYPE_MAP: Readonly<Record<string, IssueType>> = {
  missing_atc: 'missing_purchase_control',
  atc_not_functional: 'purchase_flow_broken',
  missing_price: 'missing_price',
  wrong_price: 'missing_price',
  broken_images: 'missing_images',
  missing_images: 'missing_images',
  checkout_broken: 'checkout_broken',
  variant_broken: 'variant_selection_broken',
  layout_broken: 'script_error',
  error_message: 'script_error',
};

const optionalText = z.string().nullish().transform((v) => v ?? null);

const pageResponseSchema = z.object({
  issues: z
    .array(
      z.object({
        type: z.string(),
        severity: z.enum(SEVERITIES).catch('medium'),
        confidence: z.coerce.number().catch(0),
        description: z.string().nullish().transform((v) => v ?? ''),
        merchant_explanation: optionalText,
        suggested_fix: optionalText,
      }),
    )
    .default([]),
  page_healthy: z.boolean().nullish().transform((v) => v ?? null),
  summary: optionalText,
});

const issueResponseSchema = z.object({
  confirmed: z.boolean().nullish().transform((v) => v ?? null),
  confidence: z.coerce.number().nullish().transform((v) => v ?? null),
  reasoning: optionalText,
  merchant_explanation: optionalText,
  suggested_fix: optionalText,
});

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ExternalApiError('Gemini', 'Response was not valid JSON', { cause: err });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ExternalApiError('Gemini', 'Response did not match the expected shape', {
      context: { issues: result.error.flatten() },
    });
  }
  return result.data;
}

function lookupAiType(type: string): IssueType | null {
  return Object.hasOwn(AI_ISSUE_TYPE_MAP, type) ? AI_ISSUE_TYPE_MAP[type] : null;
}

/**
 * Gemini-backed analyzer.
 *
 * Page mode: screenshot + automated results → findings the model can see.
 * Issue mode: high severity gets the screenshot and a confirmation verdict;
 * everything else is text only (explanation and fix).
 */
export function createGeminiAnalyzer(client: GeminiClient): AiAnalyzer {
  return {
    async analyzePage({ page, tenant, screenshot, rawFindings }): Promise<PageAnalysis> {
      const text = await client.generateJson(buildPageAnalysisPrompt(page, tenant, rawFindings), screenshot);
      const parsed = parseJson(pageResponseSchema, text);

      const findings: AiPageFinding[] = [];
      for (const item of parsed.issues) {
        const issueType = lookupAiType(item.type);
        if (!issueType) {
          log.debug({ type: item.type }, 'Unknown AI issue type, skipping');
          continue;
        }
        if (item.confidence < AI_FINDING_MIN_CONFIDENCE) continue;

        findings.push({
          issueType,
          severity: item.severity,
          confidence: item.confidence,
          description: item.description,
          merchantExplanation: item.merchant_explanation,
          suggestedFix: item.suggested_fix,
        });
      }

      log.info(
        { pageId: page.id, rawCount: parsed.issues.length, kept: findings.length },
        'AI page analysis parsed',
      );

      return { findings, summary: parsed.summary, pageHealthy: parsed.page_healthy };
    },

    async analyzeIssue({ issue, page, tenant, screenshot }): Promise<IssueAnalysis> {
      const withConfirmation = screenshot !== null;
      const prompt = withConfirmation
        ? buildConfirmationPrompt(issue, page, tenant)
        : buildExplanationPrompt(issue, page, tenant);

      const parsed = parseJson(issueResponseSchema, await client.generateJson(prompt, screenshot));

      return {
        confirmed: withConfirmation ? parsed.confirmed : null,
        confidence: withConfirmation ? parsed.confidence : null,
        reasoning: withConfirmation ? parsed.reasoning : null,
        explanation: parsed.merchant_explanation,
        suggestedFix: parsed.suggested_fix,
      };
    },
  };
}
