import { describe, expect, it, vi } from 'vitest';
import { createGeminiAnalyzer } from '../../services/ai/index.js';
import type { GeminiClient } from '../../services/ai/index.js';
import type { MonitoredPage, Tenant } from '../../types/index.js';
import { ExternalApiError } from '../../utils/errors.js';
import { makeIssue } from '../helpers/fixtures.js';

vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

const tenant: Tenant = {
  id: 'tenant-1',
  domain: 'shop.example.test',
  alertEmail: null,
  monitoringAllowed: true,
  emailAlertsEnabled: true,
  adminAlertsEnabled: false,
};

const page: MonitoredPage = {
  id: 'page-1',
  tenantId: 'tenant-1',
  title: 'Blue Running Shoe',
  url: 'https://shop.example.test/products/blue-running-shoe',
  monitoringEnabled: true,
  lastScannedAt: null,
  status: 'pending',
  deletedAt: null,
};

const screenshot = Buffer.from('png-bytes');

function clientReturning(answer: unknown) {
  const client = {
    generateJson: vi.fn<GeminiClient['generateJson']>(async () =>
      typeof answer === 'string' ? answer : JSON.stringify(answer),
    ),
  };
  return client;
}

describe('analyzePage', () => {
  it('maps model issue types and drops low-confidence or unknown ones', async () => {
    const client = clientReturning({
      issues: [
        { type: 'missing_atc', severity: 'high', confidence: 0.92, description: 'No button', merchant_explanation: 'Shoppers cannot buy', suggested_fix: 'Enable it' },
        { type: 'broken_images', severity: 'medium', confidence: 0.5, description: 'Blurry' },
        { type: 'sparkles_missing', severity: 'low', confidence: 0.99, description: 'No sparkle' },
      ],
      page_healthy: false,
      summary: 'The buy button is gone.',
    });

    const analysis = await createGeminiAnalyzer(client).analyzePage({ page, tenant, screenshot, rawFindings: [] });

    expect(analysis).toEqual({
      findings: [
        {
          issueType: 'missing_purchase_control',
          severity: 'high',
          confidence: 0.92,
          description: 'No button',
          merchantExplanation: 'Shoppers cannot buy',
          suggestedFix: 'Enable it',
        },
      ],
      summary: 'The buy button is gone.',
      pageHealthy: false,
    });
    expect(client.generateJson).toHaveBeenCalledWith(expect.stringContaining('Product: Blue Running Shoe'), screenshot);
  });

  it('falls back to medium for an unknown severity', async () => {
    const client = clientReturning({ issues: [{ type: 'missing_price', severity: 'urgent', confidence: 0.8 }] });

    const { findings } = await createGeminiAnalyzer(client).analyzePage({ page, tenant, screenshot, rawFindings: [] });

    expect(findings[0]).toMatchObject({ issueType: 'missing_price', severity: 'medium', description: '' });
  });

  it('throws ExternalApiError on a non-JSON answer', async () => {
    const analyzer = createGeminiAnalyzer(clientReturning('I think the page looks fine'));

    await expect(analyzer.analyzePage({ page, tenant, screenshot, rawFindings: [] })).rejects.toBeInstanceOf(
      ExternalApiError,
    );
  });
});

describe('analyzeIssue', () => {
  const answer = {
    confirmed: true,
    confidence: 0.88,
    reasoning: 'Button absent',
    merchant_explanation: 'Customers cannot add this item to their cart.',
    suggested_fix: '1. Check the theme editor.',
  };

  it('returns a confirmation verdict when a screenshot is attached', async () => {
    const client = clientReturning(answer);

    const analysis = await createGeminiAnalyzer(client).analyzeIssue({ issue: makeIssue(), page, tenant, screenshot });

    expect(analysis).toEqual({
      confirmed: true,
      confidence: 0.88,
      reasoning: 'Button absent',
      explanation: 'Customers cannot add this item to their cart.',
      suggestedFix: '1. Check the theme editor.',
    });
    expect(client.generateJson).toHaveBeenCalledWith(expect.stringContaining('CONFIRMATION:'), screenshot);
  });

  it('only explains when there is no screenshot', async () => {
    const client = clientReturning(answer);

    const analysis = await createGeminiAnalyzer(client).analyzeIssue({
      issue: makeIssue({ severity: 'low' }),
      page,
      tenant,
      screenshot: null,
    });

    expect(analysis).toMatchObject({ confirmed: null, confidence: null, reasoning: null });
    expect(analysis.explanation).toBe('Customers cannot add this item to their cart.');
    expect(client.generateJson).toHaveBeenCalledWith(expect.not.stringContaining('CONFIRMATION:'), null);
  });
});
