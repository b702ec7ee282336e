import type { Issue, MonitoredPage, RawFinding, Tenant } from '../../types/index.js';

export function buildPageAnalysisPrompt(page: MonitoredPage, tenant: Tenant, findings: RawFinding[]): string {
  const automated = findings.map((f) => `  - ${f.check}: ${f.verdict} (${f.message})`).join('\n');

  return `You are an e-commerce store quality analyst. Analyze this product page screenshot and identify ALL issues that could prevent a customer from purchasing.

Store: ${tenant.domain}
Product: ${page.title}

Our automated checks found:
${automated || '  (no automated results)'}

Look at the screenshot carefully and identify ANY of these issues:
1. Is the Add to Cart button visible and usable? Or is it missing/hidden/broken?
2. Is the product price visible and correct (not $0.00, not missing)?
3. Are product images loading correctly?
4. Are there any error messages visible on the page?
5. Is the layout broken or elements overlapping?
6. Is there anything else that would prevent a customer from buying?

IMPORTANT: Only report issues you can actually see in the screenshot.
If everything looks fine, return an empty issues array.

Respond in JSON format only:
{
  "issues": [
    {
      "type": "missing_atc|atc_not_functional|missing_price|wrong_price|broken_images|missing_images|checkout_broken|variant_broken|layout_broken|error_message",
      "severity": "high|medium|low",
      "confidence": 0.0-1.0,
      "description": "what you see in the screenshot",
      "merchant_explanation": "plain language for the store owner",
      "suggested_fix": "actionable steps to fix"
    }
  ],
  "page_healthy": true/false,
  "summary": "1-2 sentence summary for the merchant"
}`;
}

function issueContext(issue: Issue, page: MonitoredPage, tenant: Tenant): string {
  return `Product: ${page.title}
Store: ${tenant.domain}

A scan detected the following issue:
- Issue type: ${issue.type}
- Severity: ${issue.severity}
- Title: ${issue.title}
- Evidence: ${JSON.stringify(issue.evidence)}`;
}

const EXPLANATION_GUIDE = `MERCHANT EXPLANATION: Explain this issue in simple, non-technical language that a store owner would understand. Be specific about what this means for their customers and sales. 2-3 sentences max. Be calm and helpful, not alarming.
SUGGESTED FIX: Provide numbered, actionable steps the merchant can take. Assume the merchant is not a developer. Only suggest safe, reversible actions.`;

export function buildConfirmationPrompt(issue: Issue, page: MonitoredPage, tenant: Tenant): string {
  return `You are a store advisor who helps non-technical merchants understand issues with their product pages. Analyze this screenshot of a product page.

${issueContext(issue, page, tenant)}

Please provide:
CONFIRMATION: Is this issue visible in the screenshot? (true/false)
CONFIDENCE: How confident are you? (0.0 to 1.0)
REASONING: Brief technical reasoning (1-2 sentences)
${EXPLANATION_GUIDE}

Respond in JSON format only:
{"confirmed": true/false, "confidence": 0.0-1.0, "reasoning": "...", "merchant_explanation": "...", "suggested_fix": "..."}`;
}

export function buildExplanationPrompt(issue: Issue, page: MonitoredPage, tenant: Tenant): string {
  return `You are a store advisor who helps non-technical merchants understand issues with their product pages.

${issueContext(issue, page, tenant)}

Please provide:
${EXPLANATION_GUIDE}

Respond in JSON format only:
{"merchant_explanation": "...", "suggested_fix": "..."}`;
}
