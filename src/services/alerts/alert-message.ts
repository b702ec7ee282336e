import type { Issue, MonitoredPage } from '../../types/index.js';
import { severityLabel } from '../../types/severity.js';
import { escapeHtml } from '../../utils/html.js';
import type { AlertMessage } from '../notifications/types.js';

export function issueLink(appHost: string, issueId: string): string {
  return `${appHost.replace(/\/+$/, '')}/issues/${issueId}`;
}

/**
 * Merchant-facing alert copy. Prefers the AI explanation over the raw
 * detector description when one is available.
 */
export function buildAlertMessage(issue: Issue, page: MonitoredPage, appHost: string): AlertMessage {
  const subject = `Issue detected on ${page.title}`;
  const explanation = issue.aiExplanation ?? issue.description;
  const link = issueLink(appHost, issue.id);

  const lines = [
    issue.title,
    `Severity: ${severityLabel(issue.severity)}`,
    `Page: ${page.url}`,
    '',
    explanation,
  ];
  if (issue.aiSuggestedFix) {
    lines.push('', `Suggested fix: ${issue.aiSuggestedFix}`);
  }
  lines.push('', `View details: ${link}`);

  const html = [
    `<h2>${escapeHtml(issue.title)}</h2>`,
    `<p><strong>${escapeHtml(severityLabel(issue.severity))}</strong> on <a href="${escapeHtml(page.url)}">${escapeHtml(page.title)}</a></p>`,
    `<p>${escapeHtml(explanation)}</p>`,
    issue.aiSuggestedFix ? `<p><strong>Suggested fix:</strong> ${escapeHtml(issue.aiSuggestedFix)}</p>` : '',
    `<p><a href="${escapeHtml(link)}">View details</a></p>`,
  ].filter(Boolean).join('\n');

  return { subject, text: lines.join('\n'), html };
}
