import pino from 'pino';
import type { IssueCandidate, IssueType, RawFinding, Severity } from '../../types/index.js';
import { compareSeverity } from '../../types/severity.js';
import { lookupCheck } from './check-map.js';
import { ISSUE_CATALOG } from './issue-catalog.js';

const log = pino({ name: 'classifier' });

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;
export const DEFAULT_SLOW_PAGE_THRESHOLD_MS = 5_000;

export interface ClassifyOptions {
  confidenceThreshold?: number;
}

export interface DroppedFinding {
  check: string;
  verdict: RawFinding['verdict'];
  confidence: number;
}

export interface ClassificationResult {
  /** At most one candidate per issue type, in first-seen order. */
  candidates: IssueCandidate[];
  /** Types whose check passed: any active issue of these types should resolve. */
  passedTypes: IssueType[];
  /** Mapped fail/warning findings below the confidence threshold. */
  dropped: DroppedFinding[];
  /** Check names with no entry in the check map. */
  unmapped: string[];
}

function toCandidate(finding: RawFinding, type: IssueType, severity: Severity): IssueCandidate {
  const catalog = ISSUE_CATALOG[type];
  const message = finding.message.trim();

  return {
    type,
    severity,
    confidence: finding.confidence,
    title: catalog.title,
    description: message || catalog.description,
    evidence: {
      check: finding.check,
      confidence: finding.confidence,
      technicalDetails: finding.technicalDetails,
      suggestions: finding.suggestions,
      evidence: finding.evidence,
    },
    verdict: finding.verdict === 'warning' ? 'warning' : 'fail',
  };
}

/**
 * Turn raw detector output into issue candidates.
 *
 * fail ≥ threshold     → candidate at the check's default severity
 * warning ≥ threshold  → low-severity candidate
 * pass                 → resolution signal for the type, no candidate
 * inconclusive         → ignored (existing state stays as it is)
 * below threshold      → dropped; silence beats a false positive
 *
 * Pure: no I/O beyond debug logging.
 */
export function classifyFindings(
  findings: readonly RawFinding[],
  options: ClassifyOptions = {},
): ClassificationResult {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const byType = new Map<IssueType, IssueCandidate>();
  const passed = new Set<IssueType>();
  const dropped: DroppedFinding[] = [];
  const unmapped: string[] = [];

  for (const finding of findings) {
    const mapping = lookupCheck(finding.check);
    if (!mapping) {
      log.warn({ check: finding.check }, 'Unmapped detector check, ignoring');
      unmapped.push(finding.check);
      continue;
    }

    switch (finding.verdict) {
      case 'pass':
        passed.add(mapping.issueType);
        break;

      case 'inconclusive':
        log.debug({ check: finding.check }, 'Inconclusive result, leaving state unchanged');
        break;

      case 'fail':
      case 'warning': {
        if (finding.confidence < threshold) {
          log.debug(
            { check: finding.check, verdict: finding.verdict, confidence: finding.confidence, threshold },
            'Low confidence finding dropped',
          );
          dropped.push({ check: finding.check, verdict: finding.verdict, confidence: finding.confidence });
          break;
        }

        const severity: Severity = finding.verdict === 'warning' ? 'low' : mapping.severity;
        const candidate = toCandidate(finding, mapping.issueType, severity);
        const existing = byType.get(mapping.issueType);
        if (!existing || compareSeverity(candidate.severity, existing.severity) > 0) {
          byType.set(mapping.issueType, candidate);
        }
        break;
      }
    }
  }

  const candidates = [...byType.values()];
  const passedTypes = [...passed].filter((type) => !byType.has(type));

  return { candidates, passedTypes, dropped, unmapped };
}

/**
 * Express the engine's load-time measurement as a detector finding so slow
 * pages flow through the same classification as every other check.
 */
export function loadTimeFinding(
  loadTimeMs: number | null,
  thresholdMs: number = DEFAULT_SLOW_PAGE_THRESHOLD_MS,
): RawFinding | null {
  if (loadTimeMs === null) return null;

  const seconds = (loadTimeMs / 1000).toFixed(1);
  const slow = loadTimeMs > thresholdMs;

  return {
    check: 'page_load_time',
    verdict: slow ? 'fail' : 'pass',
    confidence: 1,
    message: slow
      ? `This page took ${seconds} seconds to load. This may affect customer experience.`
      : `Page loaded in ${seconds} seconds`,
    technicalDetails: { loadTimeMs, thresholdMs },
    suggestions: [],
    evidence: {},
  };
}
