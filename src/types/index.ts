// Domain model shared by the pipeline, the repositories and the HTTP layer.

export const SEVERITIES = ['high', 'medium', 'low'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const ISSUE_TYPES = [
  'missing_purchase_control',
  'purchase_flow_broken',
  'checkout_broken',
  'variant_selection_broken',
  'script_error',
  'template_error',
  'missing_images',
  'missing_price',
  'slow_load',
] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

export type IssueStatus = 'open' | 'acknowledged' | 'resolved';
export type PageStatus = 'pending' | 'healthy' | 'warning' | 'critical' | 'error';
export type ScanStatus = 'pending' | 'running' | 'completed' | 'failed';
export type ScanDepth = 'quick' | 'deep';
export type AlertChannel = 'email' | 'admin';
export type DeliveryStatus = 'pending' | 'sent' | 'failed';

export interface Tenant {
  id: string;
  domain: string;
  alertEmail: string | null;
  /** Billing / entitlement flag, maintained outside this service. */
  monitoringAllowed: boolean;
  emailAlertsEnabled: boolean;
  adminAlertsEnabled: boolean;
}

export interface MonitoredPage {
  id: string;
  tenantId: string;
  title: string;
  url: string;
  monitoringEnabled: boolean;
  lastScannedAt: Date | null;
  status: PageStatus;
  deletedAt: Date | null;
}

// ── Scan engine output ───────────────────────────────────────────────────

export type Verdict = 'pass' | 'fail' | 'warning' | 'inconclusive';

/** One detector check as reported by the scan engine. */
export interface RawFinding {
  check: string;
  verdict: Verdict;
  confidence: number;
  message: string;
  technicalDetails: Record<string, unknown>;
  suggestions: string[];
  evidence: Record<string, unknown>;
}

export interface JsError {
  message: string;
  timestamp?: string;
}

export interface NetworkError {
  url: string;
  failure: string;
  resourceType?: string;
}

export interface ConsoleEntry {
  type: string;
  text: string;
}

export interface AnalysisSummary {
  summary: string | null;
  pageHealthy: boolean | null;
  findingsCount: number;
}

export interface ScanRun {
  id: string;
  pageId: string;
  depth: ScanDepth;
  status: ScanStatus;
  startedAt: Date | null;
  completedAt: Date | null;
  loadTimeMs: number | null;
  jsErrors: JsError[];
  networkErrors: NetworkError[];
  consoleLogs: ConsoleEntry[];
  htmlSnapshotRef: string | null;
  screenshotRef: string | null;
  rawFindings: RawFinding[];
  errorMessage: string | null;
  analysisSummary: AnalysisSummary | null;
}

// ── Issues ───────────────────────────────────────────────────────────────

/** Ephemeral classifier output; never persisted as-is. */
export interface IssueCandidate {
  type: IssueType;
  severity: Severity;
  confidence: number;
  title: string;
  description: string;
  evidence: Record<string, unknown>;
  verdict: 'fail' | 'warning';
}

export interface AiAnnotation {
  aiConfirmed: boolean | null;
  aiConfidence: number | null;
  aiReasoning: string | null;
  aiExplanation: string | null;
  aiSuggestedFix: string | null;
  aiVerifiedAt: Date | null;
}

export interface Issue extends AiAnnotation {
  id: string;
  pageId: string;
  scanRunId: string;
  type: IssueType;
  severity: Severity;
  status: IssueStatus;
  title: string;
  description: string;
  evidence: Record<string, unknown>;
  occurrenceCount: number;
  firstSeenAt: Date;
  lastSeenAt: Date;
  acknowledgedAt: Date | null;
  acknowledgedBy: string | null;
  resolvedAt: Date | null;
}

export const EMPTY_AI_ANNOTATION: AiAnnotation = {
  aiConfirmed: null,
  aiConfidence: null,
  aiReasoning: null,
  aiExplanation: null,
  aiSuggestedFix: null,
  aiVerifiedAt: null,
};

export interface Alert {
  id: string;
  issueId: string;
  tenantId: string;
  channel: AlertChannel;
  deliveryStatus: DeliveryStatus;
  sentAt: Date | null;
  lastError: string | null;
  attempts: number;
}
