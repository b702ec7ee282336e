import type {
  Alert,
  AlertChannel,
  AnalysisSummary,
  ConsoleEntry,
  DeliveryStatus,
  Issue,
  IssueStatus,
  IssueType,
  JsError,
  MonitoredPage,
  NetworkError,
  PageStatus,
  RawFinding,
  ScanDepth,
  ScanRun,
  ScanStatus,
  Severity,
  Tenant,
} from '../../types/index.js';

// ── Row shapes (snake_case, as stored) ─────────────────────────────
// Type aliases rather than interfaces so they satisfy pg's QueryResultRow.

export type TenantRow = {
  id: string;
  domain: string;
  alert_email: string | null;
  monitoring_allowed: boolean;
  email_alerts_enabled: boolean;
  admin_alerts_enabled: boolean;
};

export type PageRow = {
  id: string;
  tenant_id: string;
  title: string;
  url: string;
  monitoring_enabled: boolean;
  last_scanned_at: Date | null;
  status: PageStatus;
  deleted_at: Date | null;
};

export type ScanRunRow = {
  id: string;
  page_id: string;
  depth: ScanDepth;
  status: ScanStatus;
  started_at: Date | null;
  completed_at: Date | null;
  load_time_ms: number | null;
  js_errors: JsError[];
  network_errors: NetworkError[];
  console_logs: ConsoleEntry[];
  html_snapshot_ref: string | null;
  screenshot_ref: string | null;
  raw_findings: RawFinding[];
  error_message: string | null;
  analysis_summary: AnalysisSummary | null;
};

export type IssueRow = {
  id: string;
  page_id: string;
  scan_run_id: string;
  type: IssueType;
  severity: Severity;
  status: IssueStatus;
  title: string;
  description: string;
  evidence: Record<string, unknown>;
  occurrence_count: number;
  first_seen_at: Date;
  last_seen_at: Date;
  acknowledged_at: Date | null;
  acknowledged_by: string | null;
  resolved_at: Date | null;
  ai_confirmed: boolean | null;
  ai_confidence: number | null;
  ai_reasoning: string | null;
  ai_explanation: string | null;
  ai_suggested_fix: string | null;
  ai_verified_at: Date | null;
};

export type AlertRow = {
  id: string;
  issue_id: string;
  tenant_id: string;
  channel: AlertChannel;
  delivery_status: DeliveryStatus;
  sent_at: Date | null;
  last_error: string | null;
  attempts: number;
};

// ── Mappers ────────────────────────────────────────────────────────

export function toTenant(r: TenantRow): Tenant {
  return {
    id: r.id,
    domain: r.domain,
    alertEmail: r.alert_email,
    monitoringAllowed: r.monitoring_allowed,
    emailAlertsEnabled: r.email_alerts_enabled,
    adminAlertsEnabled: r.admin_alerts_enabled,
  };
}

export function toPage(r: PageRow): MonitoredPage {
  return {
    id: r.id,
    tenantId: r.tenant_id,
    title: r.title,
    url: r.url,
    monitoringEnabled: r.monitoring_enabled,
    lastScannedAt: r.last_scanned_at,
    status: r.status,
    deletedAt: r.deleted_at,
  };
}

export function toScanRun(r: ScanRunRow): ScanRun {
  return {
    id: r.id,
    pageId: r.page_id,
    depth: r.depth,
    status: r.status,
    startedAt: r.started_at,
    completedAt: r.completed_at,
    loadTimeMs: r.load_time_ms,
    jsErrors: r.js_errors,
    networkErrors: r.network_errors,
    consoleLogs: r.console_logs,
    htmlSnapshotRef: r.html_snapshot_ref,
    screenshotRef: r.screenshot_ref,
    rawFindings: r.raw_findings,
    errorMessage: r.error_message,
    analysisSummary: r.analysis_summary,
  };
}

export function toIssue(r: IssueRow): Issue {
  return {
    id: r.id,
    pageId: r.page_id,
    scanRunId: r.scan_run_id,
    type: r.type,
    severity: r.severity,
    status: r.status,
    title: r.title,
    description: r.description,
    evidence: r.evidence,
    occurrenceCount: r.occurrence_count,
    firstSeenAt: r.first_seen_at,
    lastSeenAt: r.last_seen_at,
    acknowledgedAt: r.acknowledged_at,
    acknowledgedBy: r.acknowledged_by,
    resolvedAt: r.resolved_at,
    aiConfirmed: r.ai_confirmed,
    aiConfidence: r.ai_confidence,
    aiReasoning: r.ai_reasoning,
    aiExplanation: r.ai_explanation,
    aiSuggestedFix: r.ai_suggested_fix,
    aiVerifiedAt: r.ai_verified_at,
  };
}

export function toAlert(r: AlertRow): Alert {
  return {
    id: r.id,
    issueId: r.issue_id,
    tenantId: r.tenant_id,
    channel: r.channel,
    deliveryStatus: r.delivery_status,
    sentAt: r.sent_at,
    lastError: r.last_error,
    attempts: r.attempts,
  };
}
