import type {
  Alert,
  AlertChannel,
  AnalysisSummary,
  ConsoleEntry,
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
  Severity,
  Tenant,
} from '../../types/index.js';

/**
 * Which pages a query may see. Soft-deleted pages are only visible when a
 * caller asks for them explicitly; there is no ambient default.
 */
export type PageVisibility = 'live' | 'include_deleted';

export interface PageRepository {
  findById(pageId: string, visibility: PageVisibility): Promise<MonitoredPage | null>;
  /** Live, monitoring-enabled pages never scanned or last scanned before `cutoff`. */
  listDue(tenantId: string, cutoff: Date, visibility: PageVisibility): Promise<MonitoredPage[]>;
  updateStatus(pageId: string, status: PageStatus): Promise<void>;
  markScanned(pageId: string, at: Date): Promise<void>;
}

export interface TenantRepository {
  findById(tenantId: string): Promise<Tenant | null>;
  listAll(): Promise<Tenant[]>;
}

export interface CompletedScanData {
  loadTimeMs: number | null;
  jsErrors: JsError[];
  networkErrors: NetworkError[];
  consoleLogs: ConsoleEntry[];
  htmlSnapshotRef: string | null;
  screenshotRef: string | null;
  rawFindings: RawFinding[];
}

export interface ScanRunRepository {
  countForPage(pageId: string): Promise<number>;
  /** Creates the run directly in `running`. */
  start(pageId: string, depth: ScanDepth, at: Date): Promise<ScanRun>;
  complete(scanRunId: string, data: CompletedScanData, at: Date): Promise<ScanRun>;
  fail(scanRunId: string, errorMessage: string, at: Date): Promise<void>;
  saveAnalysisSummary(scanRunId: string, summary: AnalysisSummary): Promise<void>;
  /** Marks runs stuck in `running` since before `startedBefore` as failed. Returns how many. */
  failStale(startedBefore: Date, errorMessage: string, at: Date): Promise<number>;
}

export interface NewIssue {
  pageId: string;
  scanRunId: string;
  type: IssueType;
  severity: Severity;
  title: string;
  description: string;
  evidence: Record<string, unknown>;
  at: Date;
  aiConfirmed?: boolean;
  aiConfidence?: number | null;
  aiReasoning?: string | null;
  aiExplanation?: string | null;
  aiSuggestedFix?: string | null;
  aiVerifiedAt?: Date | null;
}

export type IssuePatch = Partial<
  Pick<
    Issue,
    | 'scanRunId'
    | 'severity'
    | 'status'
    | 'title'
    | 'description'
    | 'evidence'
    | 'occurrenceCount'
    | 'lastSeenAt'
    | 'acknowledgedAt'
    | 'acknowledgedBy'
    | 'resolvedAt'
    | 'aiConfirmed'
    | 'aiConfidence'
    | 'aiReasoning'
    | 'aiExplanation'
    | 'aiSuggestedFix'
    | 'aiVerifiedAt'
  >
>;

export const ACTIVE_ISSUE_STATUSES: readonly IssueStatus[] = ['open', 'acknowledged'];

export interface IssueRepository {
  findById(issueId: string): Promise<Issue | null>;
  /** The single open-or-acknowledged issue of a type on a page, if any. */
  findActive(pageId: string, type: IssueType): Promise<Issue | null>;
  listActive(pageId: string): Promise<Issue[]>;
  create(input: NewIssue): Promise<Issue>;
  update(issueId: string, patch: IssuePatch): Promise<Issue>;
}

export interface AlertRepository {
  findSent(issueId: string, channel: AlertChannel): Promise<Alert | null>;
  /**
   * Atomically take ownership of the (issue, channel) alert: inserts a
   * pending row, or flips a failed row back to pending. Returns null when a
   * pending or sent row already exists.
   */
  claim(issueId: string, tenantId: string, channel: AlertChannel): Promise<Alert | null>;
  markSent(alertId: string, at: Date): Promise<Alert>;
  markFailed(alertId: string, error: string): Promise<Alert>;
  /** Marks rows left `pending` since before `claimedBefore` as failed so the next pass can reclaim them. Returns how many. */
  failStalePending(claimedBefore: Date, error: string): Promise<number>;
}

export interface Repositories {
  pages: PageRepository;
  tenants: TenantRepository;
  scanRuns: ScanRunRepository;
  issues: IssueRepository;
  alerts: AlertRepository;
}
