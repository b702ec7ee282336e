import type { Issue, IssueType, MonitoredPage, RawFinding, Severity, Tenant } from '../../types/index.js';

export interface PageAnalysisRequest {
  page: MonitoredPage;
  tenant: Tenant;
  screenshot: Buffer;
  rawFindings: RawFinding[];
}

export interface AiPageFinding {
  issueType: IssueType;
  severity: Severity;
  confidence: number;
  description: string;
  merchantExplanation: string | null;
  suggestedFix: string | null;
}

export interface PageAnalysis {
  findings: AiPageFinding[];
  summary: string | null;
  pageHealthy: boolean | null;
}

export interface IssueAnalysisRequest {
  issue: Issue;
  page: MonitoredPage;
  tenant: Tenant;
  /** Only attached for high-severity issues. */
  screenshot: Buffer | null;
}

export interface IssueAnalysis {
  /** Only present when a screenshot was analysed. */
  confirmed: boolean | null;
  confidence: number | null;
  reasoning: string | null;
  explanation: string | null;
  suggestedFix: string | null;
}

/**
 * AI collaborator. Treated as slow and unreliable: callers wrap every call
 * and carry on with the pre-AI state when it throws.
 */
export interface AiAnalyzer {
  analyzePage(request: PageAnalysisRequest): Promise<PageAnalysis>;
  analyzeIssue(request: IssueAnalysisRequest): Promise<IssueAnalysis>;
}

/** Loads screenshot bytes from the reference the scan engine returned. */
export interface ScreenshotFetcher {
  fetch(ref: string): Promise<Buffer>;
}
