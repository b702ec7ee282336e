export { runPageScan } from './scan-orchestrator.js';
export type { AlertStepOutcome, PipelineSettings, ScanDeps, ScanOptions, ScanOutcome } from './scan-orchestrator.js';
export { determineScanDepth } from './scan-depth.js';
export { InFlightRegistry } from './single-flight.js';
export { createHttpScanEngine } from './scan-engine.js';
export type { ScanEngine, ScanEngineRequest, ScanEngineResult } from './scan-engine.js';
export { computePageStatus } from './page-health.js';
export { scheduleRescanIfNeeded, selectRescanIssues, DEFAULT_RESCAN_DELAY_MINUTES } from './rescan-scheduler.js';
export type { RescanTrigger } from './rescan-scheduler.js';
export { isMonitoringAllowed, skipReasonFor } from './eligibility.js';
export type { SkipReason } from './eligibility.js';
