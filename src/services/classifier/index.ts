export { classifyFindings, loadTimeFinding, DEFAULT_CONFIDENCE_THRESHOLD, DEFAULT_SLOW_PAGE_THRESHOLD_MS } from './classifier.js';
export type { ClassificationResult, ClassifyOptions, DroppedFinding } from './classifier.js';
export { CHECK_MAP, lookupCheck } from './check-map.js';
export { ISSUE_CATALOG } from './issue-catalog.js';
