export { mergeIntoLedger } from './issue-ledger.js';
export type { LedgerInput, LedgerOutcome } from './issue-ledger.js';
export { planMerge } from './merge-policy.js';
export type { MergeAction, MergePlan } from './merge-policy.js';
