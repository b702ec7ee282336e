export { createGeminiClient } from './gemini-client.js';
export type { GeminiClient, GeminiClientOptions } from './gemini-client.js';
export { createGeminiAnalyzer, AI_FINDING_MIN_CONFIDENCE } from './gemini-analyzer.js';
export { httpScreenshotFetcher } from './screenshots.js';
export { runPageAnalysis, runIssueAnalysis } from './confirmation.js';
export type { AiStepDeps, AiStepContext, PageAnalysisOutcome, IssueAiOutcome } from './confirmation.js';
export type * from './types.js';
