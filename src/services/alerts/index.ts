export { alertFactsFor, shouldAlert, MIN_UNCONFIRMED_OCCURRENCES } from './gatekeeper.js';
export type { AlertFacts } from './gatekeeper.js';
export { buildAlertMessage, issueLink } from './alert-message.js';
export { dispatchIssueAlerts, enabledChannels } from './alert-service.js';
export type { AlertDeps, ChannelDelivery, ChannelStatus, IssueAlertOutcome } from './alert-service.js';
