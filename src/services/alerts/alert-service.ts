import pino from 'pino';
import type { AlertChannel, Issue, MonitoredPage, Tenant } from '../../types/index.js';
import type { AlertRepository } from '../../db/repositories/types.js';
import type { Notifier } from '../notifications/types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { attempt } from '../../utils/result.js';
import type { Result } from '../../utils/result.js';
import { alertFactsFor, shouldAlert } from './gatekeeper.js';
import { buildAlertMessage } from './alert-message.js';

const log = pino({ name: 'alert-service' });

export interface AlertDeps {
  alerts: AlertRepository;
  notifiers: Partial<Record<AlertChannel, Notifier>>;
  appHost: string;
}

/**
 * sent: this pass delivered it.
 * claimed_elsewhere: a pending or sent row already exists for the channel.
 * not_configured: no working notifier for the channel; nothing was claimed.
 */
export type ChannelStatus = 'sent' | 'claimed_elsewhere' | 'not_configured';

export interface ChannelDelivery {
  channel: AlertChannel;
  result: Result<ChannelStatus>;
}

export interface IssueAlertOutcome {
  issueId: string;
  eligible: boolean;
  deliveries: ChannelDelivery[];
}

export function enabledChannels(tenant: Tenant): AlertChannel[] {
  const channels: AlertChannel[] = [];
  if (tenant.emailAlertsEnabled) channels.push('email');
  if (tenant.adminAlertsEnabled) channels.push('admin');
  return channels;
}

async function deliver(
  deps: AlertDeps,
  issue: Issue,
  page: MonitoredPage,
  tenant: Tenant,
  channel: AlertChannel,
  now: Date,
): Promise<ChannelStatus> {
  const notifier = deps.notifiers[channel];
  if (!notifier || !notifier.isConfigured()) {
    log.warn({ issueId: issue.id, channel }, 'Alert channel has no configured notifier');
    return 'not_configured';
  }

  const alert = await deps.alerts.claim(issue.id, tenant.id, channel);
  if (!alert) {
    log.debug({ issueId: issue.id, channel }, 'Alert already owned by another pass');
    return 'claimed_elsewhere';
  }

  // Once claimed, the row must end up sent or failed; a pending row blocks every later pass
  try {
    const recipient = channel === 'email' ? tenant.alertEmail : null;
    const delivery = await notifier.send(recipient, buildAlertMessage(issue, page, deps.appHost));
    if (!delivery.delivered) {
      throw new Error(delivery.error ?? 'Delivery failed');
    }
    await deps.alerts.markSent(alert.id, now);
  } catch (err) {
    await deps.alerts.markFailed(alert.id, getErrorMessage(err));
    throw err;
  }

  log.info({ issueId: issue.id, alertId: alert.id, channel }, 'Alert sent');
  return 'sent';
}

/**
 * Evaluate the gate for one issue and, when it passes, send through every
 * channel the tenant has enabled. Each (issue, channel) is claimed before
 * sending so concurrent passes cannot both deliver. Failures are recorded on
 * the alert row and retried by the next qualifying pass.
 */
export async function dispatchIssueAlerts(
  deps: AlertDeps,
  issue: Issue,
  page: MonitoredPage,
  tenant: Tenant,
  now: Date,
): Promise<IssueAlertOutcome> {
  const sentEmail = await deps.alerts.findSent(issue.id, 'email');
  if (!shouldAlert(alertFactsFor(issue, sentEmail))) {
    return { issueId: issue.id, eligible: false, deliveries: [] };
  }

  const deliveries: ChannelDelivery[] = [];
  for (const channel of enabledChannels(tenant)) {
    const result = await attempt(() => deliver(deps, issue, page, tenant, channel, now));
    if (!result.ok) {
      log.error({ issueId: issue.id, channel, err: result.error }, 'Alert delivery failed');
    }
    deliveries.push({ channel, result });
  }

  return { issueId: issue.id, eligible: true, deliveries };
}
