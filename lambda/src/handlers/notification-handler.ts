/**
 * Notification Handler
 *
 * Handles the /checkout/smartpay/notification webhook. The response is
 * always 202 with an empty body, whatever happened while polling, so that
 * SmartPay does not resend a notification this adapter cannot use.
 */

import { getDeploymentEnvironment, getMaxNotificationBatches, getPaymentMethodSettings, getRelaySettings } from '../config';
import type { HandlerDependencies } from '../dependencies';
import { decodeNotification, pollNotification, PollSummary } from '../notifications/notification-poller';
import { resolveGatewayEnvironment } from '../utils/credentials-loader';
import type { HandlerResult } from './handler-result';

const ACCEPTED: HandlerResult = { statusCode: 202, body: '' };

export async function handleNotification(
  body: string | null,
  dependencies: HandlerDependencies
): Promise<HandlerResult> {
  try {
    await processNotification(body, dependencies);
  } catch (error) {
    console.error('❌ SmartPay notification could not be processed:', error);
  }
  return { ...ACCEPTED };
}

/**
 * Poll and relay for one webhook body; null when nothing could be polled
 */
export async function processNotification(
  body: string | null,
  dependencies: HandlerDependencies
): Promise<PollSummary | null> {
  console.log('🔔 SmartPay notification received');

  const notification = decodeNotification(body);
  if (!notification) {
    return null;
  }

  const settings = getPaymentMethodSettings();
  const environment = getDeploymentEnvironment();
  const credentials = await dependencies.loadCredentials(settings.settingsId, environment);

  if (!credentials) {
    console.error(`❌ No SmartPay credentials available for settings '${settings.settingsId}'; notification ignored`);
    return null;
  }

  return pollNotification(notification, {
    gateway: dependencies.gateway,
    connection: { environment: resolveGatewayEnvironment(environment), credentials },
    relay: dependencies.createRelay(getRelaySettings()),
    statusLog: dependencies.statusLog,
    webhookUrl: settings.webhookUrl,
    maxBatches: getMaxNotificationBatches()
  });
}
