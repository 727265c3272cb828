/**
 * Notification Poller
 *
 * Handles a SmartPay webhook notification: verifies it, pulls every queued
 * page of order results, verifies each page and relays the terminal
 * statuses to the store's status update endpoint. IN_PROGRESS results are
 * written to the status log instead.
 *
 * Every failure ends the poll quietly; SmartPay only needs to know the
 * notification arrived. Pages relayed before a failure stay relayed.
 */

import { z } from 'zod';
import type { IPaymentStatusLogService } from '@psp-adapter/payment-status-log';
import {
  isValidNotificationSignature,
  isValidStatusResponseSignature,
  signPaymentCompleted
} from '../signing/signature';
import type { ApiNotification, GatewayConnection, MerchantOrderStatusResponse, SmartPayGateway } from '../providers/types';
import { logIncomingPaymentAction, SMARTPAY_PROVIDER_NAME } from '../utils/status-logger';
import { buildCallbackUrl, RelayOutcome, StatusCallback } from './status-relay';

const notificationSchema = z.object({
  authentication: z.string().min(1),
  expiry: z.string(),
  eventName: z.string().min(1),
  poiId: z.number().int(),
  signature: z.string().min(1)
});

export type PollOutcome =
  | 'Completed'
  | 'UndecodableNotification'
  | 'InvalidNotificationSignature'
  | 'InvalidBatchSignature'
  | 'RetrievalFailed'
  | 'BatchLimitReached';

export interface PollSummary {
  outcome: PollOutcome;
  /** Result pages fetched */
  batches: number;
  relayed: number;
  failedRelays: number;
  inProgress: number;
}

export interface StatusRelayer {
  relayBatch(callbacks: readonly StatusCallback[]): Promise<RelayOutcome[]>;
}

export interface NotificationPollContext {
  gateway: SmartPayGateway;
  connection: GatewayConnection;
  relay: StatusRelayer;
  /** Records IN_PROGRESS results, which are not relayed */
  statusLog: IPaymentStatusLogService;
  webhookUrl: string;
  /** Upper bound on pages fetched for one notification */
  maxBatches: number;
}

/**
 * Decode a webhook body; null when it is not a notification
 */
export function decodeNotification(body: string | null): ApiNotification | null {
  if (!body) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    console.warn('⚠️  SmartPay notification body is not valid JSON:', error instanceof Error ? error.message : error);
    return null;
  }

  const parsed = notificationSchema.safeParse(json);
  if (!parsed.success) {
    console.warn('⚠️  SmartPay notification body has an unexpected shape:', parsed.error.issues);
    return null;
  }

  return parsed.data;
}

export async function pollNotification(
  notification: ApiNotification,
  context: NotificationPollContext
): Promise<PollSummary> {
  const summary: PollSummary = {
    outcome: 'Completed',
    batches: 0,
    relayed: 0,
    failedRelays: 0,
    inProgress: 0
  };

  const { signingKey } = context.connection.credentials;

  if (!isValidNotificationSignature(notification, signingKey)) {
    console.warn(`⚠️  Illegal signature on SmartPay notification '${notification.eventName}'; ignoring`);
    return { ...summary, outcome: 'InvalidNotificationSignature' };
  }

  let moreOrderResultsAvailable = true;

  while (moreOrderResultsAvailable) {
    if (summary.batches >= context.maxBatches) {
      console.warn(`⚠️  Stopped polling '${notification.eventName}' after ${summary.batches} batches`);
      return { ...summary, outcome: 'BatchLimitReached' };
    }

    let response: MerchantOrderStatusResponse;
    try {
      response = await context.gateway.retrieveOrderStatuses(notification, context.connection);
    } catch (error) {
      console.error(`❌ Failed to retrieve SmartPay order results for '${notification.eventName}':`, error);
      return { ...summary, outcome: 'RetrievalFailed' };
    }
    summary.batches++;

    if (!isValidStatusResponseSignature(response, signingKey)) {
      console.warn(`⚠️  Illegal signature on SmartPay order results batch ${summary.batches}; stopping`);
      return { ...summary, outcome: 'InvalidBatchSignature' };
    }

    const callbacks: StatusCallback[] = [];

    for (const result of response.orderResults) {
      if (result.orderStatus === 'IN_PROGRESS') {
        console.log(`⏳ Order ${result.merchantOrderId} is still in progress`);
        await logIncomingPaymentAction(context.statusLog, SMARTPAY_PROVIDER_NAME, result.merchantOrderId, result.orderStatus);
        summary.inProgress++;
        continue;
      }

      const signature = signPaymentCompleted(result.merchantOrderId, result.orderStatus, signingKey);
      callbacks.push({
        orderId: result.merchantOrderId,
        status: result.orderStatus,
        url: buildCallbackUrl(context.webhookUrl, result.merchantOrderId, result.orderStatus, signature)
      });
    }

    const outcomes = await context.relay.relayBatch(callbacks);
    for (const outcome of outcomes) {
      if (outcome.delivered) {
        summary.relayed++;
      } else {
        summary.failedRelays++;
      }
    }

    moreOrderResultsAvailable = response.moreOrderResultsAvailable;
  }

  console.log('✅ SmartPay notification processed:', summary);
  return summary;
}
