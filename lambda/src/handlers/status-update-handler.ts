/**
 * Status Update Handler
 *
 * Handles the /checkout/smartpay/status-update endpoint that the
 * notification relay calls with a signed (order_id, status) tuple. Verified
 * statuses are appended to the payment status log.
 */

import { getDeploymentEnvironment, getPaymentMethodSettings } from '../config';
import { loadCredentialsOrNull, HandlerDependencies } from '../dependencies';
import { SignatureError, UnavailableContextError } from '../errors';
import {
  assertAuthenticPaymentCompletedResponse,
  getInvoiceNumberFromRequest,
  QueryParameters,
  requirePaymentCompletedResponse
} from '../signing/payment-completed-response';
import { logIncomingPaymentAction, SMARTPAY_PROVIDER_NAME } from '../utils/status-logger';
import type { HandlerResult } from './handler-result';

export interface StatusUpdateResult {
  successful: boolean;
  /** Why the update was not successful */
  status?: string;
}

export const STATUS_UPDATE_MESSAGES = {
  requestNotAvailable: 'Request not available; unable to process status update.',
  illegalSignature: 'Illegal signature received; unable to process status update.',
  cancelled: 'User cancelled the order at the PSP.',
  expired: 'The order expired at the PSP.',
  unknownStatus: 'Unknown status; unable to process status update.'
} as const;

export async function processStatusUpdate(
  query: QueryParameters,
  dependencies: HandlerDependencies
): Promise<StatusUpdateResult> {
  try {
    const response = requirePaymentCompletedResponse(query);

    const settings = getPaymentMethodSettings();
    // Without a signing key nothing can be verified
    const credentials = await loadCredentialsOrNull(dependencies, settings.settingsId, getDeploymentEnvironment());
    assertAuthenticPaymentCompletedResponse(response, credentials?.signingKey ?? null);

    await logIncomingPaymentAction(dependencies.statusLog, SMARTPAY_PROVIDER_NAME, response.orderId, response.status);

    switch (response.status) {
      case 'COMPLETED':
        return { successful: true };
      case 'CANCELLED':
        return { successful: false, status: STATUS_UPDATE_MESSAGES.cancelled };
      case 'EXPIRED':
        return { successful: false, status: STATUS_UPDATE_MESSAGES.expired };
      default:
        return { successful: false, status: STATUS_UPDATE_MESSAGES.unknownStatus };
    }
  } catch (error) {
    if (error instanceof UnavailableContextError) {
      console.warn(`⚠️  Status update rejected: ${error.message}`);
      return { successful: false, status: STATUS_UPDATE_MESSAGES.requestNotAvailable };
    }
    if (error instanceof SignatureError) {
      console.warn(`⚠️  Status update rejected: ${error.message}`);
      return { successful: false, status: STATUS_UPDATE_MESSAGES.illegalSignature };
    }
    throw error;
  }
}

export async function handleStatusUpdate(
  query: QueryParameters,
  dependencies: HandlerDependencies
): Promise<HandlerResult> {
  const result = await processStatusUpdate(query, dependencies);
  console.log(`📬 Status update for order ${getInvoiceNumberFromRequest(query) ?? '(unknown)'}:`, result);

  return {
    statusCode: 200,
    body: JSON.stringify(result)
  };
}
