/**
 * Outbound Order Submitter
 *
 * Announces a merchant order to SmartPay exactly once and turns the outcome
 * into a redirect for the storefront. There is no automatic retry; a new
 * attempt needs a new invoice number.
 */

import type { PaymentMethodSettings } from '../config';
import { GatewayAuthenticationError } from '../errors';
import type { GatewayConnection, MerchantOrder, SmartPayGateway } from '../providers/types';

export interface PaymentRequestResult {
  successful: boolean;
  action: 'Redirect';
  /** Where the customer is sent next */
  actionData: string;
  errorMessage?: string;
}

export const AUTHENTICATION_FAILED_MESSAGE = 'Failed to authenticate with the SmartPay API';

export function failedPaymentRequest(failUrl: string, errorMessage: string): PaymentRequestResult {
  return {
    successful: false,
    action: 'Redirect',
    actionData: failUrl,
    errorMessage
  };
}

export async function submitMerchantOrder(
  order: MerchantOrder,
  connection: GatewayConnection,
  gateway: SmartPayGateway,
  settings: Pick<PaymentMethodSettings, 'failUrl'>
): Promise<PaymentRequestResult> {
  try {
    const announced = await gateway.announce(order, connection);

    return {
      successful: true,
      action: 'Redirect',
      actionData: announced.redirectUrl
    };
  } catch (error) {
    if (error instanceof GatewayAuthenticationError) {
      console.error(`❌ SmartPay authentication failed for order ${order.merchantOrderId}:`, error.message);
      return failedPaymentRequest(settings.failUrl, AUTHENTICATION_FAILED_MESSAGE);
    }
    throw error;
  }
}
