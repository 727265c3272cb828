/**
 * Best-effort payment status logging
 *
 * A status that cannot be written is reported and dropped; it never changes
 * the outcome of the request that observed it.
 */

import type { IPaymentStatusLogService, PaymentStatusEntry } from '@psp-adapter/payment-status-log';

export const SMARTPAY_PROVIDER_NAME = 'SmartPay';

export const PAYMENT_STATUS_CODES: Readonly<Record<string, number>> = {
  IN_PROGRESS: 1,
  COMPLETED: 2,
  CANCELLED: 3,
  EXPIRED: 4
};

/**
 * Numeric code for a status; 0 when the status is unknown
 */
export function toStatusCode(status: string): number {
  return PAYMENT_STATUS_CODES[status] ?? 0;
}

export async function logIncomingPaymentAction(
  statusLog: IPaymentStatusLogService,
  provider: string,
  orderId: string,
  status: string
): Promise<PaymentStatusEntry | null> {
  try {
    const entry = await statusLog.appendStatus({
      provider,
      orderId,
      status,
      statusCode: toStatusCode(status)
    });
    console.log(`📝 Logged ${provider} status ${status} for order ${orderId}`);
    return entry;
  } catch (error) {
    console.error(`❌ Failed to log ${provider} status ${status} for order ${orderId}:`, error);
    return null;
  }
}
