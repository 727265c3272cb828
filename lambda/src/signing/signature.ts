/**
 * SmartPay signatures
 *
 * Every signed SmartPay structure is authenticated with HMAC-SHA512 over its
 * fields joined by commas, keyed by the base64-decoded signing key and
 * rendered as lowercase hex. The same function signs outbound relay
 * callbacks and verifies inbound return, status and webhook data.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import type { ApiNotification, MerchantOrderStatusResponse } from '../providers/types';

export function calculateSignature(fields: readonly string[], signingKey: string): string {
  return createHmac('sha512', Buffer.from(signingKey, 'base64'))
    .update(fields.join(','))
    .digest('hex');
}

export function signaturesMatch(received: string, expected: string): boolean {
  const receivedBuffer = Buffer.from(received);
  const expectedBuffer = Buffer.from(expected);

  if (receivedBuffer.length !== expectedBuffer.length) {
    return false;
  }

  return timingSafeEqual(receivedBuffer, expectedBuffer);
}

/**
 * Fields of the (order_id, status) tuple sent on return and relayed to the status endpoint
 */
export function paymentCompletedSignatureFields(orderId: string, status: string): string[] {
  return [orderId, status];
}

export function notificationSignatureFields(notification: ApiNotification): string[] {
  return [
    notification.authentication,
    notification.expiry,
    notification.eventName,
    String(notification.poiId)
  ];
}

export function statusResponseSignatureFields(response: MerchantOrderStatusResponse): string[] {
  const fields = [String(response.moreOrderResultsAvailable)];

  for (const result of response.orderResults) {
    fields.push(
      result.merchantOrderId,
      result.omnikassaOrderId,
      String(result.poiId),
      result.orderStatus,
      result.orderStatusDateTime,
      result.errorCode,
      result.paidAmount.currency,
      String(result.paidAmount.amount),
      result.totalAmount.currency,
      String(result.totalAmount.amount)
    );
  }

  return fields;
}

export function signPaymentCompleted(orderId: string, status: string, signingKey: string): string {
  return calculateSignature(paymentCompletedSignatureFields(orderId, status), signingKey);
}

export function isValidPaymentCompletedSignature(
  orderId: string,
  status: string,
  signature: string,
  signingKey: string
): boolean {
  return signaturesMatch(signature, signPaymentCompleted(orderId, status, signingKey));
}

export function isValidNotificationSignature(notification: ApiNotification, signingKey: string): boolean {
  return signaturesMatch(
    notification.signature,
    calculateSignature(notificationSignatureFields(notification), signingKey)
  );
}

export function isValidStatusResponseSignature(response: MerchantOrderStatusResponse, signingKey: string): boolean {
  return signaturesMatch(
    response.signature,
    calculateSignature(statusResponseSignatureFields(response), signingKey)
  );
}
