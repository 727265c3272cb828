/**
 * The signed (order_id, status) tuple SmartPay appends to the customer's
 * return URL, and that the notification relay appends to status callbacks
 */

import { SignatureError, UnavailableContextError } from '../errors';
import { isValidPaymentCompletedSignature } from './signature';

export type QueryParameters = Readonly<Record<string, string | undefined>> | null | undefined;

export interface PaymentCompletedResponse {
  /** Invoice number the order was announced with */
  orderId: string;
  status: string;
  signature: string;
}

/**
 * Read the tuple from query parameters; null when any part is missing
 */
export function readPaymentCompletedResponse(query: QueryParameters): PaymentCompletedResponse | null {
  const orderId = query?.order_id;
  const status = query?.status;
  const signature = query?.signature;

  if (!orderId || !status || !signature) {
    return null;
  }

  return { orderId, status, signature };
}

/**
 * Read the tuple from query parameters
 *
 * @throws {UnavailableContextError} If order_id, status or signature is missing
 */
export function requirePaymentCompletedResponse(query: QueryParameters): PaymentCompletedResponse {
  const response = readPaymentCompletedResponse(query);
  if (!response) {
    throw new UnavailableContextError('order_id, status and signature query parameters');
  }
  return response;
}

export function isAuthenticPaymentCompletedResponse(response: PaymentCompletedResponse, signingKey: string): boolean {
  return isValidPaymentCompletedSignature(response.orderId, response.status, response.signature, signingKey);
}

/**
 * @throws {SignatureError} If there is no signing key or the signature does not verify
 */
export function assertAuthenticPaymentCompletedResponse(
  response: PaymentCompletedResponse,
  signingKey: string | null
): void {
  if (!signingKey || !isAuthenticPaymentCompletedResponse(response, signingKey)) {
    throw new SignatureError(`payment status for order ${response.orderId}`);
  }
}

/**
 * Invoice number a status callback refers to
 */
export function getInvoiceNumberFromRequest(query: QueryParameters): string | null {
  return query?.order_id || null;
}
