/**
 * Payment service provider that reported a status
 */
export type PaymentServiceProviderName = 'SmartPay' | (string & {});

/**
 * A single observed payment status
 *
 * Entries are append-only. A status transition for an order is never updated
 * in place; a new entry is written for every status the provider reports.
 */
export interface PaymentStatusEntry {
  /** Unique entry identifier (sortable by time of logging) */
  readonly id: string;

  /** Provider that reported the status */
  readonly provider: PaymentServiceProviderName;

  /** Merchant order ID (the invoice number sent to the provider) */
  readonly orderId: string;

  /** Raw status as reported by the provider, e.g. "COMPLETED" */
  readonly status: string;

  /** Numeric status code used for reporting */
  readonly statusCode: number;

  /** Timestamp the entry was written (ISO 8601 UTC) */
  readonly loggedAt: string;
}

/**
 * Parameters for appending a status entry
 *
 * @example
 * ```typescript
 * {
 *   provider: "SmartPay",
 *   orderId: "INV-1001",
 *   status: "COMPLETED",
 *   statusCode: 2
 * }
 * ```
 */
export interface AppendStatusRequest {
  readonly provider: PaymentServiceProviderName;
  readonly orderId: string;
  readonly status: string;
  readonly statusCode: number;
}
