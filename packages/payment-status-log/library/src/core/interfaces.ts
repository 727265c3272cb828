import { AppendStatusRequest, PaymentStatusEntry } from './types.js';

/**
 * Payment status log storage service
 *
 * Implementations must:
 * - Never modify or delete an entry once written
 * - Support concurrent writers for the same order
 * - Return history in the order entries were written
 */
export interface IPaymentStatusLogService {
  /**
   * Append a status entry
   *
   * @param request - Provider, order and status to record
   * @returns The written entry with generated ID and timestamp
   * @throws {StorageServiceError} If the write fails
   *
   * @example
   * const entry = await service.appendStatus({
   *   provider: 'SmartPay',
   *   orderId: 'INV-1001',
   *   status: 'COMPLETED',
   *   statusCode: 2
   * });
   */
  appendStatus(request: AppendStatusRequest): Promise<PaymentStatusEntry>;

  /**
   * Retrieve all entries for an order, oldest first
   *
   * @param orderId - Merchant order ID
   * @returns Entries for the order; empty when none were logged
   * @throws {StorageServiceError} If retrieval fails
   */
  getStatusHistory(orderId: string): Promise<PaymentStatusEntry[]>;

  /**
   * Health check for the storage provider
   *
   * @returns true if service is operational
   */
  healthCheck(): Promise<boolean>;
}
