import {
  AppendStatusRequest,
  IPaymentStatusLogService,
  PaymentStatusEntry,
  assertValidAppendRequest,
  generateEntryId
} from '../../core/index.js';

export interface MockPaymentStatusLogServiceOptions {
  /** Make every write fail with the given error (for testing best-effort callers) */
  failWith?: Error;
}

/**
 * Mock payment status log for testing
 *
 * WARNING: Not for production use
 * - No durability (data lost on restart)
 * - Single-process only
 */
export class MockPaymentStatusLogService implements IPaymentStatusLogService {
  private entries: PaymentStatusEntry[] = [];
  private readonly failWith?: Error;

  constructor(options?: MockPaymentStatusLogServiceOptions) {
    this.failWith = options?.failWith;
  }

  async appendStatus(request: AppendStatusRequest): Promise<PaymentStatusEntry> {
    assertValidAppendRequest(request);

    if (this.failWith) {
      throw this.failWith;
    }

    const loggedAt = new Date().toISOString();
    const entry: PaymentStatusEntry = {
      id: generateEntryId(loggedAt),
      provider: request.provider,
      orderId: request.orderId,
      status: request.status,
      statusCode: request.statusCode,
      loggedAt
    };

    this.entries.push(entry);
    return entry;
  }

  async getStatusHistory(orderId: string): Promise<PaymentStatusEntry[]> {
    return this.entries.filter(entry => entry.orderId === orderId);
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === undefined;
  }

  /**
   * Get all entries regardless of order (for testing)
   */
  getAllEntries(): PaymentStatusEntry[] {
    return [...this.entries];
  }

  /**
   * Clear all entries (for testing)
   */
  clear(): void {
    this.entries = [];
  }
}
