/**
 * Status Relay
 *
 * Forwards verified order statuses to the store's status update endpoint as
 * signed GET callbacks. A batch is sent with bounded concurrency and every
 * call has its own timeout; the batch promise settles only once every call
 * has completed or failed.
 */

import axios, { AxiosInstance } from 'axios';
import type { RelaySettings } from '../config';
import { mapWithConcurrency } from '../utils/concurrency';

export interface StatusCallback {
  orderId: string;
  status: string;
  url: string;
}

export interface RelayOutcome {
  orderId: string;
  status: string;
  delivered: boolean;
  httpStatus?: number;
  error?: string;
}

/**
 * Append order_id, status and signature to the webhook URL
 */
export function buildCallbackUrl(webhookUrl: string, orderId: string, status: string, signature: string): string {
  const url = new URL(webhookUrl);
  url.searchParams.set('order_id', orderId);
  url.searchParams.set('status', status);
  url.searchParams.set('signature', signature);
  return url.toString();
}

export class StatusRelay {
  private readonly client: AxiosInstance;

  constructor(
    private readonly settings: RelaySettings,
    client?: AxiosInstance
  ) {
    this.client = client ?? axios.create();
  }

  async relayBatch(callbacks: readonly StatusCallback[]): Promise<RelayOutcome[]> {
    if (callbacks.length === 0) {
      return [];
    }

    console.log(`📤 Relaying ${callbacks.length} status update(s) (concurrency ${this.settings.concurrency})`);

    const settled = await mapWithConcurrency(callbacks, this.settings.concurrency, callback =>
      this.client.get<unknown>(callback.url, { timeout: this.settings.timeoutMs })
    );

    return settled.map((result, index): RelayOutcome => {
      const { orderId, status } = callbacks[index];

      if (result.status === 'fulfilled') {
        console.log(`✅ Relayed ${status} for order ${orderId} (HTTP ${result.value.status})`);
        return { orderId, status, delivered: true, httpStatus: result.value.status };
      }

      const reason: unknown = result.reason;
      const httpStatus = axios.isAxiosError(reason) ? reason.response?.status : undefined;
      const error = reason instanceof Error ? reason.message : String(reason);
      console.error(`❌ Failed to relay ${status} for order ${orderId}:`, { httpStatus, error });
      return { orderId, status, delivered: false, httpStatus, error };
    });
  }
}
