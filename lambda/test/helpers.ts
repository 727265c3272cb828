import { vi } from 'vitest';
import { MockPaymentStatusLogService } from '@psp-adapter/payment-status-log/mock';
import type { HandlerDependencies } from '../src/dependencies';
import type { StatusRelayer } from '../src/notifications/notification-poller';
import type { RelayOutcome, StatusCallback } from '../src/notifications/status-relay';
import { MockSmartPayGateway } from '../src/providers/mock/mock-smartpay-gateway';
import type { SmartPayCredentials, SmartPayGateway } from '../src/providers/types';

export const signingKey = Buffer.from('test-signing-key').toString('base64');

export const testCredentials: SmartPayCredentials = {
  refreshToken: 'test-refresh-token',
  signingKey
};

/**
 * Relay that records callbacks instead of sending them
 */
export class RecordingRelay implements StatusRelayer {
  readonly batches: StatusCallback[][] = [];

  constructor(private readonly failOrderIds: readonly string[] = []) {}

  async relayBatch(callbacks: readonly StatusCallback[]): Promise<RelayOutcome[]> {
    this.batches.push([...callbacks]);
    return callbacks.map(({ orderId, status }) =>
      this.failOrderIds.includes(orderId)
        ? { orderId, status, delivered: false, error: 'timeout of 5000ms exceeded' }
        : { orderId, status, delivered: true, httpStatus: 200 }
    );
  }
}

export interface TestDependencyOptions {
  credentials?: SmartPayCredentials | null;
  gateway?: SmartPayGateway;
  relay?: RecordingRelay;
}

export function createTestDependencies(options: TestDependencyOptions = {}) {
  const statusLog = new MockPaymentStatusLogService();
  const relay = options.relay ?? new RecordingRelay();
  const gateway = options.gateway ?? new MockSmartPayGateway();
  const credentials = options.credentials === undefined ? testCredentials : options.credentials;
  const loadCredentials = vi.fn(async () => credentials);

  const dependencies: HandlerDependencies = {
    gateway,
    statusLog,
    loadCredentials,
    createRelay: () => relay
  };

  return { dependencies, statusLog, relay, gateway, loadCredentials };
}

export function stubSmartPayEnvironment(): void {
  vi.stubEnv('DEPLOYMENT_ENVIRONMENT', 'test');
  vi.stubEnv('SMARTPAY_SETTINGS_ID', 'smartpay-main');
  vi.stubEnv('SMARTPAY_PAYMENT_METHOD', 'ideal');
  vi.stubEnv('SMARTPAY_SUCCESS_URL', 'https://shop.example.test/success');
  vi.stubEnv('SMARTPAY_FAIL_URL', 'https://shop.example.test/fail');
  vi.stubEnv('SMARTPAY_PENDING_URL', 'https://shop.example.test/pending');
  vi.stubEnv('SMARTPAY_WEBHOOK_URL', 'https://shop.example.test/checkout/smartpay/status-update');
  vi.stubEnv('SMARTPAY_RETURN_URL', 'https://shop.example.test/checkout/smartpay/return');
  vi.stubEnv('MAX_NOTIFICATION_BATCHES', '');
}
