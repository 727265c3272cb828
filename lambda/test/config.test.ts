import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  getDeploymentEnvironment,
  getMaxNotificationBatches,
  getPaymentMethodSettings,
  getRelaySettings
} from '../src/config';
import { mapWithConcurrency } from '../src/utils/concurrency';

describe('getDeploymentEnvironment', () => {
  it('should default to development', () => {
    vi.stubEnv('DEPLOYMENT_ENVIRONMENT', '');

    expect(getDeploymentEnvironment()).toBe('development');
  });

  it('should accept any case', () => {
    vi.stubEnv('DEPLOYMENT_ENVIRONMENT', 'Live');

    expect(getDeploymentEnvironment()).toBe('live');
  });

  it('should reject unknown environments', () => {
    vi.stubEnv('DEPLOYMENT_ENVIRONMENT', 'staging');

    expect(() => getDeploymentEnvironment()).toThrow(
      "Invalid DEPLOYMENT_ENVIRONMENT 'staging'. Expected one of: development, test, acceptance, live"
    );
  });
});

describe('getPaymentMethodSettings', () => {
  beforeEach(() => {
    vi.stubEnv('SMARTPAY_SETTINGS_ID', 'smartpay-main');
    vi.stubEnv('SMARTPAY_PAYMENT_METHOD', '');
    vi.stubEnv('SMARTPAY_SUCCESS_URL', 'https://shop.example.test/success');
    vi.stubEnv('SMARTPAY_FAIL_URL', 'https://shop.example.test/fail');
    vi.stubEnv('SMARTPAY_PENDING_URL', '');
    vi.stubEnv('SMARTPAY_WEBHOOK_URL', 'https://shop.example.test/status');
    vi.stubEnv('SMARTPAY_RETURN_URL', '');
  });

  it('should apply defaults', () => {
    expect(getPaymentMethodSettings()).toEqual({
      settingsId: 'smartpay-main',
      externalName: 'ideal',
      successUrl: 'https://shop.example.test/success',
      failUrl: 'https://shop.example.test/fail',
      pendingUrl: undefined,
      webhookUrl: 'https://shop.example.test/status',
      returnUrl: 'https://shop.example.test/success'
    });
  });

  it('should list every missing variable', () => {
    vi.stubEnv('SMARTPAY_SETTINGS_ID', '');
    vi.stubEnv('SMARTPAY_WEBHOOK_URL', '');

    expect(() => getPaymentMethodSettings()).toThrow(
      'Configuration validation failed:\n  - SMARTPAY_SETTINGS_ID is required\n  - SMARTPAY_WEBHOOK_URL is required'
    );
  });

  it('should reject relative and malformed URLs', () => {
    vi.stubEnv('SMARTPAY_WEBHOOK_URL', '/checkout/smartpay/status-update');
    vi.stubEnv('SMARTPAY_PENDING_URL', 'not a url');

    expect(() => getPaymentMethodSettings()).toThrow(
      'Configuration validation failed:\n' +
      "  - SMARTPAY_PENDING_URL must be an absolute URL, got 'not a url'\n" +
      "  - SMARTPAY_WEBHOOK_URL must be an absolute URL, got '/checkout/smartpay/status-update'"
    );
  });
});

describe('relay settings', () => {
  it('should default concurrency, timeout and batch limit', () => {
    vi.stubEnv('RELAY_CONCURRENCY', '');
    vi.stubEnv('RELAY_TIMEOUT_MS', '');
    vi.stubEnv('MAX_NOTIFICATION_BATCHES', '');

    expect(getRelaySettings()).toEqual({ concurrency: 4, timeoutMs: 5000 });
    expect(getMaxNotificationBatches()).toBe(100);
  });

  it('should reject values that are not positive integers', () => {
    vi.stubEnv('RELAY_CONCURRENCY', '0');

    expect(() => getRelaySettings()).toThrow("RELAY_CONCURRENCY must be a positive integer, got '0'");
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order and capture failures', async () => {
    const results = await mapWithConcurrency([3, 1, 2], 2, async (value) => {
      await new Promise(resolve => setTimeout(resolve, value));
      if (value === 1) {
        throw new Error('one');
      }
      return value * 10;
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 30 });
    expect(results[1].status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 20 });
  });

  it('should return an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
