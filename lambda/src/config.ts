/**
 * SmartPay adapter configuration
 *
 * Read from environment variables on every call; nothing is cached so that a
 * request never sees settings from another invocation.
 *
 * Environment Variables:
 * - DEPLOYMENT_ENVIRONMENT: development | test | acceptance | live (default: development)
 * - SMARTPAY_SETTINGS_ID: Key of this PSP's entry in the credentials secret
 * - SMARTPAY_PAYMENT_METHOD: Default payment method external name (e.g. 'ideal')
 * - SMARTPAY_SUCCESS_URL / SMARTPAY_FAIL_URL: Required redirect targets (all URLs must be absolute)
 * - SMARTPAY_PENDING_URL: Redirect for IN_PROGRESS returns (falls back to success URL)
 * - SMARTPAY_WEBHOOK_URL: Store endpoint verified statuses are relayed to
 * - SMARTPAY_RETURN_URL: Where SmartPay sends the customer back (default: success URL)
 * - RELAY_CONCURRENCY: Maximum simultaneous relay calls (default: 4)
 * - RELAY_TIMEOUT_MS: Per relay call timeout (default: 5000)
 * - MAX_NOTIFICATION_BATCHES: Upper bound on result pages per notification (default: 100)
 */

import { z } from 'zod';

export type DeploymentEnvironment = 'development' | 'test' | 'acceptance' | 'live';

const DEPLOYMENT_ENVIRONMENTS: readonly DeploymentEnvironment[] = ['development', 'test', 'acceptance', 'live'];

export interface PaymentMethodSettings {
  /** Key of the PSP entry in the credentials secret */
  settingsId: string;
  /** Payment method name as configured in the store, mapped to a SmartPay brand */
  externalName: string;
  successUrl: string;
  failUrl: string;
  pendingUrl?: string;
  webhookUrl: string;
  returnUrl: string;
}

export interface RelaySettings {
  concurrency: number;
  timeoutMs: number;
}

const absoluteUrlSchema = z.string().url();

export function getDeploymentEnvironment(): DeploymentEnvironment {
  const value = (process.env.DEPLOYMENT_ENVIRONMENT || 'development').toLowerCase();
  const environment = DEPLOYMENT_ENVIRONMENTS.find(candidate => candidate === value);

  if (!environment) {
    throw new Error(
      `Invalid DEPLOYMENT_ENVIRONMENT '${value}'. Expected one of: ${DEPLOYMENT_ENVIRONMENTS.join(', ')}`
    );
  }

  return environment;
}

export function getPaymentMethodSettings(): PaymentMethodSettings {
  const errors: string[] = [];

  const settingsId = process.env.SMARTPAY_SETTINGS_ID || '';
  const successUrl = process.env.SMARTPAY_SUCCESS_URL || '';
  const failUrl = process.env.SMARTPAY_FAIL_URL || '';
  const webhookUrl = process.env.SMARTPAY_WEBHOOK_URL || '';

  if (!settingsId) errors.push('SMARTPAY_SETTINGS_ID is required');
  if (!successUrl) errors.push('SMARTPAY_SUCCESS_URL is required');
  if (!failUrl) errors.push('SMARTPAY_FAIL_URL is required');
  if (!webhookUrl) errors.push('SMARTPAY_WEBHOOK_URL is required');

  const pendingUrl = process.env.SMARTPAY_PENDING_URL || undefined;
  const returnUrl = process.env.SMARTPAY_RETURN_URL || successUrl;

  const urls: ReadonlyArray<[string, string | undefined]> = [
    ['SMARTPAY_SUCCESS_URL', successUrl],
    ['SMARTPAY_FAIL_URL', failUrl],
    ['SMARTPAY_PENDING_URL', pendingUrl],
    ['SMARTPAY_WEBHOOK_URL', webhookUrl],
    ['SMARTPAY_RETURN_URL', returnUrl]
  ];
  for (const [name, value] of urls) {
    if (value && !absoluteUrlSchema.safeParse(value).success) {
      errors.push(`${name} must be an absolute URL, got '${value}'`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }

  return {
    settingsId,
    externalName: process.env.SMARTPAY_PAYMENT_METHOD || 'ideal',
    successUrl,
    failUrl,
    pendingUrl,
    webhookUrl,
    returnUrl
  };
}

export function getRelaySettings(): RelaySettings {
  return {
    concurrency: readPositiveInteger('RELAY_CONCURRENCY', 4),
    timeoutMs: readPositiveInteger('RELAY_TIMEOUT_MS', 5000)
  };
}

export function getMaxNotificationBatches(): number {
  return readPositiveInteger('MAX_NOTIFICATION_BATCHES', 100);
}

function readPositiveInteger(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }

  return value;
}
