/**
 * Return Handler
 *
 * Handles the /checkout/smartpay/return endpoint, where SmartPay sends the
 * customer back with a signed (order_id, status) tuple. The tuple only picks
 * the page the customer sees; order state is changed by the status update
 * endpoint, never here.
 */

import { getDeploymentEnvironment, getPaymentMethodSettings, PaymentMethodSettings } from '../config';
import { loadCredentialsOrNull, HandlerDependencies } from '../dependencies';
import { isPaymentStatus, PaymentStatus } from '../providers/types';
import {
  isAuthenticPaymentCompletedResponse,
  QueryParameters,
  readPaymentCompletedResponse
} from '../signing/payment-completed-response';
import type { HandlerResult } from './handler-result';

export type ReturnOutcome = PaymentStatus | 'Unknown' | 'Invalid';

/**
 * Classify a return; 'Invalid' when the tuple is missing or its signature does not verify
 */
export function classifyReturn(query: QueryParameters, signingKey: string | null): ReturnOutcome {
  const response = readPaymentCompletedResponse(query);

  if (!response || !signingKey || !isAuthenticPaymentCompletedResponse(response, signingKey)) {
    return 'Invalid';
  }

  return isPaymentStatus(response.status) ? response.status : 'Unknown';
}

export function resolveReturnRedirect(
  query: QueryParameters,
  settings: Pick<PaymentMethodSettings, 'successUrl' | 'failUrl' | 'pendingUrl'>,
  signingKey: string | null
): string {
  const outcome = classifyReturn(query, signingKey);

  switch (outcome) {
    case 'COMPLETED':
      return settings.successUrl;
    case 'IN_PROGRESS':
      return settings.pendingUrl || settings.successUrl;
    case 'CANCELLED':
    case 'EXPIRED':
    case 'Unknown':
    case 'Invalid':
      return settings.failUrl;
  }
}

export async function handleReturn(
  query: QueryParameters,
  dependencies: HandlerDependencies
): Promise<HandlerResult> {
  const settings = getPaymentMethodSettings();
  const credentials = await loadCredentialsOrNull(dependencies, settings.settingsId, getDeploymentEnvironment());

  if (!credentials) {
    console.error(`❌ No SmartPay credentials available for settings '${settings.settingsId}'; sending customer to fail URL`);
  }

  const location = resolveReturnRedirect(query, settings, credentials?.signingKey ?? null);
  console.log(`↩️  Customer returned from SmartPay for order ${query?.order_id ?? '(unknown)'} with status ${query?.status ?? '(none)'}; redirecting to ${location}`);

  return {
    statusCode: 302,
    headers: { Location: location },
    body: ''
  };
}
