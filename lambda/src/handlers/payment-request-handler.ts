/**
 * Payment Request Handler
 *
 * Handles the /checkout/smartpay/payment-request endpoint.
 * Builds a SmartPay merchant order from priced baskets and customer details
 * and announces it, returning where the customer must be redirected.
 *
 * Response scenarios:
 * - 201 Created: Order announced (actionData is the SmartPay payment page)
 * - 422 Unprocessable Entity: Order could not be mapped or announced (actionData is the fail URL)
 * - 400 Bad Request: Request body does not match the expected shape
 */

import { z } from 'zod';
import { getDeploymentEnvironment, getPaymentMethodSettings } from '../config';
import type { HandlerDependencies } from '../dependencies';
import { buildMerchantOrder } from '../mapping/order-mapper';
import { failedPaymentRequest, PaymentRequestResult, submitMerchantOrder } from '../services/order-submitter';
import { resolveGatewayEnvironment } from '../utils/credentials-loader';
import type { HandlerResult } from './handler-result';

const basketLineSchema = z.object({
  connectedItemId: z.string().min(1),
  title: z.string().optional(),
  description: z.string().optional(),
  quantity: z.number().int().positive(),
  price: z.number()
});

const paymentRequestBodySchema = z.object({
  invoiceNumber: z.string().min(1),
  baskets: z.array(z.object({
    id: z.string().min(1),
    totalPriceInVat: z.number(),
    lines: z.array(basketLineSchema)
  })).min(1),
  customer: z.record(z.string(), z.string()),
  /** Overrides the configured payment method */
  paymentMethod: z.string().min(1).optional()
});

export type PaymentRequestBody = z.infer<typeof paymentRequestBodySchema>;

export async function handlePaymentRequest(
  body: unknown,
  dependencies: HandlerDependencies
): Promise<HandlerResult> {
  console.log('🔄 Processing SmartPay payment request');

  const parsed = paymentRequestBodySchema.safeParse(body);
  if (!parsed.success) {
    console.warn('⚠️  Invalid payment request body:', parsed.error.issues);
    return {
      statusCode: 400,
      body: JSON.stringify({
        error: 'invalid_request',
        message: 'Request body does not match the payment request schema',
        details: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        timestamp: new Date().toISOString()
      })
    };
  }

  const request = parsed.data;
  const settings = getPaymentMethodSettings();
  const environment = getDeploymentEnvironment();

  console.log('Invoice number:', request.invoiceNumber);
  console.log('Baskets:', request.baskets.length);

  const credentials = await dependencies.loadCredentials(settings.settingsId, environment);
  if (!credentials) {
    console.error(`❌ No SmartPay credentials available for settings '${settings.settingsId}'`);
    return toHandlerResult(failedPaymentRequest(settings.failUrl, 'SmartPay credentials are not configured'));
  }

  const mapping = buildMerchantOrder({
    baskets: request.baskets,
    customer: request.customer,
    returnUrl: settings.returnUrl,
    invoiceNumber: request.invoiceNumber,
    paymentMethod: request.paymentMethod ?? settings.externalName
  });

  if (!mapping.ok) {
    console.log(`❌ Order ${request.invoiceNumber} cannot be sent to SmartPay (${mapping.error.kind}): ${mapping.error.message}`);
    return toHandlerResult(failedPaymentRequest(settings.failUrl, mapping.error.message));
  }

  const result = await submitMerchantOrder(
    mapping.order,
    { environment: resolveGatewayEnvironment(environment), credentials },
    dependencies.gateway,
    settings
  );

  if (result.successful) {
    console.log(`✅ Order ${request.invoiceNumber} announced; redirecting to SmartPay`);
  }

  return toHandlerResult(result);
}

function toHandlerResult(result: PaymentRequestResult): HandlerResult {
  return {
    statusCode: result.successful ? 201 : 422,
    body: JSON.stringify(result)
  };
}
