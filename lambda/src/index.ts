/**
 * SmartPay PSP Adapter Lambda Handler
 *
 * Main entry point for AWS Lambda function handling SmartPay checkout requests.
 * Routes requests to specialized handlers for each step of the payment flow.
 *
 * Endpoints:
 * - POST /checkout/smartpay/payment-request - Announce order, returns redirect to SmartPay
 * - GET  /checkout/smartpay/return - Customer returns from SmartPay (302 redirect)
 * - POST /checkout/smartpay/notification - SmartPay webhook (always 202)
 * - GET  /checkout/smartpay/status-update - Relay target for verified order statuses
 *
 * Environment Variables:
 * - USE_REAL_PAYMENT_PROVIDER: 'true' for the SmartPay API, 'false' for mock
 * - PAYMENT_CREDENTIALS_SECRET: AWS Secrets Manager secret name
 * - DEPLOYMENT_ENVIRONMENT, SMARTPAY_*: see config.ts
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { getDefaultDependencies, HandlerDependencies } from './dependencies';
import type { HandlerResult } from './handlers/handler-result';
import { handleNotification } from './handlers/notification-handler';
import { handlePaymentRequest } from './handlers/payment-request-handler';
import { handleReturn } from './handlers/return-handler';
import { handleStatusUpdate } from './handlers/status-update-handler';

const ALLOWED_METHODS = 'OPTIONS,GET,POST';
const ALLOWED_HEADERS = 'Content-Type,Authorization';

/**
 * Create the Lambda handler
 *
 * Dependencies are resolved on the first request and reused while the
 * container stays warm.
 */
export function createHandler(
  resolveDependencies: () => HandlerDependencies = getDefaultDependencies
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  let dependencies: HandlerDependencies | null = null;

  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    console.log('🚀 SmartPay adapter Lambda invoked:', {
      method: event.httpMethod,
      path: event.path,
      resource: event.resource,
      requestId: event.requestContext.requestId
    });

    const path = event.path;
    const method = event.httpMethod;

    try {
      // Handle OPTIONS for CORS preflight
      if (method === 'OPTIONS') {
        return handleOptions();
      }

      if (!dependencies) {
        dependencies = resolveDependencies();
      }
      const deps = dependencies;

      if (method === 'POST' && path.endsWith('/smartpay/payment-request')) {
        let body: unknown = {};
        if (event.body) {
          try {
            body = JSON.parse(event.body);
          } catch (parseError) {
            console.error('❌ Failed to parse request body:', parseError);
            return withCors({
              statusCode: 400,
              body: JSON.stringify({
                error: 'invalid_request',
                message: 'Request body must be valid JSON',
                timestamp: new Date().toISOString()
              })
            });
          }
        }

        return withCors(await handlePaymentRequest(body, deps));
      }

      if (method === 'GET' && path.endsWith('/smartpay/return')) {
        return withCors(await handleReturn(event.queryStringParameters, deps));
      }

      if (method === 'POST' && path.endsWith('/smartpay/notification')) {
        // The webhook body is decoded by the poller itself
        return withCors(await handleNotification(event.body, deps));
      }

      if (method === 'GET' && path.endsWith('/smartpay/status-update')) {
        return withCors(await handleStatusUpdate(event.queryStringParameters, deps));
      }

      // Unknown endpoint
      console.log('❌ Endpoint not found:', { method, path });
      return withCors({
        statusCode: 404,
        body: JSON.stringify({
          error: 'not_found',
          message: `Endpoint not found: ${method} ${path}`,
          timestamp: new Date().toISOString()
        })
      });

    } catch (error) {
      console.error('❌ Lambda handler error:', error);

      return withCors({
        statusCode: 500,
        body: JSON.stringify({
          error: 'internal_error',
          message: error instanceof Error ? error.message : 'Internal server error',
          timestamp: new Date().toISOString()
        })
      });
    }
  };
}

/**
 * Main Lambda handler
 */
export const handler = createHandler();

/**
 * Handle OPTIONS requests for CORS preflight
 */
function handleOptions(): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: getCorsHeaders(),
    body: ''
  };
}

function withCors(result: HandlerResult): APIGatewayProxyResult {
  return {
    statusCode: result.statusCode,
    headers: { ...getCorsHeaders(), ...result.headers },
    body: result.body
  };
}

/**
 * Get CORS headers for responses
 */
function getCorsHeaders(): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': ALLOWED_METHODS,
    'Access-Control-Allow-Headers': ALLOWED_HEADERS,
    'Strict-Transport-Security': 'max-age=63072000; includeSubdomains'
  };
}
