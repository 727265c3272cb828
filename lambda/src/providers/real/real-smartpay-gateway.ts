/**
 * Real SmartPay Gateway - SmartPay REST API integration
 *
 * Every call starts by exchanging the refresh token for a short-lived access
 * token; access tokens are not kept between calls so that credentials stay
 * scoped to the request that loaded them.
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { GatewayAuthenticationError } from '../../errors';
import {
  AnnounceResult,
  ApiNotification,
  GatewayConnection,
  MerchantOrder,
  MerchantOrderStatusResponse,
  SmartPayEnvironment,
  SmartPayGateway
} from '../types';

export const SMARTPAY_BASE_URLS: Readonly<Record<SmartPayEnvironment, string>> = {
  sandbox: 'https://betalen.rabobank.nl/omnikassa-api-sandbox/',
  production: 'https://betalen.rabobank.nl/omnikassa-api/'
};

const accessTokenSchema = z.object({
  token: z.string().min(1),
  validUntil: z.string(),
  durationInMillis: z.number()
});

const announceResponseSchema = z.object({
  redirectUrl: z.string().url(),
  omnikassaOrderId: z.string()
});

const resultAmountSchema = z.object({
  currency: z.string(),
  amount: z.number()
});

const orderStatusResponseSchema = z.object({
  moreOrderResultsAvailable: z.boolean(),
  orderResults: z.array(z.object({
    merchantOrderId: z.string(),
    omnikassaOrderId: z.string(),
    poiId: z.number(),
    orderStatus: z.string(),
    orderStatusDateTime: z.string(),
    errorCode: z.string().default(''),
    paidAmount: resultAmountSchema,
    totalAmount: resultAmountSchema
  })),
  signature: z.string()
});

export interface RealSmartPayGatewayOptions {
  /** Preconfigured HTTP client (for testing) */
  httpClient?: AxiosInstance;
  /** Override the SmartPay base URLs (trailing slash required) */
  baseUrls?: Readonly<Record<SmartPayEnvironment, string>>;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

export class RealSmartPayGateway implements SmartPayGateway {
  private readonly client: AxiosInstance;
  private readonly baseUrls: Readonly<Record<SmartPayEnvironment, string>>;

  constructor(options: RealSmartPayGatewayOptions = {}) {
    this.baseUrls = options.baseUrls ?? SMARTPAY_BASE_URLS;
    this.client = options.httpClient ?? axios.create({
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json'
      }
    });
  }

  async announce(order: MerchantOrder, connection: GatewayConnection): Promise<AnnounceResult> {
    console.log(`🔄 Announcing SmartPay order ${order.merchantOrderId} (${connection.environment})`);

    const accessToken = await this.retrieveAccessToken(connection);

    try {
      const response = await this.client.post<unknown>(
        `${this.baseUrls[connection.environment]}order/server/api/v2/order`,
        { ...order, timestamp: new Date().toISOString() },
        { headers: { Authorization: `Bearer ${accessToken}` } }
      );

      const result = announceResponseSchema.parse(response.data);
      console.log(`✅ SmartPay order announced: ${result.omnikassaOrderId}`);
      return result;
    } catch (error) {
      throw this.translateError(error, 'announce order');
    }
  }

  async retrieveOrderStatuses(notification: ApiNotification, connection: GatewayConnection): Promise<MerchantOrderStatusResponse> {
    console.log(`🔄 Retrieving SmartPay order results for event '${notification.eventName}'`);

    try {
      // The notification's own token authorises this call; no access token is needed
      const response = await this.client.get<unknown>(
        `${this.baseUrls[connection.environment]}order/server/api/v2/events/results/${encodeURIComponent(notification.eventName)}`,
        { headers: { Authorization: `Bearer ${notification.authentication}` } }
      );

      return orderStatusResponseSchema.parse(response.data);
    } catch (error) {
      throw this.translateError(error, 'retrieve order results');
    }
  }

  private async retrieveAccessToken(connection: GatewayConnection): Promise<string> {
    try {
      const response = await this.client.get<unknown>(
        `${this.baseUrls[connection.environment]}gatekeeper/refresh`,
        { headers: { Authorization: `Bearer ${connection.credentials.refreshToken}` } }
      );

      return accessTokenSchema.parse(response.data).token;
    } catch (error) {
      throw this.translateError(error, 'refresh access token');
    }
  }

  private translateError(error: unknown, operation: string): Error {
    if (error instanceof GatewayAuthenticationError) {
      return error;
    }

    if (error instanceof AxiosError) {
      const status = error.response?.status;

      if (status === 401 || status === 403) {
        console.error(`❌ SmartPay rejected credentials during ${operation} (HTTP ${status})`);
        return new GatewayAuthenticationError(`SmartPay authentication failed during ${operation}`, error);
      }

      console.error(`❌ SmartPay request failed during ${operation}:`, {
        status,
        code: error.code,
        message: error.message
      });
      return new Error(`SmartPay request failed during ${operation}: ${error.message}`);
    }

    if (error instanceof z.ZodError) {
      console.error(`❌ Unexpected SmartPay response during ${operation}:`, error.issues);
      return new Error(`Unexpected SmartPay response during ${operation}`);
    }

    return error instanceof Error ? error : new Error(String(error));
  }
}
