/**
 * Mock SmartPay Gateway - Simulated SmartPay API for testing
 *
 * Announced orders are queued with a simulated status. The queue is served
 * back in signed pages by retrieveOrderStatuses, so the notification flow can
 * be exercised end to end without the real API.
 *
 * Simulated scenarios:
 * - Order amounts ending in .50 are CANCELLED
 * - Order amounts ending in .99 stay IN_PROGRESS
 * - All other amounts are COMPLETED
 * - A refresh token of 'invalid-token' fails authentication
 */

import { GatewayAuthenticationError } from '../../errors';
import { calculateSignature, statusResponseSignatureFields } from '../../signing/signature';
import {
  AnnounceResult,
  ApiNotification,
  GatewayConnection,
  MerchantOrder,
  MerchantOrderResult,
  MerchantOrderStatusResponse,
  PaymentStatus,
  SmartPayGateway
} from '../types';

export const INVALID_REFRESH_TOKEN = 'invalid-token';

export interface MockSmartPayGatewayOptions {
  /** Maximum order results per page (default: 10) */
  pageSize?: number;
}

export class MockSmartPayGateway implements SmartPayGateway {
  private readonly pageSize: number;
  private readonly pendingResults: MerchantOrderResult[] = [];
  private nextOrderNumber = 1;

  constructor(options: MockSmartPayGatewayOptions = {}) {
    this.pageSize = options.pageSize ?? 10;
  }

  async announce(order: MerchantOrder, connection: GatewayConnection): Promise<AnnounceResult> {
    console.log(`🧪 Executing MOCK announce for order ${order.merchantOrderId} (${connection.environment})`);

    if (connection.credentials.refreshToken === INVALID_REFRESH_TOKEN) {
      console.log('🧪 Mock: Simulating rejected refresh token');
      throw new GatewayAuthenticationError('SmartPay authentication failed during refresh access token');
    }

    const omnikassaOrderId = `mock-${String(this.nextOrderNumber++).padStart(6, '0')}`;
    const orderStatus = simulatedStatus(order.amount.amount);
    console.log(`🧪 Mock: Order ${order.merchantOrderId} will report ${orderStatus}`);

    this.pendingResults.push({
      merchantOrderId: order.merchantOrderId,
      omnikassaOrderId,
      poiId: 1000,
      orderStatus,
      orderStatusDateTime: new Date().toISOString(),
      errorCode: '',
      paidAmount: {
        currency: order.amount.currency,
        amount: orderStatus === 'COMPLETED' ? order.amount.amount : 0
      },
      totalAmount: { currency: order.amount.currency, amount: order.amount.amount }
    });

    return {
      redirectUrl: `https://mock.smartpay.test/pay/${omnikassaOrderId}`,
      omnikassaOrderId
    };
  }

  async retrieveOrderStatuses(notification: ApiNotification, connection: GatewayConnection): Promise<MerchantOrderStatusResponse> {
    console.log(`🧪 Executing MOCK result retrieval for event '${notification.eventName}'`);

    const orderResults = this.pendingResults.splice(0, this.pageSize);
    const unsigned = {
      moreOrderResultsAvailable: this.pendingResults.length > 0,
      orderResults,
      signature: ''
    };

    return {
      ...unsigned,
      signature: calculateSignature(statusResponseSignatureFields(unsigned), connection.credentials.signingKey)
    };
  }

  /**
   * Number of results not yet served
   */
  getPendingResultCount(): number {
    return this.pendingResults.length;
  }
}

function simulatedStatus(amountInCents: number): PaymentStatus {
  const cents = amountInCents % 100;

  if (cents === 50) {
    return 'CANCELLED';
  }
  if (cents === 99) {
    return 'IN_PROGRESS';
  }
  return 'COMPLETED';
}
