import { describe, it, expect } from 'vitest';
import { INVALID_REFRESH_TOKEN, MockSmartPayGateway } from '../src/providers/mock/mock-smartpay-gateway';
import { GatewayAuthenticationError } from '../src/errors';
import { isValidStatusResponseSignature } from '../src/signing/signature';
import type { ApiNotification, GatewayConnection, MerchantOrder } from '../src/providers/types';
import { signingKey, testCredentials } from './helpers';

const connection: GatewayConnection = { environment: 'sandbox', credentials: testCredentials };

const notification: ApiNotification = {
  authentication: 'test-notification-token',
  expiry: '2026-01-01T12:00:00.000+01:00',
  eventName: 'merchant.order.status.changed',
  poiId: 1000,
  signature: 'test-signature'
};

function orderFor(merchantOrderId: string, amount: number): MerchantOrder {
  const address = {
    firstName: 'Jan',
    lastName: 'Jansen',
    street: 'Dorpsstraat',
    postalCode: '1234 AB',
    city: 'Utrecht',
    countryCode: 'NL'
  };

  return {
    merchantOrderId,
    amount: { currency: 'EUR', amount },
    merchantReturnURL: 'https://shop.example.test/return',
    billingDetail: address,
    shippingDetail: address,
    orderItems: [],
    paymentBrand: 'IDEAL',
    paymentBrandForce: 'FORCE_ALWAYS'
  };
}

describe('MockSmartPayGateway', () => {
  it('should return a redirect URL for an announced order', async () => {
    const gateway = new MockSmartPayGateway();

    const result = await gateway.announce(orderFor('INV-1', 1000), connection);

    expect(result).toEqual({ redirectUrl: 'https://mock.smartpay.test/pay/mock-000001', omnikassaOrderId: 'mock-000001' });
  });

  it('should reject the invalid refresh token', async () => {
    const gateway = new MockSmartPayGateway();

    await expect(
      gateway.announce(orderFor('INV-1', 1000), { ...connection, credentials: { ...testCredentials, refreshToken: INVALID_REFRESH_TOKEN } })
    ).rejects.toThrow(GatewayAuthenticationError);
    expect(gateway.getPendingResultCount()).toBe(0);
  });

  it('should derive the reported status from the cents of the amount', async () => {
    const gateway = new MockSmartPayGateway();
    await gateway.announce(orderFor('INV-1', 1050), connection);
    await gateway.announce(orderFor('INV-2', 1099), connection);
    await gateway.announce(orderFor('INV-3', 1000), connection);

    const page = await gateway.retrieveOrderStatuses(notification, connection);

    expect(page.orderResults.map(result => [result.merchantOrderId, result.orderStatus])).toEqual([
      ['INV-1', 'CANCELLED'],
      ['INV-2', 'IN_PROGRESS'],
      ['INV-3', 'COMPLETED']
    ]);
    expect(page.orderResults[2].paidAmount).toEqual({ currency: 'EUR', amount: 1000 });
    expect(page.orderResults[0].paidAmount).toEqual({ currency: 'EUR', amount: 0 });
  });

  it('should serve results in signed pages', async () => {
    const gateway = new MockSmartPayGateway({ pageSize: 2 });
    for (const id of ['INV-1', 'INV-2', 'INV-3']) {
      await gateway.announce(orderFor(id, 1000), connection);
    }

    const first = await gateway.retrieveOrderStatuses(notification, connection);
    const second = await gateway.retrieveOrderStatuses(notification, connection);

    expect(first.orderResults).toHaveLength(2);
    expect(first.moreOrderResultsAvailable).toBe(true);
    expect(second.orderResults).toHaveLength(1);
    expect(second.moreOrderResultsAvailable).toBe(false);
    expect(isValidStatusResponseSignature(first, signingKey)).toBe(true);
    expect(isValidStatusResponseSignature(second, signingKey)).toBe(true);
  });
});
