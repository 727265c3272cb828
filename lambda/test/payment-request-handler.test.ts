import { describe, it, expect, beforeEach } from 'vitest';
import { handlePaymentRequest, PaymentRequestBody } from '../src/handlers/payment-request-handler';
import { MockSmartPayGateway } from '../src/providers/mock/mock-smartpay-gateway';
import { createTestDependencies, stubSmartPayEnvironment, testCredentials } from './helpers';

function requestBody(overrides: Partial<PaymentRequestBody> = {}): PaymentRequestBody {
  return {
    invoiceNumber: 'INV-1',
    baskets: [
      {
        id: 'basket-1',
        totalPriceInVat: 19.95,
        lines: [{ connectedItemId: 'product-1', title: 'Mug', quantity: 1, price: 19.95 }]
      }
    ],
    customer: {
      firstname: 'Jan',
      lastname: 'Jansen',
      street: 'Dorpsstraat',
      zipcode: '1234 AB',
      city: 'Utrecht',
      country: 'NL'
    },
    ...overrides
  };
}

describe('handlePaymentRequest', () => {
  beforeEach(() => {
    stubSmartPayEnvironment();
  });

  it('should announce the order and return the SmartPay redirect', async () => {
    const gateway = new MockSmartPayGateway();
    const { dependencies, loadCredentials } = createTestDependencies({ gateway });

    const result = await handlePaymentRequest(requestBody(), dependencies);

    expect(result.statusCode).toBe(201);
    expect(JSON.parse(result.body)).toEqual({
      successful: true,
      action: 'Redirect',
      actionData: 'https://mock.smartpay.test/pay/mock-000001'
    });
    expect(loadCredentials).toHaveBeenCalledWith('smartpay-main', 'test');
    expect(gateway.getPendingResultCount()).toBe(1);
  });

  it('should redirect to the fail URL for an unsupported payment method', async () => {
    const { dependencies } = createTestDependencies();

    const result = await handlePaymentRequest(requestBody({ paymentMethod: 'giftcard' }), dependencies);

    expect(result.statusCode).toBe(422);
    expect(JSON.parse(result.body)).toEqual({
      successful: false,
      action: 'Redirect',
      actionData: 'https://shop.example.test/fail',
      errorMessage: "Unknown or unsupported payment method 'giftcard'"
    });
  });

  it('should redirect to the fail URL for an unsupported country', async () => {
    const { dependencies } = createTestDependencies();
    const body = requestBody();

    const result = await handlePaymentRequest({ ...body, customer: { ...body.customer, country: 'ZZ' } }, dependencies);

    expect(result.statusCode).toBe(422);
    expect(JSON.parse(result.body)).toMatchObject({
      successful: false,
      actionData: 'https://shop.example.test/fail',
      errorMessage: "Unknown or unsupported country code 'ZZ'"
    });
  });

  it('should redirect to the fail URL when SmartPay rejects the credentials', async () => {
    const { dependencies } = createTestDependencies({
      credentials: { ...testCredentials, refreshToken: 'invalid-token' }
    });

    const result = await handlePaymentRequest(requestBody(), dependencies);

    expect(result.statusCode).toBe(422);
    expect(JSON.parse(result.body)).toEqual({
      successful: false,
      action: 'Redirect',
      actionData: 'https://shop.example.test/fail',
      errorMessage: 'Failed to authenticate with the SmartPay API'
    });
  });

  it('should redirect to the fail URL without credentials', async () => {
    const { dependencies } = createTestDependencies({ credentials: null });

    const result = await handlePaymentRequest(requestBody(), dependencies);

    expect(result.statusCode).toBe(422);
    expect(JSON.parse(result.body)).toMatchObject({
      successful: false,
      actionData: 'https://shop.example.test/fail',
      errorMessage: 'SmartPay credentials are not configured'
    });
  });

  it('should reject a body without baskets', async () => {
    const { dependencies, loadCredentials } = createTestDependencies();

    const result = await handlePaymentRequest({ invoiceNumber: 'INV-1', baskets: [], customer: {} }, dependencies);

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body)).toMatchObject({ error: 'invalid_request' });
    expect(loadCredentials).not.toHaveBeenCalled();
  });

  it('should reject a fractional quantity', async () => {
    const { dependencies } = createTestDependencies();
    const body = requestBody();

    const result = await handlePaymentRequest({
      ...body,
      baskets: [{ ...body.baskets[0], lines: [{ connectedItemId: 'product-1', title: 'Mug', quantity: 1.5, price: 19.95 }] }]
    }, dependencies);

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body).details).toEqual(['baskets.0.lines.0.quantity: Expected integer, received float']);
  });
});
