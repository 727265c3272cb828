/**
 * SmartPay gateway types
 *
 * This module defines the contract between the Lambda handlers and the
 * SmartPay payment service provider (real HTTP API or mock). Everything the
 * handlers need from the vendor goes through {@link SmartPayGateway}.
 */

/**
 * Payment status as reported by SmartPay
 *
 * IN_PROGRESS is the only non-terminal status. Any other string the provider
 * sends is treated as unknown.
 */
export type PaymentStatus = 'IN_PROGRESS' | 'COMPLETED' | 'CANCELLED' | 'EXPIRED';

export const PAYMENT_STATUSES: readonly PaymentStatus[] = ['IN_PROGRESS', 'COMPLETED', 'CANCELLED', 'EXPIRED'];

export function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES.some(status => status === value);
}

export type PaymentBrand =
  | 'IDEAL'
  | 'AFTERPAY'
  | 'PAYPAL'
  | 'MASTERCARD'
  | 'VISA'
  | 'BANCONTACT'
  | 'MAESTRO'
  | 'V_PAY';

/**
 * FORCE_ALWAYS prevents the customer from switching payment method on the PSP pages
 */
export type PaymentBrandForce = 'FORCE_ONCE' | 'FORCE_ALWAYS';

/**
 * Monetary amount in minor units (cents)
 */
export interface Money {
  readonly currency: 'EUR';
  readonly amount: number;
}

export interface Address {
  readonly firstName: string;
  readonly lastName: string;
  readonly street: string;
  readonly postalCode: string;
  readonly city: string;
  /** ISO 3166-1 alpha-2 */
  readonly countryCode: string;
  readonly houseNumber?: string;
  readonly houseNumberAddition?: string;
}

export interface OrderItem {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly quantity: number;
  readonly amount: Money;
}

/**
 * One checkout attempt as announced to SmartPay
 */
export interface MerchantOrder {
  /** Invoice number; unique per checkout attempt */
  readonly merchantOrderId: string;
  readonly amount: Money;
  readonly merchantReturnURL: string;
  readonly billingDetail: Address;
  readonly shippingDetail: Address;
  readonly orderItems: readonly OrderItem[];
  readonly paymentBrand: PaymentBrand;
  readonly paymentBrandForce: PaymentBrandForce;
}

/**
 * Result of announcing a merchant order
 */
export interface AnnounceResult {
  /** URL the customer must be redirected to */
  redirectUrl: string;
  omnikassaOrderId: string;
}

/**
 * Webhook envelope posted by SmartPay when order results are queued
 */
export interface ApiNotification {
  /** Token authorising retrieval of the queued results */
  authentication: string;
  expiry: string;
  eventName: string;
  poiId: number;
  signature: string;
}

/**
 * Amount reported in an order result (minor units)
 */
export interface ResultAmount {
  currency: string;
  amount: number;
}

export interface MerchantOrderResult {
  merchantOrderId: string;
  omnikassaOrderId: string;
  poiId: number;
  orderStatus: string;
  orderStatusDateTime: string;
  errorCode: string;
  paidAmount: ResultAmount;
  totalAmount: ResultAmount;
}

/**
 * One page of queued order results
 */
export interface MerchantOrderStatusResponse {
  moreOrderResultsAvailable: boolean;
  orderResults: MerchantOrderResult[];
  signature: string;
}

export type SmartPayEnvironment = 'sandbox' | 'production';

export interface SmartPayCredentials {
  refreshToken: string;
  /** Base64-encoded signing key */
  signingKey: string;
}

/**
 * Everything a gateway call needs to reach the right SmartPay environment
 */
export interface GatewayConnection {
  environment: SmartPayEnvironment;
  credentials: SmartPayCredentials;
}

/**
 * SmartPay gateway interface
 *
 * Implementations:
 * - RealSmartPayGateway: Calls the SmartPay REST API
 * - MockSmartPayGateway: Serves simulated results for testing
 */
export interface SmartPayGateway {
  /**
   * Announce a merchant order and obtain the customer's redirect URL
   *
   * @throws {GatewayAuthenticationError} If the refresh or access token is rejected
   */
  announce(order: MerchantOrder, connection: GatewayConnection): Promise<AnnounceResult>;

  /**
   * Retrieve the next page of order results queued for a notification
   *
   * The response signature is not verified here; callers verify it.
   */
  retrieveOrderStatuses(notification: ApiNotification, connection: GatewayConnection): Promise<MerchantOrderStatusResponse>;
}
