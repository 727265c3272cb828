/**
 * Order Mapper
 *
 * Converts priced shopping baskets and customer details into a SmartPay
 * merchant order. Customer details are the flat key/value pairs the store
 * keeps for a customer (firstname, street, zipcode, ...); the shipping
 * address uses the same keys with a `shipping_` prefix.
 */

import { MappingError } from '../errors';
import type { Address, MerchantOrder, Money, OrderItem } from '../providers/types';
import { toCountryCode } from './country-codes';
import { toPaymentBrand } from './payment-brands';

export const SHIPPING_DETAIL_PREFIX = 'shipping_';

export interface BasketLine {
  /** ID of the product or coupon the line refers to */
  connectedItemId: string;
  title?: string;
  description?: string;
  quantity: number;
  /** Unit price including VAT */
  price: number;
}

export interface ShoppingBasket {
  id: string;
  /** Basket total as the provider must charge it (VAT included), computed by the pricing service */
  totalPriceInVat: number;
  lines: BasketLine[];
}

export type CustomerDetails = Readonly<Record<string, string | undefined>>;

export interface OrderMappingInput {
  baskets: readonly ShoppingBasket[];
  customer: CustomerDetails;
  returnUrl: string;
  invoiceNumber: string;
  /** Store payment method name, e.g. 'ideal' or 'visa' */
  paymentMethod: string;
}

export type OrderMappingResult =
  | { ok: true; order: MerchantOrder }
  | { ok: false; error: MappingError };

export function buildMerchantOrder(input: OrderMappingInput): OrderMappingResult {
  const totalPrice = input.baskets.reduce((total, basket) => total + basket.totalPriceInVat, 0);

  try {
    const billingDetail = createAddress(input.customer);
    // No complete shipping address: ship to the billing address
    const shippingDetail = createAddress(input.customer, SHIPPING_DETAIL_PREFIX) ?? billingDetail;

    const paymentBrand = toPaymentBrand(input.paymentMethod);
    if (!paymentBrand) {
      throw new MappingError('UnsupportedBrand', `Unknown or unsupported payment method '${input.paymentMethod}'`);
    }

    const order: MerchantOrder = {
      merchantOrderId: input.invoiceNumber,
      amount: toMoney(totalPrice),
      merchantReturnURL: input.returnUrl,
      billingDetail,
      shippingDetail,
      orderItems: createOrderItems(input.baskets),
      paymentBrand,
      paymentBrandForce: 'FORCE_ALWAYS'
    };

    return { ok: true, order };
  } catch (error) {
    if (error instanceof MappingError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Convert every basket line to an order item
 *
 * Coupon lines carry no title; their description is used as the name instead.
 */
export function createOrderItems(baskets: readonly ShoppingBasket[]): OrderItem[] {
  const orderItems: OrderItem[] = [];

  for (const basket of baskets) {
    for (const line of basket.lines) {
      const name = isBlank(line.title) ? (line.description ?? '') : (line.title ?? '');

      orderItems.push({
        id: line.connectedItemId,
        name,
        description: name,
        quantity: line.quantity,
        amount: toMoney(line.price)
      });
    }
  }

  return orderItems;
}

/**
 * Build an address from customer details
 *
 * With a prefix the address is optional: null is returned unless street,
 * zipcode, city and country are all filled in. Without a prefix (billing)
 * the same fields are required.
 *
 * @throws {MappingError} UnsupportedCountry when the country code is unknown,
 *   IncompleteBillingAddress when a required billing field is blank
 */
export function createAddress(customer: CustomerDetails, detailKeyPrefix = ''): Address | null {
  const detail = (key: string): string => (customer[`${detailKeyPrefix}${key}`] ?? '').trim();

  const requiredKeys = ['street', 'zipcode', 'city', 'country'];
  const missing = requiredKeys.filter(key => detail(key) === '');

  if (missing.length > 0) {
    if (detailKeyPrefix) {
      return null;
    }
    throw new MappingError(
      'IncompleteBillingAddress',
      `Billing address is incomplete; missing ${missing.join(', ')}`
    );
  }

  const countryCode = toCountryCode(detail('country'));
  if (!countryCode) {
    throw new MappingError('UnsupportedCountry', `Unknown or unsupported country code '${detail('country')}'`);
  }

  const address: Address = {
    firstName: detail('firstname'),
    lastName: detail('lastname'),
    street: detail('street'),
    postalCode: detail('zipcode'),
    city: detail('city'),
    countryCode
  };

  const houseNumber = detail('housenumber');
  if (!houseNumber) {
    return address;
  }

  const houseNumberAddition = detail('housenumber_suffix');
  return {
    ...address,
    houseNumber,
    ...(houseNumberAddition && { houseNumberAddition })
  };
}

export function toMoney(amount: number): Money {
  return { currency: 'EUR', amount: Math.round(amount * 100) };
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}
