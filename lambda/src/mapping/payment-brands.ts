import type { PaymentBrand } from '../providers/types';

const PAYMENT_BRANDS_BY_EXTERNAL_NAME: Readonly<Record<string, PaymentBrand>> = {
  IDEAL: 'IDEAL',
  AFTERPAY: 'AFTERPAY',
  PAYPAL: 'PAYPAL',
  MASTERCARD: 'MASTERCARD',
  VISA: 'VISA',
  BANCONTACT: 'BANCONTACT',
  MAESTRO: 'MAESTRO',
  V_PAY: 'V_PAY',
  VPAY: 'V_PAY'
};

/**
 * Map a store payment method name to a SmartPay payment brand (case-insensitive)
 *
 * @returns The brand, or null when SmartPay does not support the method
 */
export function toPaymentBrand(externalName: string): PaymentBrand | null {
  return PAYMENT_BRANDS_BY_EXTERNAL_NAME[externalName.trim().toUpperCase()] ?? null;
}
