import countryCodes from './country-codes.json';

const SUPPORTED_COUNTRY_CODES: ReadonlySet<string> = new Set(countryCodes);

/**
 * Normalise an ISO 3166-1 alpha-2 code
 *
 * @returns The upper-case code, or null when SmartPay does not know it
 */
export function toCountryCode(value: string): string | null {
  const code = value.trim().toUpperCase();
  return SUPPORTED_COUNTRY_CODES.has(code) ? code : null;
}
