/**
 * Gateway Factory - Singleton pattern for the SmartPay gateway
 *
 * Creates and caches the appropriate gateway based on environment configuration.
 * Only the gateway is cached; credentials are passed to every call.
 *
 * Usage:
 *   const gateway = getSmartPayGateway();
 *   const result = await gateway.announce(order, connection);
 *
 * Environment Variables:
 *   USE_REAL_PAYMENT_PROVIDER=true  - Use the SmartPay REST API
 *   USE_REAL_PAYMENT_PROVIDER=false - Use mock gateway (default)
 */

import { SmartPayGateway } from './types';
import { RealSmartPayGateway } from './real/real-smartpay-gateway';
import { MockSmartPayGateway } from './mock/mock-smartpay-gateway';

// Singleton instance (persists across Lambda warm starts)
let gatewayInstance: SmartPayGateway | null = null;

/**
 * Get the SmartPay gateway instance (singleton)
 */
export function getSmartPayGateway(): SmartPayGateway {
  if (gatewayInstance) {
    return gatewayInstance;
  }

  if (process.env.USE_REAL_PAYMENT_PROVIDER === 'true') {
    console.log('✅ Using REAL SmartPay gateway');
    gatewayInstance = new RealSmartPayGateway();
  } else {
    console.log('🧪 Using MOCK SmartPay gateway (test mode)');
    gatewayInstance = new MockSmartPayGateway();
  }

  return gatewayInstance;
}

/**
 * Reset gateway instance (for testing only)
 * @internal
 */
export function resetSmartPayGateway(): void {
  gatewayInstance = null;
}
