import { IPaymentStatusLogService } from '../core/index.js';
import { DynamoDBPaymentStatusLogService } from '../providers/dynamodb/index.js';
import { MockPaymentStatusLogService } from '../providers/mock/index.js';
import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';

/**
 * Factory function to create a payment status log service
 *
 * @example
 * // Production usage
 * const service = createPaymentStatusLogService({
 *   type: 'dynamodb',
 *   tableName: 'live-smartpay-payment-status-log',
 *   region: 'eu-west-1'
 * });
 *
 * @example
 * // Testing usage
 * const service = createPaymentStatusLogService({ type: 'mock' });
 */
export function createPaymentStatusLogService(
  config: PaymentStatusLogServiceConfig
): IPaymentStatusLogService {
  switch (config.type) {
    case 'mock':
      return new MockPaymentStatusLogService();

    case 'dynamodb':
      if (!config.tableName) {
        throw new Error('tableName is required for DynamoDB provider');
      }
      if (!config.region) {
        throw new Error('region is required for DynamoDB provider');
      }

      return new DynamoDBPaymentStatusLogService({
        tableName: config.tableName,
        region: config.region,
        endpoint: config.endpoint,
        dynamoDBClient: config.dynamoDBClient,
        retentionDays: config.retentionDays
      });
  }
}

/**
 * Create payment status log service from environment variables
 *
 * Environment variables:
 * - ENVIRONMENT: Deployment environment (dev, sit, uat, prod)
 * - USE_MOCK_STATUS_LOG: Force mock provider (overrides environment detection)
 * - STATUS_LOG_TABLE_NAME: DynamoDB table name
 * - STATUS_LOG_RETENTION_DAYS: Days before entries expire (default: 365)
 * - AWS_REGION: AWS region (default: eu-west-1)
 */
export function createPaymentStatusLogServiceFromEnv(): IPaymentStatusLogService {
  const environment = process.env.ENVIRONMENT || 'dev';
  const useMock = process.env.USE_MOCK_STATUS_LOG === 'true';

  if (environment === 'test' || useMock) {
    console.log('Using MockPaymentStatusLogService');
    return new MockPaymentStatusLogService();
  }

  const tableName = process.env.STATUS_LOG_TABLE_NAME;
  const region = process.env.AWS_REGION || 'eu-west-1';
  const retentionDays = process.env.STATUS_LOG_RETENTION_DAYS
    ? Number.parseInt(process.env.STATUS_LOG_RETENTION_DAYS, 10)
    : undefined;

  if (!tableName) {
    throw new Error('Missing required environment variable: STATUS_LOG_TABLE_NAME');
  }

  console.log(`Using DynamoDBPaymentStatusLogService (table: ${tableName})`);
  return new DynamoDBPaymentStatusLogService({
    tableName,
    region,
    retentionDays
  });
}

/**
 * Singleton instance for Lambda container reuse
 */
let paymentStatusLogService: IPaymentStatusLogService | null = null;

/**
 * Get or create the payment status log singleton
 *
 * The service holds no request state, so one instance is shared by every
 * invocation within the same Lambda container.
 */
export function getPaymentStatusLogService(): IPaymentStatusLogService {
  if (!paymentStatusLogService) {
    paymentStatusLogService = createPaymentStatusLogServiceFromEnv();
  }
  return paymentStatusLogService;
}

/**
 * Reset the singleton instance (useful for testing)
 */
export function resetPaymentStatusLogService(): void {
  paymentStatusLogService = null;
}

// Type definitions for factory configuration

export type PaymentStatusLogServiceConfig =
  | MockPaymentStatusLogServiceConfig
  | DynamoDBPaymentStatusLogServiceFactoryConfig;

export interface MockPaymentStatusLogServiceConfig {
  type: 'mock';
}

export interface DynamoDBPaymentStatusLogServiceFactoryConfig {
  type: 'dynamodb';
  tableName: string;
  region: string;
  endpoint?: string;
  dynamoDBClient?: DynamoDBClient;
  retentionDays?: number;
}
