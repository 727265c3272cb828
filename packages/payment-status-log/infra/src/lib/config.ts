import { App } from 'aws-cdk-lib';

/**
 * Configuration for Payment Status Log Infrastructure
 */
export interface PaymentStatusLogConfig {
  /** Deployment environment (dev, sit, uat, prod) */
  environment: string;

  /** AWS region for deployment */
  region: string;

  /** AWS account ID */
  accountId: string;

  /** Table name prefix (will be formatted as {prefix}-{environment}-smartpay-payment-status-log) */
  tableNamePrefix?: string;

  /** Enable point-in-time recovery (recommended for production) */
  pointInTimeRecovery?: boolean;

  /** Stack removal policy (RETAIN for prod, DESTROY for dev) */
  removalPolicy?: 'RETAIN' | 'DESTROY';
}

/**
 * Get configuration from CDK context and environment variables
 */
export function getPaymentStatusLogConfig(app: App): PaymentStatusLogConfig {
  const environment = contextString(app, 'environment') || process.env.ENVIRONMENT || 'dev';

  const region = contextString(app, 'region') || process.env.AWS_REGION || 'eu-west-1';

  const accountId = contextString(app, 'accountId') || process.env.AWS_ACCOUNT_ID;
  if (!accountId) {
    throw new Error('AWS account ID is required. Provide via -c accountId=<id> or AWS_ACCOUNT_ID env var');
  }

  const tableNamePrefix = contextString(app, 'tableNamePrefix');

  // Status history is an audit trail: keep backups in prod by default
  const pointInTimeRecovery =
    contextString(app, 'pointInTimeRecovery') === 'true' ||
    environment === 'prod';

  const removalPolicy = environment === 'prod' ? 'RETAIN' : 'DESTROY';

  console.log('Payment Status Log Infrastructure Configuration:');
  console.log(`  Environment: ${environment}`);
  console.log(`  Region: ${region}`);
  console.log(`  Account ID: ${accountId}`);
  console.log(`  Point-in-time Recovery: ${pointInTimeRecovery}`);
  console.log(`  Removal Policy: ${removalPolicy}`);

  return {
    environment,
    region,
    accountId,
    tableNamePrefix,
    pointInTimeRecovery,
    removalPolicy
  };
}

function contextString(app: App, key: string): string | undefined {
  const value: unknown = app.node.tryGetContext(key);
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value);
}
