#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { PaymentStatusLogStack } from '../lib/payment-status-log-stack';
import { getPaymentStatusLogConfig } from '../lib/config';

const app = new cdk.App();

const config = getPaymentStatusLogConfig(app);

const paymentStatusLogStack = new PaymentStatusLogStack(app, 'PaymentStatusLogStack', {
  config,
  env: {
    account: config.accountId,
    region: config.region
  },
  stackName: `${config.environment}-smartpay-payment-status-log-stack`,
  description: `Append-only payment status log for SmartPay notifications (${config.environment})`
});

cdk.Tags.of(paymentStatusLogStack).add('Environment', config.environment);
cdk.Tags.of(paymentStatusLogStack).add('Service', 'smartpay-payment-status-log');
cdk.Tags.of(paymentStatusLogStack).add('ManagedBy', 'CDK');

app.synth();
