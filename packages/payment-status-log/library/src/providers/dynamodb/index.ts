export * from './dynamodb-payment-status-log-service.js';
