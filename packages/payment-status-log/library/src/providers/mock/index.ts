export * from './mock-payment-status-log-service.js';
