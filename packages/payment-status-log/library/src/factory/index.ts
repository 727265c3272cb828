export * from './payment-status-log-service-factory.js';
