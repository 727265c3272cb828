// Core types, interfaces, and errors
export * from './core/index.js';

// Factory functions
export * from './factory/index.js';

// Note: Providers are exported via package.json exports
// Use '@psp-adapter/payment-status-log/dynamodb' for DynamoDB provider
// Use '@psp-adapter/payment-status-log/mock' for Mock provider
