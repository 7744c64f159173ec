// Provisioning module exports
export * from './types.js';
export * from './sdk-helpers.js';
export * from './account-manager.js';
export * from './network-manager.js';
export * from './iam-manager.js';
export * from './compute-manager.js';
export * from './inventory-manager.js';
export * from './secret-store.js';
export * from './monitoring-manager.js';
export * from './notification-manager.js';
export * from './uptime-check-manager.js';
export * from './budget-manager.js';
export * from './remote-command.js';
export * from './aws-gateway.js';
