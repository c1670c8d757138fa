export * from './types.js';
export * from './resource-id.js';
export * from './azure-common.js';
export * from './resource-group-manager.js';
export * from './cosmos-account-manager.js';
export * from './event-hubs-manager.js';
export * from './diagnostic-settings-manager.js';
export * from './azure-provider.js';
export * from './simulated-provider.js';
