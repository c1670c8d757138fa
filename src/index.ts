// Main entry point for the Event Hub diagnostics provisioner
export * from './types/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './config/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';

// Main provisioning function
export { provision } from './orchestration/provisioning-orchestrator.js';
