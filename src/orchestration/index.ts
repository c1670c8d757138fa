export * from './types.js';
export * from './planner.js';
export * from './ledger.js';
export * from './executor.js';
export * from './cleanup.js';
export * from './provisioning-orchestrator.js';
