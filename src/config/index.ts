export * from './loader.js';
export * from './naming.js';
export * from './validator.js';
