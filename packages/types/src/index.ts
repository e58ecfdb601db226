export * from './api.js';
export * from './inventory.js';
export * from './jobs.js';
export * from './reconcile.js';
