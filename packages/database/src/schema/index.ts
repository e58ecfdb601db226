export * from './inventory.js';
export * from './reconcile.js';
