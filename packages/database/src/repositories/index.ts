export * from './audit-repository.js';
export * from './inventory-repository.js';
export * from './missing-product-repository.js';
export * from './run-repository.js';
export * from './settings-repository.js';
