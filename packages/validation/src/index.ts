export * from './feed.js';
export * from './missing-products.js';
export * from './reconcile-settings.js';
