export * from './env.js';
export * from './reconcile-settings.js';
