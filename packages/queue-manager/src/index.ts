export * from './names.js';
export * from './policy.js';
export * from './queue-manager.js';
export * from './redis.js';
