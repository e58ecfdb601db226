export * from './checkpoint.js';
export * from './driver.js';
export * from './errors.js';
export * from './feed-ingestor.js';
export * from './matcher.js';
export * from './missing-resolver.js';
export * from './normalizer.js';
export * from './orchestrator.js';
export * from './ports.js';
export * from './report.js';
export * from './rules.js';
