export * from './types.js';
export * from './stress-event.js';
export * from './sinks.js';
export * from './reporter.js';
export * from './metrics-registry.js';
export * from './metrics-exporter.js';
