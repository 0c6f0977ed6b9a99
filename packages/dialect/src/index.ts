export * from './types.js';
export * from './cql-stress.js';
export * from './log-file.js';
