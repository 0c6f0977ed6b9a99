export * from './schemas.js';
export * from './stress-config.js';
