export * from './logger.js';
export * from './errors.js';
export * from './result.js';
export * from './shell.js';
export * from './identity.js';
