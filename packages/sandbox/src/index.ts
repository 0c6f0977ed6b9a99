export * from './types.js';
export * from './spawn-command.js';
export * from './transports.js';
export * from './docker-driver.js';
export * from './provisioner.js';
