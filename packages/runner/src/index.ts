export * from './timeout-runner.js';
