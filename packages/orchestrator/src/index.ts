export * from './state-machine.js';
export * from './topology.js';
export * from './orchestrator.js';
export * from './session.js';
export * from './bootstrap.js';
export { createProgram, summarizeInvocation } from './cli.js';
