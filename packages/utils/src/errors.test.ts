import { describe, it, expect } from 'vitest';
import {
  StressBridgeError,
  ConfigError,
  InvalidTransitionError,
  ProvisioningError,
  ExecutionTimeoutError,
  ExecutionError,
  isExecutionFailure,
  describeError,
} from './errors.js';

describe('Error Classes', () => {
  describe('StressBridgeError', () => {
    it('creates error with message', () => {
      const err = new StressBridgeError('test error');
      expect(err.message).toBe('test error');
      expect(err.name).toBe('StressBridgeError');
      expect(err).toBeInstanceOf(Error);
    });

    it('keeps the original cause', () => {
      const cause = new Error('root');
      const err = new StressBridgeError('wrapped', { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe('ConfigError', () => {
    it('lists every issue in the message', () => {
      const err = new ConfigError('Invalid stress config', ['timeoutMs: Required', 'stressNum: too small']);
      expect(err.message).toBe('Invalid stress config: timeoutMs: Required; stressNum: too small');
      expect(err.issues).toEqual(['timeoutMs: Required', 'stressNum: too small']);
      expect(err.name).toBe('ConfigError');
      expect(err).toBeInstanceOf(StressBridgeError);
    });

    it('uses the bare message without issues', () => {
      expect(new ConfigError('missing tool').message).toBe('missing tool');
    });
  });

  describe('InvalidTransitionError', () => {
    it('names both states', () => {
      const err = new InvalidTransitionError('idle', 'done');
      expect(err.message).toBe('Invalid invocation state transition: idle -> done');
    });
  });

  describe('ProvisioningError', () => {
    it('includes node and reason', () => {
      const cause = new Error('docker: not found');
      const err = new ProvisioningError('loader-1', 'docker: not found', { cause });
      expect(err.message).toBe('Failed to provision sandbox on loader-1: docker: not found');
      expect(err.kind).toBe('provisioning');
      expect(err.node).toBe('loader-1');
      expect(err.cause).toBe(cause);
    });
  });

  describe('ExecutionTimeoutError', () => {
    it('includes operation and timeout in message', () => {
      const err = new ExecutionTimeoutError('cql-stress-cassandra-stress', 1050);
      expect(err.message).toBe('Timeout after 1050ms: cql-stress-cassandra-stress');
      expect(err.kind).toBe('timeout');
      expect(err.timeoutMs).toBe(1050);
    });
  });

  describe('ExecutionError', () => {
    it('carries exit code and output', () => {
      const err = new ExecutionError('bad exit', { exitCode: 2, output: 'boom' });
      expect(err.kind).toBe('execution');
      expect(err.exitCode).toBe(2);
      expect(err.output).toBe('boom');
    });

    it('defaults output to an empty string', () => {
      const err = new ExecutionError('transport fault');
      expect(err.exitCode).toBeUndefined();
      expect(err.output).toBe('');
    });
  });

  describe('isExecutionFailure', () => {
    it('accepts the three run failures only', () => {
      expect(isExecutionFailure(new ProvisioningError('n', 'r'))).toBe(true);
      expect(isExecutionFailure(new ExecutionTimeoutError('op', 1))).toBe(true);
      expect(isExecutionFailure(new ExecutionError('x'))).toBe(true);
      expect(isExecutionFailure(new ConfigError('x'))).toBe(false);
      expect(isExecutionFailure('oops')).toBe(false);
    });
  });

  describe('describeError', () => {
    it('uses the message of errors and stringifies anything else', () => {
      expect(describeError(new Error('kaput'))).toBe('kaput');
      expect(describeError(42)).toBe('42');
    });
  });
});
