import { describe, it, expect, vi, beforeEach } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { createIdentity } from '@stress-bridge/utils';
import { createProgram, summarizeInvocation } from './cli.js';
import type { InvocationResult } from './orchestrator.js';

describe('stress-bridge CLI', () => {
  const logSpy = () => vi.mocked(console.log);

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('translate', () => {
    it('prints the rewritten command with the requested keyspace index', async () => {
      await createProgram().parseAsync([
        'node',
        'stress-bridge',
        'translate',
        '--keyspace-index',
        '3',
        'cql-stress-cassandra-stress',
        'write',
        '-schema',
        'replication(factor=3)',
      ]);
      expect(logSpy()).toHaveBeenCalledWith(
        'cql-stress-cassandra-stress write no-warmup -schema keyspace=keyspace3 replication(factor=3)'
      );
    });

    it('passes options after the tool name through to the command', async () => {
      await createProgram().parseAsync([
        'node',
        'stress-bridge',
        'translate',
        '--nodes',
        '10.0.0.1, 10.0.0.2',
        'cql-stress-cassandra-stress',
        'read',
        'n=10',
        '-rate',
        'fixed=100/s',
      ]);
      expect(logSpy()).toHaveBeenCalledWith(
        'cql-stress-cassandra-stress read no-warmup n=10 -rate throttle=100/s fixed -node 10.0.0.1,10.0.0.2'
      );
    });
  });

  describe('run', () => {
    it('fails on a missing session file', async () => {
      const missing = path.join(os.tmpdir(), 'stress-bridge-missing', 'session.json');
      await expect(
        createProgram().parseAsync(['node', 'stress-bridge', 'run', '--session', missing])
      ).rejects.toThrow(`Cannot read session file ${missing}`);
    });
  });

  it('summarizes an invocation as a flat record', () => {
    const identity = createIdentity(0, 1, 2);
    const invocation: InvocationResult = {
      loader: { name: 'loader-1', ipAddress: '10.0.0.1', region: '', logDir: '/var/log/stress' },
      identity,
      result: {
        exitCode: 0,
        output: '',
        logPath: '/var/log/stress/run.log',
        durationMs: 1200,
        softTimeoutExceeded: false,
      },
      event: {
        kind: 'stress',
        eventId: 'e1',
        type: 'cql-stress-cassandra-stress',
        node: 'loader-1',
        stressCmd: 'cql-stress-cassandra-stress write n=10',
        logFile: '/var/log/stress/run.log',
        identity,
        severity: 'NORMAL',
        errors: [],
        startedAt: '2024-01-01T00:00:00.000Z',
        finishedAt: '2024-01-01T00:00:01.200Z',
      },
      states: ['idle', 'translating', 'provisioning', 'running', 'reporting', 'done'],
    };

    expect(summarizeInvocation(invocation)).toEqual({
      loader: 'loader-1',
      identity: { loaderIndex: 0, cpuIndex: 1, keyspaceIndex: 2 },
      severity: 'NORMAL',
      errors: [],
      logFile: '/var/log/stress/run.log',
      durationMs: 1200,
      softTimeoutExceeded: false,
      states: ['idle', 'translating', 'provisioning', 'running', 'reporting', 'done'],
    });
  });
});
