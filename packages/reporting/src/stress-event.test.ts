import { describe, it, expect, vi } from 'vitest';
import {
  ExecutionError,
  ExecutionTimeoutError,
  ProvisioningError,
  createIdentity,
} from '@stress-bridge/utils';
import { StressEvent, createSoftTimeoutEvent, formatFailure, severityFor } from './stress-event.js';
import { MemoryEventSink } from './sinks.js';

const identity = createIdentity(0, 1, 2);

function newEvent(stopTestOnFailure = true): StressEvent {
  return new StressEvent({
    node: 'loader-1',
    stressCmd: 'cql-stress-cassandra-stress write n=10',
    logFile: '/logs/cql-stress-cassandra-stress-write-l0-c1-k2.log',
    toolName: 'cql-stress-cassandra-stress',
    identity,
    stopTestOnFailure,
  });
}

describe('formatFailure', () => {
  it('reports the exit status with the last five output lines', () => {
    const failure = new ExecutionError('exit', { exitCode: 1, output: 'a\nb\nc\nd\ne\nf\n' });
    expect(formatFailure(failure)).toBe('Stress command completed with bad status 1: b\nc\nd\ne\nf');
  });

  it('marks a killed run as stopped by teardown', () => {
    const failure = new ExecutionError('exit', { exitCode: 137, output: 'Killed' });
    expect(formatFailure(failure)).toBe(
      'Stress killed by test/teardown: Stress command completed with bad status 137: Killed'
    );
  });

  it('omits an empty output tail', () => {
    expect(formatFailure(new ExecutionError('exit', { exitCode: 2 }))).toBe('Stress command completed with bad status 2');
  });

  it('describes timeouts by their deadline', () => {
    expect(formatFailure(new ExecutionTimeoutError('cql-stress-cassandra-stress write', 1050))).toBe(
      'Stress command timed out after 1050ms'
    );
  });

  it('uses the message of provisioning and transport failures', () => {
    expect(formatFailure(new ProvisioningError('loader-1', 'no image'))).toBe(
      'Failed to provision sandbox on loader-1: no image'
    );
    expect(formatFailure(new ExecutionError('Stress command failed on loader-1: reset'))).toBe(
      'Stress command failed on loader-1: reset'
    );
  });
});

describe('severityFor', () => {
  it('is critical when failures stop the test', () => {
    expect(severityFor(new ExecutionError('exit', { exitCode: 1 }), true)).toBe('CRITICAL');
  });

  it('is an error otherwise', () => {
    expect(severityFor(new ExecutionTimeoutError('cmd', 10), false)).toBe('ERROR');
  });

  it('is a warning for a killed run either way', () => {
    expect(severityFor(new ExecutionError('exit', { exitCode: 137 }), true)).toBe('WARNING');
    expect(severityFor(new ExecutionError('exit', { exitCode: 137 }), false)).toBe('WARNING');
  });
});

describe('StressEvent', () => {
  it('describes a successful run', () => {
    const record = newEvent().toRecord(new Date('2024-01-01T00:05:00.000Z'));
    expect(record).toEqual({
      kind: 'stress',
      eventId: expect.any(String),
      type: 'cql-stress-cassandra-stress',
      node: 'loader-1',
      stressCmd: 'cql-stress-cassandra-stress write n=10',
      logFile: '/logs/cql-stress-cassandra-stress-write-l0-c1-k2.log',
      identity: { loaderIndex: 0, cpuIndex: 1, keyspaceIndex: 2 },
      severity: 'NORMAL',
      errors: [],
      startedAt: expect.any(String),
      finishedAt: '2024-01-01T00:05:00.000Z',
    });
  });

  it('records a failure with its kind and cause', () => {
    const event = newEvent(false);
    const cause = new Error('ssh connection reset');
    event.recordFailure(new ExecutionError('Stress command failed on loader-1: ssh connection reset', {}, { cause }));

    const record = event.toRecord();
    expect(event.failed).toBe(true);
    expect(record.severity).toBe('ERROR');
    expect(record.errors).toEqual(['Stress command failed on loader-1: ssh connection reset']);
    expect(record.failureKind).toBe('execution');
    expect(record.cause).toBe('ssh connection reset');
  });

  it('keeps the recorded failure object and its cause', () => {
    const event = newEvent(false);
    const cause = new Error('ssh connection reset');
    const failure = new ExecutionError('Stress command failed on loader-1: ssh connection reset', {}, { cause });
    event.recordFailure(failure);

    expect(event.failure).toBe(failure);
    expect(event.failure?.cause).toBe(cause);
  });

  it('publishes exactly once', async () => {
    const sink = new MemoryEventSink();
    const event = newEvent();

    const record = await event.publish(sink);
    expect(sink.events).toEqual([record]);
    expect(event.isPublished).toBe(true);

    await expect(event.publish(sink)).rejects.toThrow(`Stress event ${event.eventId} was already published`);
    expect(sink.events).toHaveLength(1);
  });

  it('stays unpublished when the sink fails', async () => {
    const event = newEvent();
    const failing = {
      publish: vi.fn(async () => {
        throw new Error('sink down');
      }),
    };

    await expect(event.publish(failing)).rejects.toThrow('sink down');
    expect(event.isPublished).toBe(false);

    const sink = new MemoryEventSink();
    await event.publish(sink);
    expect(sink.events).toHaveLength(1);
  });
});

describe('createSoftTimeoutEvent', () => {
  it('builds a warning record', () => {
    expect(
      createSoftTimeoutEvent({
        operation: 'cql-stress-cassandra-stress',
        softTimeoutMs: 1000,
        elapsedMs: 1001,
        node: 'loader-1',
        identity,
      })
    ).toEqual({
      kind: 'soft-timeout',
      eventId: expect.any(String),
      severity: 'WARNING',
      operation: 'cql-stress-cassandra-stress',
      softTimeoutMs: 1000,
      elapsedMs: 1001,
      node: 'loader-1',
      identity,
    });
  });
});
