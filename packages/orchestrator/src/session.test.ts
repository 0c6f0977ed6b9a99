import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadStressConfig, type LoaderNode, type StressConfig } from '@stress-bridge/config';
import { CqlStressDialect } from '@stress-bridge/dialect';
import { MemoryEventSink, StressReporter } from '@stress-bridge/reporting';
import {
  ExecutionContextProvisioner,
  type SandboxDriver,
  type SandboxExecResult,
  type SandboxHandle,
  type SandboxSpec,
} from '@stress-bridge/sandbox';
import { StressOrchestrator } from './orchestrator.js';
import { LoaderRotation, StressSession, planInvocations } from './session.js';

const loaders: LoaderNode[] = [
  { name: 'loader-1', ipAddress: '10.0.0.1', region: '', logDir: '/unused/1' },
  { name: 'loader-2', ipAddress: '10.0.0.2', region: '', logDir: '/unused/2' },
];

const identities = (planned: ReturnType<typeof planInvocations>) =>
  planned.map(({ loader, identity }) => `${loader.name}:${identity.loaderIndex}/${identity.cpuIndex}/${identity.keyspaceIndex}`);

describe('planInvocations', () => {
  it('fans out over loaders, cpus and keyspaces', () => {
    const planned = planInvocations(loaders, { stressNum: 2, keyspaceNum: 2, roundRobin: false });
    expect(identities(planned)).toEqual([
      'loader-1:0/0/1',
      'loader-1:0/0/2',
      'loader-1:0/1/1',
      'loader-1:0/1/2',
      'loader-2:1/0/1',
      'loader-2:1/0/2',
      'loader-2:1/1/1',
      'loader-2:1/1/2',
    ]);
  });

  it('gives every invocation a distinct identity', () => {
    const planned = identities(planInvocations(loaders, { stressNum: 3, keyspaceNum: 4, roundRobin: false }));
    expect(new Set(planned).size).toBe(planned.length);
    expect(planned).toHaveLength(24);
  });

  it('uses one loader per session in round robin mode', () => {
    const rotation = new LoaderRotation(loaders);
    const config = { stressNum: 1, keyspaceNum: 1, roundRobin: true };
    expect(identities(planInvocations(loaders, config, rotation))).toEqual(['loader-1:0/0/1']);
    expect(identities(planInvocations(loaders, config, rotation))).toEqual(['loader-2:1/0/1']);
    expect(identities(planInvocations(loaders, config, rotation))).toEqual(['loader-1:0/0/1']);
  });
});

describe('LoaderRotation', () => {
  it('needs loaders', () => {
    expect(() => new LoaderRotation([])).toThrow('Loader rotation needs at least one loader');
  });
});

class FakeDriver implements SandboxDriver {
  private counter = 0;
  start = vi.fn(async (spec: SandboxSpec): Promise<SandboxHandle> => ({ id: `c${++this.counter}`, node: spec.node }));
  exec = vi.fn(async (handle: SandboxHandle): Promise<SandboxExecResult> => ({
    exitCode: handle.node === '10.0.0.2' ? 1 : 0,
    output: '',
  }));
  stop = vi.fn(async (): Promise<void> => undefined);
}

describe('StressSession', () => {
  let tmpDir: string;
  let sessionLoaders: LoaderNode[];
  let config: StressConfig;
  let driver: FakeDriver;
  let sink: MemoryEventSink;
  let orchestrator: StressOrchestrator;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stress-bridge-session-'));
    sessionLoaders = loaders.map((loader) => ({ ...loader, logDir: path.join(tmpDir, loader.name) }));
    config = loadStressConfig(
      { stressCmd: 'cql-stress-cassandra-stress write n=10', timeoutMs: 60_000, stressNum: 2, stopTestOnFailure: false },
      {}
    );
    driver = new FakeDriver();
    sink = new MemoryEventSink();
    orchestrator = new StressOrchestrator({
      config,
      dialect: new CqlStressDialect(),
      provisioner: new ExecutionContextProvisioner(driver),
      reporter: new StressReporter(sink),
      marker: 'session-test',
    });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('runs every planned invocation and reports each once', async () => {
    const session = new StressSession(orchestrator, sessionLoaders, config);
    const results = await session.run();

    expect(results).toHaveLength(4);
    expect(sink.ofKind('stress')).toHaveLength(4);
    expect(driver.start).toHaveBeenCalledTimes(4);
    expect(driver.stop).toHaveBeenCalledTimes(4);
    expect(new Set(results.map((r) => r.event.logFile)).size).toBe(4);
  });

  it('summarizes outcomes by severity', async () => {
    const session = new StressSession(orchestrator, sessionLoaders, config);
    await session.run();

    expect(session.summary()).toEqual({
      total: 4,
      succeeded: 2,
      failed: 2,
      bySeverity: { NORMAL: 2, WARNING: 0, ERROR: 2, CRITICAL: 0 },
    });
    expect(session.getResults().filter((r) => r.loader.name === 'loader-2').every((r) => r.result === undefined)).toBe(
      true
    );
  });

  it('keeps every result when publishing one event fails', async () => {
    const flaky = new MemoryEventSink();
    const failing = new StressOrchestrator({
      config,
      dialect: new CqlStressDialect(),
      provisioner: new ExecutionContextProvisioner(driver),
      reporter: new StressReporter({
        publish: (event) => {
          if (event.kind === 'stress' && event.identity.cpuIndex === 1) {
            throw new Error('sink down');
          }
          flaky.publish(event);
        },
      }),
      marker: 'session-test',
    });

    const results = await new StressSession(failing, sessionLoaders, config).run();

    expect(results).toHaveLength(4);
    expect(results.map((r) => r.states[r.states.length - 1])).toEqual(['done', 'done', 'done', 'done']);
    expect(flaky.ofKind('stress').map((record) => record.identity.cpuIndex)).toEqual([0, 0]);
  });

  it('runs only once', async () => {
    const session = new StressSession(orchestrator, sessionLoaders, config);
    expect(() => session.getResults()).toThrow('Stress session has not been run');
    await session.run();
    await expect(session.run()).rejects.toThrow('Stress session was already run');
  });

  it('shares a rotation between round robin sessions', async () => {
    const roundRobin = { ...config, roundRobin: true };
    const rotation = new LoaderRotation(sessionLoaders);

    const first = await new StressSession(orchestrator, sessionLoaders, roundRobin, rotation).run();
    const second = await new StressSession(orchestrator, sessionLoaders, roundRobin, rotation).run();

    expect(first.map((r) => r.loader.name)).toEqual(['loader-1', 'loader-1']);
    expect(second.map((r) => r.loader.name)).toEqual(['loader-2', 'loader-2']);
  });
});
