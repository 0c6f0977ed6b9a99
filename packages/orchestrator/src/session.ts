/**
 * Stress Session
 *
 * Fans one stress configuration out into concurrent invocations, one per
 * (loader, cpu, keyspace) identity.
 */

import type { LoaderNode, StressConfig } from '@stress-bridge/config';
import type { Severity } from '@stress-bridge/reporting';
import { StressBridgeError, createIdentity, createLogger, type InvocationIdentity } from '@stress-bridge/utils';
import type { InvocationResult, StressOrchestrator } from './orchestrator.js';

const log = createLogger('session');

export interface PlannedInvocation {
  loader: LoaderNode;
  identity: InvocationIdentity;
}

/**
 * Hands out loaders in turn. Sessions sharing one rotation spread their
 * load across the loader set.
 */
export class LoaderRotation {
  private nextIndex = 0;

  constructor(private readonly loaders: readonly LoaderNode[]) {
    if (loaders.length === 0) {
      throw new StressBridgeError('Loader rotation needs at least one loader');
    }
  }

  next(): { loader: LoaderNode; index: number } {
    const index = this.nextIndex;
    this.nextIndex = (this.nextIndex + 1) % this.loaders.length;
    return { loader: this.loaders[index], index };
  }
}

export function planInvocations(
  loaders: readonly LoaderNode[],
  config: Pick<StressConfig, 'stressNum' | 'keyspaceNum' | 'roundRobin'>,
  rotation: LoaderRotation = new LoaderRotation(loaders)
): PlannedInvocation[] {
  const chosen = config.roundRobin ? [rotation.next()] : loaders.map((loader, index) => ({ loader, index }));
  const planned: PlannedInvocation[] = [];
  for (const { loader, index } of chosen) {
    for (let cpuIndex = 0; cpuIndex < config.stressNum; cpuIndex++) {
      for (let keyspaceIndex = 1; keyspaceIndex <= config.keyspaceNum; keyspaceIndex++) {
        planned.push({ loader, identity: createIdentity(index, cpuIndex, keyspaceIndex) });
      }
    }
  }
  return planned;
}

export interface SessionSummary {
  total: number;
  succeeded: number;
  failed: number;
  bySeverity: Record<Severity, number>;
}

export class StressSession {
  private results?: InvocationResult[];

  constructor(
    private readonly orchestrator: StressOrchestrator,
    private readonly loaders: readonly LoaderNode[],
    private readonly config: StressConfig,
    private readonly rotation?: LoaderRotation
  ) {}

  async run(): Promise<InvocationResult[]> {
    if (this.results) {
      throw new StressBridgeError('Stress session was already run');
    }
    const planned = planInvocations(this.loaders, this.config, this.rotation);
    log.info('Starting stress session', { invocations: planned.length, loaders: this.loaders.length });

    this.results = await Promise.all(
      planned.map(({ loader, identity }) =>
        this.orchestrator.runStressInvocation(loader, identity.loaderIndex, identity.cpuIndex, identity.keyspaceIndex)
      )
    );
    const summary = this.summary();
    log.info('Stress session finished', { succeeded: summary.succeeded, failed: summary.failed });
    return this.results;
  }

  getResults(): InvocationResult[] {
    if (!this.results) {
      throw new StressBridgeError('Stress session has not been run');
    }
    return [...this.results];
  }

  summary(): SessionSummary {
    const results = this.getResults();
    const bySeverity: Record<Severity, number> = { NORMAL: 0, WARNING: 0, ERROR: 0, CRITICAL: 0 };
    for (const { event } of results) {
      bySeverity[event.severity]++;
    }
    const failed = results.filter(({ event }) => event.failureKind !== undefined).length;
    return { total: results.length, succeeded: results.length - failed, failed, bySeverity };
  }
}
