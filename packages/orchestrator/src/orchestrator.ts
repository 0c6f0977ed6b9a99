/**
 * Stress Orchestrator
 *
 * Sequences one invocation: translate, provision, run, release, report.
 * Run failures end up in the published event; only misconfiguration throws.
 */

import { mkdir } from 'node:fs/promises';
import type { DbNode, LoaderNode, StressConfig } from '@stress-bridge/config';
import { buildLogFilePath, extractSubcommand, type DialectTranslator } from '@stress-bridge/dialect';
import {
  MetricsRegistry,
  StressEvent,
  StressMetricsExporter,
  type StressEventRecord,
  type StressReporter,
} from '@stress-bridge/reporting';
import { TimeoutBoundedRunner, type RunResult, type SoftTimeoutInfo } from '@stress-bridge/runner';
import type { ExecutionContextProvisioner } from '@stress-bridge/sandbox';
import {
  ExecutionError,
  ProvisioningError,
  createIdentity,
  createLogger,
  describeError,
  err,
  shellTag,
  type ExecutionFailure,
  type InvocationIdentity,
  type Result,
} from '@stress-bridge/utils';
import { InvocationStateMachine, type InvocationState } from './state-machine.js';
import type { ClusterTopology } from './topology.js';

const log = createLogger('orchestrator');

export interface StressOrchestratorDeps {
  config: StressConfig;
  dialect: DialectTranslator;
  provisioner: ExecutionContextProvisioner;
  reporter: StressReporter;
  dbNodes?: readonly DbNode[];
  runner?: TimeoutBoundedRunner;
  metricsRegistry?: MetricsRegistry;
  topology?: ClusterTopology;
  /** Label put on every container of this orchestrator. */
  marker: string;
}

export interface InvocationResult {
  loader: LoaderNode;
  identity: InvocationIdentity;
  /** Present when the run exited cleanly. */
  result?: RunResult;
  /** Present when it did not; the original error stays on `cause`. */
  error?: ExecutionFailure;
  event: StressEventRecord;
  states: readonly InvocationState[];
}

export function buildShellCommand(
  command: string,
  identity: InvocationIdentity,
  marker: string,
  pinCpu: boolean
): string {
  const taskset = pinCpu ? `taskset -c ${identity.cpuIndex} ` : '';
  return `echo ${shellTag(identity)}; STRESS_TEST_MARKER=${marker}; ${taskset}${command}`;
}

export class StressOrchestrator {
  private readonly runner: TimeoutBoundedRunner;
  readonly metricsRegistry: MetricsRegistry;

  constructor(private readonly deps: StressOrchestratorDeps) {
    this.runner = deps.runner ?? new TimeoutBoundedRunner({ maxOutputBytes: deps.config.maxOutputBytes });
    this.metricsRegistry = deps.metricsRegistry ?? new MetricsRegistry();
  }

  async runStressInvocation(
    loader: LoaderNode,
    loaderIndex: number,
    cpuIndex: number,
    keyspaceIndex: number
  ): Promise<InvocationResult> {
    const { config, dialect, provisioner, reporter, marker } = this.deps;
    const identity = createIdentity(loaderIndex, cpuIndex, keyspaceIndex);
    const machine = new InvocationStateMachine();
    const pinCpu = config.stressNum > 1;

    machine.transition('translating');
    const operation = extractSubcommand(config.stressCmd, dialect.toolName);
    const logFile = buildLogFilePath(loader.logDir, dialect.toolName, operation, identity);
    const event = new StressEvent({
      node: loader.name,
      stressCmd: config.stressCmd,
      logFile,
      toolName: dialect.toolName,
      identity,
      stopTestOnFailure: config.stopTestOnFailure,
    });
    const datacenters = config.multiRegion ? await this.datacenterNamePerRegion() : {};
    const command = dialect.translate(config.stressCmd, {
      keyspaceIndex,
      keyspaceName: config.keyspaceName || undefined,
      compactionStrategy: config.compactionStrategy || undefined,
      nodeList: (this.deps.dbNodes ?? []).map((node) => node.cqlAddress),
      multiRegion: config.multiRegion,
      loaderRegion: loader.region,
      resolveDatacenter: (region) => datacenters[region],
    });
    log.info('Stress command', { loader: loader.name, logFile, command });
    const shellCommand = buildShellCommand(command, identity, marker, pinCpu);

    machine.transition('provisioning');
    const softTimeoutReports: Promise<unknown>[] = [];
    const onSoftTimeout = (info: SoftTimeoutInfo): void => {
      softTimeoutReports.push(
        reporter
          .reportSoftTimeout({
            operation: dialect.toolName,
            softTimeoutMs: info.softTimeoutMs,
            elapsedMs: info.elapsedMs,
            node: loader.name,
            identity,
          })
          .catch((error: unknown) => {
            log.error('Failed to publish soft timeout event', { loader: loader.name, error: describeError(error) });
          })
      );
    };

    let outcome: Result<RunResult, ExecutionFailure>;
    try {
      await this.ensureLogDir(loader);
      outcome = await provisioner.withContext(
        {
          node: loader.ipAddress,
          image: config.image,
          cpuAffinity: pinCpu ? cpuIndex : undefined,
          marker,
        },
        async (context) => {
          machine.transition('running');
          const exporter = new StressMetricsExporter({
            instanceName: loader.ipAddress,
            registry: this.metricsRegistry,
            operation,
            logFile,
            loaderIndex,
            cpuIndex,
            pollIntervalMs: config.metricsPollIntervalMs,
          });
          exporter.start();
          try {
            return await this.runner.run(context, shellCommand, config.timeoutMs, logFile, { onSoftTimeout });
          } finally {
            await exporter.stop();
          }
        }
      );
    } catch (error) {
      outcome = err(
        error instanceof ProvisioningError
          ? error
          : new ExecutionError(`Stress invocation failed on ${loader.name}: ${describeError(error)}`, {}, { cause: error })
      );
    }

    if (!outcome.ok) {
      log.warn('Stress invocation failed', {
        loader: loader.name,
        identity: `${loaderIndex}/${cpuIndex}/${keyspaceIndex}`,
        error: outcome.error,
      });
      machine.transition('failed');
    }
    machine.transition('reporting');
    await Promise.all(softTimeoutReports);
    let record: StressEventRecord;
    try {
      record = await reporter.report(event, outcome);
    } catch (error) {
      log.error('Failed to publish stress event', {
        loader: loader.name,
        eventId: event.eventId,
        error: describeError(error),
      });
      record = event.toRecord();
    }
    machine.transition('done');

    return {
      loader,
      identity,
      ...(outcome.ok ? { result: outcome.value } : { error: outcome.error }),
      event: record,
      states: machine.history,
    };
  }

  private async datacenterNamePerRegion(): Promise<Record<string, string>> {
    if (!this.deps.topology) {
      log.error('Multi-region stress requested without a cluster topology');
      return {};
    }
    try {
      return await this.deps.topology.datacenterNamePerRegion();
    } catch (error) {
      log.error('Failed to look up datacenters per region', { error: describeError(error) });
      return {};
    }
  }

  private async ensureLogDir(loader: LoaderNode): Promise<void> {
    try {
      await mkdir(loader.logDir, { recursive: true });
    } catch (error) {
      throw new ProvisioningError(loader.name, `cannot create log directory ${loader.logDir}`, { cause: error });
    }
  }
}
