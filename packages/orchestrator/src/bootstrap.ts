import { randomUUID } from 'node:crypto';
import type { SessionFile } from '@stress-bridge/config';
import { CqlStressDialect, extractSubcommand } from '@stress-bridge/dialect';
import { LoggerEventSink, MetricsRegistry, StressReporter, type EventSink } from '@stress-bridge/reporting';
import {
  DockerSandboxDriver,
  ExecutionContextProvisioner,
  createTransport,
  type CommandTransport,
  type SandboxDriver,
} from '@stress-bridge/sandbox';
import { StressOrchestrator } from './orchestrator.js';
import { StressSession, type LoaderRotation } from './session.js';
import { StaticTopology } from './topology.js';

export interface StressSessionOptions {
  /** Defaults to docker over the session's transport. */
  driver?: SandboxDriver;
  /** Defaults to logging every event. */
  sink?: EventSink;
  metricsRegistry?: MetricsRegistry;
  rotation?: LoaderRotation;
}

export interface StressSessionRuntime {
  session: StressSession;
  orchestrator: StressOrchestrator;
  metricsRegistry: MetricsRegistry;
}

/** Wire a validated session file into a runnable session. */
export function createStressSession(file: SessionFile, options: StressSessionOptions = {}): StressSessionRuntime {
  const dialect = new CqlStressDialect();
  // Reject a command the dialect cannot name a log file for before anything starts
  extractSubcommand(file.stress.stressCmd, dialect.toolName);

  const transports = new Map<string, CommandTransport>();
  const transportFor = (host: string): CommandTransport => {
    let transport = transports.get(host);
    if (!transport) {
      transport = createTransport(file.transport, host);
      transports.set(host, transport);
    }
    return transport;
  };

  const metricsRegistry = options.metricsRegistry ?? new MetricsRegistry();
  const orchestrator = new StressOrchestrator({
    config: file.stress,
    dialect,
    provisioner: new ExecutionContextProvisioner(options.driver ?? new DockerSandboxDriver(transportFor)),
    reporter: new StressReporter(options.sink ?? new LoggerEventSink()),
    dbNodes: file.dbNodes,
    metricsRegistry,
    topology: new StaticTopology(file.datacenters),
    marker: file.stress.shellMarker ?? randomUUID(),
  });

  return {
    session: new StressSession(orchestrator, file.loaders, file.stress, options.rotation),
    orchestrator,
    metricsRegistry,
  };
}
