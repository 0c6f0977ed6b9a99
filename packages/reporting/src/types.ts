import type { InvocationIdentity } from '@stress-bridge/utils';

export type Severity = 'NORMAL' | 'WARNING' | 'ERROR' | 'CRITICAL';

export type FailureKind = 'provisioning' | 'timeout' | 'execution';

/** Outcome of one stress invocation; exactly one per invocation. */
export interface StressEventRecord {
  kind: 'stress';
  eventId: string;
  /** Tool the event is about, e.g. `cql-stress-cassandra-stress`. */
  type: string;
  node: string;
  /** The command as configured, before translation. */
  stressCmd: string;
  logFile: string;
  identity: InvocationIdentity;
  severity: Severity;
  errors: string[];
  cause?: string;
  failureKind?: FailureKind;
  startedAt: string;
  finishedAt: string;
}

/** Published while the run continues past its soft timeout. */
export interface SoftTimeoutEventRecord {
  kind: 'soft-timeout';
  eventId: string;
  severity: 'WARNING';
  operation: string;
  softTimeoutMs: number;
  elapsedMs: number;
  node: string;
  identity: InvocationIdentity;
}

export type EventRecord = StressEventRecord | SoftTimeoutEventRecord;

export interface EventSink {
  publish(event: EventRecord): void | Promise<void>;
}
