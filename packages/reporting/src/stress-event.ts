/**
 * Stress Event
 *
 * Built when an invocation starts, filled in if it fails, and published
 * once when it is over.
 */

import { randomUUID } from 'node:crypto';
import {
  ExecutionError,
  ExecutionTimeoutError,
  StressBridgeError,
  describeError,
  lastLines,
  type ExecutionFailure,
  type InvocationIdentity,
} from '@stress-bridge/utils';
import type { EventSink, FailureKind, Severity, SoftTimeoutEventRecord, StressEventRecord } from './types.js';

/** Exit status of a process killed by SIGKILL, which is how teardown stops a run. */
export const KILLED_EXIT_CODE = 137;

const OUTPUT_TAIL_LINES = 5;

export function formatFailure(failure: ExecutionFailure): string {
  if (failure instanceof ExecutionTimeoutError) {
    return `Stress command timed out after ${failure.timeoutMs}ms`;
  }
  if (failure instanceof ExecutionError && failure.exitCode !== undefined) {
    const tail = lastLines(failure.output, OUTPUT_TAIL_LINES);
    const message = `Stress command completed with bad status ${failure.exitCode}${tail ? `: ${tail}` : ''}`;
    return failure.exitCode === KILLED_EXIT_CODE ? `Stress killed by test/teardown: ${message}` : message;
  }
  return failure.message;
}

export function severityFor(failure: ExecutionFailure, stopTestOnFailure: boolean): Severity {
  if (failure instanceof ExecutionError && failure.exitCode === KILLED_EXIT_CODE) {
    return 'WARNING';
  }
  return stopTestOnFailure ? 'CRITICAL' : 'ERROR';
}

export interface StressEventInit {
  node: string;
  stressCmd: string;
  logFile: string;
  toolName: string;
  identity: InvocationIdentity;
  stopTestOnFailure: boolean;
}

export class StressEvent {
  readonly eventId = randomUUID();
  private readonly startedAt = new Date();
  private readonly errors: string[] = [];
  private severity: Severity = 'NORMAL';
  private failureKind?: FailureKind;
  private cause?: string;
  private recordedFailure?: ExecutionFailure;
  private published = false;

  constructor(private readonly init: StressEventInit) {}

  get isPublished(): boolean {
    return this.published;
  }

  get failed(): boolean {
    return this.failureKind !== undefined;
  }

  /** The failure as recorded, with its `cause` chain intact. */
  get failure(): ExecutionFailure | undefined {
    return this.recordedFailure;
  }

  recordFailure(failure: ExecutionFailure): void {
    this.recordedFailure = failure;
    this.errors.push(formatFailure(failure));
    this.severity = severityFor(failure, this.init.stopTestOnFailure);
    this.failureKind = failure.kind;
    if (failure.cause !== undefined) {
      this.cause = describeError(failure.cause);
    }
  }

  toRecord(finishedAt: Date = new Date()): StressEventRecord {
    return {
      kind: 'stress',
      eventId: this.eventId,
      type: this.init.toolName,
      node: this.init.node,
      stressCmd: this.init.stressCmd,
      logFile: this.init.logFile,
      identity: this.init.identity,
      severity: this.severity,
      errors: [...this.errors],
      ...(this.cause !== undefined && { cause: this.cause }),
      ...(this.failureKind !== undefined && { failureKind: this.failureKind }),
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    };
  }

  async publish(sink: EventSink): Promise<StressEventRecord> {
    if (this.published) {
      throw new StressBridgeError(`Stress event ${this.eventId} was already published`);
    }
    const record = this.toRecord();
    await sink.publish(record);
    this.published = true;
    return record;
  }
}

export interface SoftTimeoutDetails {
  operation: string;
  softTimeoutMs: number;
  elapsedMs: number;
  node: string;
  identity: InvocationIdentity;
}

export function createSoftTimeoutEvent(details: SoftTimeoutDetails): SoftTimeoutEventRecord {
  return { kind: 'soft-timeout', eventId: randomUUID(), severity: 'WARNING', ...details };
}
