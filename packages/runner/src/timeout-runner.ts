/**
 * Timeout-Bounded Runner
 *
 * Runs one stress command inside an execution context. Crossing the soft
 * timeout is only reported; crossing the hard timeout aborts the command and
 * ends the run as a timeout failure.
 */

import {
  ExecutionError,
  ExecutionTimeoutError,
  createLogger,
  describeError,
  err,
  isExecutionFailure,
  ok,
  type ExecutionFailure,
  type Result,
} from '@stress-bridge/utils';
import type { ExecutionContext } from '@stress-bridge/sandbox';

const log = createLogger('runner');

export const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024;

/** Grace added on top of the soft timeout before the run is forcibly ended. */
export const HARD_TIMEOUT_GRACE_RATIO = 0.05;

/** Node.js fires longer timer delays after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function hardTimeoutFor(softTimeoutMs: number): number {
  return softTimeoutMs + Math.ceil(HARD_TIMEOUT_GRACE_RATIO * softTimeoutMs);
}

export type RunnableContext = Pick<ExecutionContext, 'id' | 'node' | 'exec'>;

export interface RunResult {
  exitCode: number;
  /** Tail of the combined output; the full output is in the log file. */
  output: string;
  logPath: string;
  durationMs: number;
  softTimeoutExceeded: boolean;
}

export interface SoftTimeoutInfo {
  operation: string;
  softTimeoutMs: number;
  elapsedMs: number;
  contextId: string;
  node: string;
}

export interface TimeoutBoundedRunnerOptions {
  maxOutputBytes?: number;
}

export interface RunHooks {
  /** Called once when the run outlives its soft timeout. */
  onSoftTimeout?: (info: SoftTimeoutInfo) => void;
}

const TIMED_OUT = Symbol('timed-out');

export class TimeoutBoundedRunner {
  private readonly maxOutputBytes: number;

  constructor(options: TimeoutBoundedRunnerOptions = {}) {
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  }

  async run(
    context: RunnableContext,
    command: string,
    softTimeoutMs: number,
    logPath: string,
    hooks: RunHooks = {}
  ): Promise<Result<RunResult, ExecutionFailure>> {
    const startedAt = Date.now();
    const hardTimeoutMs = hardTimeoutFor(softTimeoutMs);
    if (hardTimeoutMs > MAX_TIMER_DELAY_MS) {
      return err(
        new ExecutionError(
          `Hard timeout of ${hardTimeoutMs}ms for a ${softTimeoutMs}ms soft timeout exceeds the ${MAX_TIMER_DELAY_MS}ms timer limit`
        )
      );
    }
    const controller = new AbortController();
    let softTimeoutExceeded = false;
    let hardTimer: NodeJS.Timeout | undefined;

    const softTimer = setTimeout(() => {
      softTimeoutExceeded = true;
      notifySoftTimeout(hooks, {
        operation: command,
        softTimeoutMs,
        elapsedMs: Date.now() - startedAt,
        contextId: context.id,
        node: context.node,
      });
    }, softTimeoutMs);

    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      hardTimer = setTimeout(() => resolve(TIMED_OUT), hardTimeoutMs);
    });

    try {
      const execution = context.exec(command, {
        logPath,
        signal: controller.signal,
        maxOutputBytes: this.maxOutputBytes,
      });
      const outcome = await Promise.race([execution, deadline]);

      if (outcome === TIMED_OUT) {
        log.error('Stress command exceeded its hard timeout, aborting', {
          node: context.node,
          id: context.id,
          hardTimeoutMs,
        });
        controller.abort();
        void execution.then(
          (late) => log.debug('Aborted stress command exited', { id: context.id, exitCode: late.exitCode }),
          (error: unknown) => log.debug('Aborted stress command failed', { id: context.id, error: describeError(error) })
        );
        return err(new ExecutionTimeoutError(command, hardTimeoutMs));
      }

      if (outcome.exitCode !== 0) {
        return err(
          new ExecutionError(`Stress command exited with status ${outcome.exitCode}`, {
            exitCode: outcome.exitCode,
            output: outcome.output,
          })
        );
      }

      return ok({
        exitCode: outcome.exitCode,
        output: outcome.output,
        logPath,
        durationMs: Date.now() - startedAt,
        softTimeoutExceeded,
      });
    } catch (error) {
      if (isExecutionFailure(error)) {
        return err(error);
      }
      return err(
        new ExecutionError(`Stress command failed on ${context.node}: ${describeError(error)}`, {}, { cause: error })
      );
    } finally {
      clearTimeout(softTimer);
      clearTimeout(hardTimer);
    }
  }
}

function notifySoftTimeout(hooks: RunHooks, info: SoftTimeoutInfo): void {
  log.warn('Stress command exceeded its soft timeout', {
    node: info.node,
    id: info.contextId,
    softTimeoutMs: info.softTimeoutMs,
  });
  try {
    hooks.onSoftTimeout?.(info);
  } catch (error) {
    log.error('Soft timeout handler failed', { error: describeError(error) });
  }
}
