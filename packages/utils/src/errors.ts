/**
 * Error Types for stress-bridge
 *
 * Single source of truth for typed error classes. Run failures keep the
 * original error on `cause` and carry a `kind` so reporters can match on it.
 */

export class StressBridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StressBridgeError';
  }
}

export class ConfigError extends StressBridgeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InvalidTransitionError extends StressBridgeError {
  constructor(from: string, to: string) {
    super(`Invalid invocation state transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ProvisioningError extends StressBridgeError {
  readonly kind = 'provisioning' as const;
  readonly node: string;

  constructor(node: string, reason: string, options?: ErrorOptions) {
    super(`Failed to provision sandbox on ${node}: ${reason}`, options);
    this.name = 'ProvisioningError';
    this.node = node;
  }
}

export class ExecutionTimeoutError extends StressBridgeError {
  readonly kind = 'timeout' as const;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`, options);
    this.name = 'ExecutionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface ExecutionErrorDetails {
  exitCode?: number;
  output?: string;
}

export class ExecutionError extends StressBridgeError {
  readonly kind = 'execution' as const;
  readonly exitCode?: number;
  readonly output: string;

  constructor(message: string, details: ExecutionErrorDetails = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExecutionError';
    this.exitCode = details.exitCode;
    this.output = details.output ?? '';
  }
}

/** Every way a single stress run can fail once translation is done. */
export type ExecutionFailure = ProvisioningError | ExecutionTimeoutError | ExecutionError;

export function isExecutionFailure(value: unknown): value is ExecutionFailure {
  return (
    value instanceof ProvisioningError ||
    value instanceof ExecutionTimeoutError ||
    value instanceof ExecutionError
  );
}

/** One-line description of any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
