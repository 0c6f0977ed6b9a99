/**
 * Sandbox Types
 *
 * A CommandTransport runs argv vectors on one node. A SandboxDriver builds
 * containers out of those commands; the provisioner hands the resulting
 * ExecutionContext to exactly one invocation.
 */

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
}

export interface StreamOptions extends RunOptions {
  onOutput: (chunk: string) => void;
  signal?: AbortSignal;
}

export interface CommandTransport {
  readonly node: string;
  /** Run to completion, buffering both output streams. */
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>;
  /** Run to completion, delivering stdout and stderr chunks as they arrive. */
  stream(argv: readonly string[], options: StreamOptions): Promise<{ exitCode: number }>;
}

export interface SandboxSpec {
  node: string;
  image: string;
  /** Pin the container to this CPU. */
  cpuAffinity?: number;
  /** Label used to find containers left behind by a session. */
  marker: string;
}

export interface SandboxHandle {
  id: string;
  node: string;
}

export interface SandboxExecOptions {
  /** Combined output is appended here as it is produced. */
  logPath: string;
  signal?: AbortSignal;
  /** Size of the output tail kept in memory. */
  maxOutputBytes: number;
}

export interface SandboxExecResult {
  exitCode: number;
  output: string;
}

export interface SandboxDriver {
  start(spec: SandboxSpec): Promise<SandboxHandle>;
  exec(handle: SandboxHandle, shellCommand: string, options: SandboxExecOptions): Promise<SandboxExecResult>;
  stop(handle: SandboxHandle): Promise<void>;
}

export type ContextRequest = SandboxSpec;

export interface ExecutionContext {
  readonly id: string;
  readonly node: string;
  readonly image: string;
  readonly cpuAffinity?: number;
  readonly marker: string;
  readonly released: boolean;
  exec(shellCommand: string, options: SandboxExecOptions): Promise<SandboxExecResult>;
}
