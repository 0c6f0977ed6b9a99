import { spawn } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';
import { ExecutionTimeoutError } from '@stress-bridge/utils';

export const DEFAULT_KILL_GRACE_MS = 5000;

export interface SpawnCommandOptions {
  /** When set, output is handed over as it arrives instead of being buffered. */
  onOutput?: (chunk: string) => void;
  signal?: AbortSignal;
  timeoutMs?: number;
  killGraceMs?: number;
}

export interface SpawnCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Spawn a local process and wait for it to close.
 *
 * Abort and timeout both send SIGTERM, then SIGKILL once the grace period
 * runs out. An aborted command resolves with whatever exit code it ends with;
 * a timed out one rejects with ExecutionTimeoutError.
 */
export function spawnCommand(argv: readonly string[], options: SpawnCommandOptions = {}): Promise<SpawnCommandResult> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error('Cannot spawn an empty command'));
  }
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let deadline: NodeJS.Timeout | undefined;
    let forceKill: NodeJS.Timeout | undefined;

    const terminate = (): void => {
      if (child.exitCode !== null || child.signalCode !== null || forceKill) return;
      child.kill('SIGTERM');
      forceKill = setTimeout(() => {
        child.kill('SIGKILL');
      }, killGraceMs);
    };

    const cleanup = (): void => {
      if (deadline) clearTimeout(deadline);
      if (forceKill) clearTimeout(forceKill);
      options.signal?.removeEventListener('abort', terminate);
    };

    // Multi-byte characters may straddle chunks
    const stdoutDecoder = new StringDecoder('utf8');
    const stderrDecoder = new StringDecoder('utf8');
    const emitStdout = (text: string): void => {
      if (!text) return;
      if (options.onOutput) options.onOutput(text);
      else stdout += text;
    };
    const emitStderr = (text: string): void => {
      if (!text) return;
      if (options.onOutput) options.onOutput(text);
      else stderr += text;
    };

    child.stdout?.on('data', (data: Buffer) => emitStdout(stdoutDecoder.write(data)));
    child.stderr?.on('data', (data: Buffer) => emitStderr(stderrDecoder.write(data)));

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });

    child.on('close', (code, signal) => {
      cleanup();
      emitStdout(stdoutDecoder.end());
      emitStderr(stderrDecoder.end());
      if (timedOut && options.timeoutMs !== undefined) {
        reject(new ExecutionTimeoutError(argv.join(' '), options.timeoutMs));
        return;
      }
      resolve({ exitCode: code ?? (signal === 'SIGKILL' ? 137 : 1), stdout, stderr });
    });

    if (options.timeoutMs !== undefined) {
      deadline = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs);
    }

    if (options.signal?.aborted) {
      terminate();
    } else {
      options.signal?.addEventListener('abort', terminate, { once: true });
    }
  });
}
