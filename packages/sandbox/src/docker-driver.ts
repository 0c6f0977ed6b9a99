/**
 * Docker sandbox driver
 *
 * Each invocation gets its own idle container on the loader; the stress
 * command is then exec'd into it. Host networking keeps the tool's view of
 * the cluster identical to the loader's.
 */

import fs from 'node:fs';
import {
  ProvisioningError,
  StressBridgeError,
  createLogger,
  describeError,
  keepTail,
} from '@stress-bridge/utils';
import type {
  CommandResult,
  CommandTransport,
  SandboxDriver,
  SandboxExecOptions,
  SandboxExecResult,
  SandboxHandle,
  SandboxSpec,
} from './types.js';

const log = createLogger('docker');

export interface DockerSandboxDriverOptions {
  startTimeoutMs?: number;
  stopTimeoutMs?: number;
}

export const DEFAULT_DOCKER_START_TIMEOUT_MS = 120_000;
export const DEFAULT_DOCKER_STOP_TIMEOUT_MS = 60_000;

export function dockerRunArgs(spec: SandboxSpec): string[] {
  return [
    'docker',
    'run',
    '-d',
    ...(spec.cpuAffinity !== undefined ? [`--cpuset-cpus=${spec.cpuAffinity}`] : []),
    '--network=host',
    '--label',
    `shell_marker=${spec.marker}`,
    '--entrypoint',
    '/bin/bash',
    spec.image,
    '-c',
    'tail -f /dev/null',
  ];
}

export class DockerSandboxDriver implements SandboxDriver {
  private readonly startTimeoutMs: number;
  private readonly stopTimeoutMs: number;

  constructor(
    private readonly transportFor: (node: string) => CommandTransport,
    options: DockerSandboxDriverOptions = {}
  ) {
    this.startTimeoutMs = options.startTimeoutMs ?? DEFAULT_DOCKER_START_TIMEOUT_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_DOCKER_STOP_TIMEOUT_MS;
  }

  async start(spec: SandboxSpec): Promise<SandboxHandle> {
    const transport = this.transportFor(spec.node);
    let result: CommandResult;
    try {
      result = await transport.run(dockerRunArgs(spec), { timeoutMs: this.startTimeoutMs });
    } catch (error) {
      throw new ProvisioningError(spec.node, describeError(error), { cause: error });
    }

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || `docker run exited with status ${result.exitCode}`;
      throw new ProvisioningError(spec.node, reason);
    }
    const id = result.stdout.trim().split('\n').pop()?.trim();
    if (!id) {
      throw new ProvisioningError(spec.node, 'docker run printed no container id');
    }

    log.debug('Container started', { node: spec.node, id, image: spec.image });
    return { id, node: spec.node };
  }

  async exec(handle: SandboxHandle, shellCommand: string, options: SandboxExecOptions): Promise<SandboxExecResult> {
    const transport = this.transportFor(handle.node);
    const logStream = fs.createWriteStream(options.logPath, { flags: 'a' });
    let logError: Error | undefined;
    logStream.on('error', (error) => {
      logError = error;
    });

    let output = '';
    try {
      const { exitCode } = await transport.stream(['docker', 'exec', handle.id, '/bin/bash', '-c', shellCommand], {
        signal: options.signal,
        onOutput: (chunk) => {
          if (!logError) logStream.write(chunk);
          output = keepTail(output, chunk, options.maxOutputBytes);
        },
      });
      return { exitCode, output };
    } finally {
      await new Promise<void>((resolve) => logStream.end(() => resolve()));
      if (logError) {
        log.warn('Stress output could not be written to its log file', {
          logPath: options.logPath,
          error: logError,
        });
      }
    }
  }

  async stop(handle: SandboxHandle): Promise<void> {
    const transport = this.transportFor(handle.node);
    const result = await transport.run(['docker', 'rm', '-f', handle.id], { timeoutMs: this.stopTimeoutMs });
    if (result.exitCode !== 0) {
      throw new StressBridgeError(
        `Failed to remove container ${handle.id} on ${handle.node}: ${result.stderr.trim() || `exit status ${result.exitCode}`}`
      );
    }
    log.debug('Container removed', { node: handle.node, id: handle.id });
  }
}
