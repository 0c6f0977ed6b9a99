/**
 * Command transports
 *
 * Loader nodes are reached either directly (the orchestrator runs on the
 * loader) or over ssh. Both spawn a local process; the ssh transport wraps the
 * argv into a single quoted remote command.
 */

import type { TransportConfig } from '@stress-bridge/config';
import { quoteShellCommand } from '@stress-bridge/utils';
import { spawnCommand } from './spawn-command.js';
import type { CommandResult, CommandTransport, RunOptions, StreamOptions } from './types.js';

abstract class SpawnTransport implements CommandTransport {
  constructor(readonly node: string) {}

  protected abstract wrap(argv: readonly string[]): string[];

  run(argv: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    return spawnCommand(this.wrap(argv), { timeoutMs: options.timeoutMs });
  }

  async stream(argv: readonly string[], options: StreamOptions): Promise<{ exitCode: number }> {
    const { exitCode } = await spawnCommand(this.wrap(argv), {
      onOutput: options.onOutput,
      signal: options.signal,
      timeoutMs: options.timeoutMs,
    });
    return { exitCode };
  }
}

export class LocalTransport extends SpawnTransport {
  constructor(node = 'localhost') {
    super(node);
  }

  protected wrap(argv: readonly string[]): string[] {
    return [...argv];
  }
}

export interface SshTransportOptions {
  host: string;
  user: string;
  keyPath?: string;
  port?: number;
}

export class SshTransport extends SpawnTransport {
  private readonly options: SshTransportOptions;

  constructor(options: SshTransportOptions) {
    super(options.host);
    this.options = options;
  }

  protected wrap(argv: readonly string[]): string[] {
    const { host, user, keyPath, port } = this.options;
    return [
      'ssh',
      ...(keyPath ? ['-i', keyPath] : []),
      ...(port !== undefined ? ['-p', String(port)] : []),
      '-o',
      'BatchMode=yes',
      `${user}@${host}`,
      quoteShellCommand(argv),
    ];
  }
}

/** Build the transport for one loader address from the session's transport settings. */
export function createTransport(config: TransportConfig, host: string): CommandTransport {
  switch (config.type) {
    case 'local':
      return new LocalTransport(host);
    case 'ssh':
      return new SshTransport({ host, user: config.user, keyPath: config.keyPath, port: config.port });
  }
}
