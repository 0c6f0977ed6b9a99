import path from 'node:path';
import { ConfigError, logFileId, type InvocationIdentity } from '@stress-bridge/utils';

/** The stress operation (`write`, `read`, `mixed`, ...) that follows the tool name. */
export function extractSubcommand(command: string, toolName: string): string {
  const index = command.indexOf(toolName);
  if (index === -1) {
    throw new ConfigError(`Stress command does not invoke ${toolName}`, [command]);
  }
  const [subcommand] = command.slice(index + toolName.length).trim().split(/\s+/, 1);
  if (!subcommand) {
    throw new ConfigError(`Stress command has no ${toolName} subcommand`, [command]);
  }
  return subcommand;
}

export function buildLogFileName(toolName: string, subcommand: string, identity: InvocationIdentity): string {
  return `${toolName}-${subcommand}-${logFileId(identity)}.log`;
}

export function buildLogFilePath(
  logDir: string,
  toolName: string,
  subcommand: string,
  identity: InvocationIdentity
): string {
  return path.join(logDir, buildLogFileName(toolName, subcommand, identity));
}
