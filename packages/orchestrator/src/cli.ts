/**
 * stress-bridge CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import { readSessionFile } from '@stress-bridge/config';
import { CqlStressDialect } from '@stress-bridge/dialect';
import { createStressSession } from './bootstrap.js';
import type { InvocationResult } from './orchestrator.js';

export const VERSION = '0.1.0';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

interface TranslateOptions {
  keyspaceIndex: number;
  keyspaceName?: string;
  compaction?: string;
  nodes: string[];
}

interface RunOptions {
  session: string;
  metrics: boolean;
}

export function summarizeInvocation(invocation: InvocationResult): Record<string, unknown> {
  const { event } = invocation;
  return {
    loader: invocation.loader.name,
    identity: invocation.identity,
    severity: event.severity,
    errors: event.errors,
    logFile: event.logFile,
    durationMs: invocation.result?.durationMs,
    softTimeoutExceeded: invocation.result?.softTimeoutExceeded,
    states: invocation.states,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stress-bridge')
    .description('Run cql-stress workloads against a database cluster from loader nodes')
    .version(VERSION)
    .enablePositionalOptions();

  program
    .command('translate')
    .description('Print a cassandra-stress command line rewritten for cql-stress')
    .argument('<command...>', 'Stress command line, starting with the tool name')
    .option('-k, --keyspace-index <n>', 'Keyspace index used when the command names no keyspace', parseInteger, 1)
    .option('--keyspace-name <name>', 'Keyspace name overriding the command')
    .option('--compaction <strategy>', 'Compaction strategy to add to the schema')
    .option('--nodes <list>', 'Comma-separated target node addresses', parseList, [])
    .passThroughOptions()
    .action((words: string[], options: TranslateOptions) => {
      const dialect = new CqlStressDialect();
      console.log(
        dialect.translate(words.join(' '), {
          keyspaceIndex: options.keyspaceIndex,
          keyspaceName: options.keyspaceName,
          compactionStrategy: options.compaction,
          nodeList: options.nodes,
        })
      );
    });

  program
    .command('run')
    .description('Run a stress session described by a JSON file')
    .requiredOption('-s, --session <path>', 'Path to the session file')
    .option('--metrics', 'Print the collected metrics in Prometheus format afterwards', false)
    .action(async (options: RunOptions) => {
      const { session, metricsRegistry } = createStressSession(readSessionFile(options.session));
      const results = await session.run();
      for (const invocation of results) {
        console.log(JSON.stringify(summarizeInvocation(invocation)));
      }
      if (options.metrics) {
        console.log(metricsRegistry.toPrometheus());
      }
      if (session.summary().failed > 0) {
        process.exitCode = 1;
      }
    });

  return program;
}
