/**
 * cql-stress dialect
 *
 * Rewrites cassandra-stress syntax into what cql-stress-cassandra-stress
 * accepts. Only the flags whose syntax differs between the two tools are
 * touched; clauses absent from the input are never added, except the target
 * node list.
 */

import { createLogger } from '@stress-bridge/utils';
import type { DialectTranslator, TranslationContext } from './types.js';

const log = createLogger('translator');

export const CQL_STRESS_TOOL = 'cql-stress-cassandra-stress';

const SCHEMA_CLAUSE = ' -schema ';
const KEYSPACE_ASSIGNMENT = /\bkeyspace=[^\s']*/g;

/** `n=FIXED(k)`, optionally quoted: cql-stress takes a plain column count. */
const FIXED_COLUMN_COUNT = / ('?)n=\s*fixed\(([0-9]+)\)('?)/gi;

/** `fixed=N/s`: in cql-stress `fixed` is a boolean asking for coordination-omission corrected latencies. */
const FIXED_RATE = / fixed=\s*([0-9]+\/s)/g;

/** `seq=a..b` has no cql-stress equivalent; the SEQ distribution expresses the same population. */
const SEQUENCE_POPULATION = / seq=\s*(\d+\.\.\d+)/g;

type RewriteRule = (command: string, context: TranslationContext) => string;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class CqlStressDialect implements DialectTranslator {
  readonly toolName: string;
  private readonly rules: RewriteRule[];
  private readonly subcommandPattern: RegExp;

  constructor(toolName: string = CQL_STRESS_TOOL) {
    this.toolName = toolName;
    this.subcommandPattern = new RegExp(`(${escapeRegExp(toolName)} \\w+)`, 'g');
    // Order matters: later rules inspect what earlier ones produced
    this.rules = [
      (command) => this.disableWarmup(command),
      injectKeyspace,
      injectCompaction,
      rewriteColumnCount,
      rewriteRate,
      rewritePopulation,
      injectTargetNodes,
    ];
  }

  translate(command: string, context: TranslationContext): string {
    return this.rules.reduce((current, rule) => rule(current, context), command);
  }

  private disableWarmup(command: string): string {
    if (command.includes('no-warmup')) {
      return command;
    }
    return command.replace(this.subcommandPattern, '$1 no-warmup');
  }
}

function injectKeyspace(command: string, context: TranslationContext): string {
  const { keyspaceName } = context;
  if (keyspaceName) {
    if (command.includes('keyspace=')) {
      return command.replace(KEYSPACE_ASSIGNMENT, () => `keyspace=${keyspaceName}`);
    }
    return command.replaceAll(SCHEMA_CLAUSE, () => ` -schema keyspace=${keyspaceName} `);
  }
  // A keyspace already named in the command is respected
  if (command.includes('keyspace=')) {
    return command;
  }
  return command.replaceAll(SCHEMA_CLAUSE, () => ` -schema keyspace=keyspace${context.keyspaceIndex} `);
}

function injectCompaction(command: string, context: TranslationContext): string {
  const { compactionStrategy } = context;
  if (!compactionStrategy || command.includes('compaction(')) {
    return command;
  }
  return command.replaceAll(SCHEMA_CLAUSE, () => ` -schema 'compaction(strategy=${compactionStrategy})' `);
}

function rewriteColumnCount(command: string): string {
  if (!command.includes('-col')) {
    return command;
  }
  return command.replace(FIXED_COLUMN_COUNT, ' $1n=$2$3');
}

function rewriteRate(command: string): string {
  if (!command.includes('-rate')) {
    return command;
  }
  return command.replace(FIXED_RATE, ' throttle=$1 fixed');
}

function rewritePopulation(command: string): string {
  if (!command.includes('-pop')) {
    return command;
  }
  return command.replace(SEQUENCE_POPULATION, " 'dist=SEQ($1)'");
}

function injectTargetNodes(command: string, context: TranslationContext): string {
  const nodeList = context.nodeList ?? [];
  // An explicit -node flag wins over the supplied node list
  if (nodeList.length === 0 || command.includes('-node')) {
    return command;
  }

  let result = `${command} -node `;
  if (context.multiRegion) {
    const region = context.loaderRegion ?? '';
    const datacenter = context.resolveDatacenter?.(region);
    if (datacenter) {
      result += `datacenter=${datacenter} `;
    } else {
      log.error('Datacenter not found for loader region, targeting nodes without it', {
        region,
        nodes: nodeList.join(','),
      });
    }
  }
  return result + nodeList.join(',');
}
