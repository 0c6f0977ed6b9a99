/**
 * Dialect Types
 *
 * A dialect rewrites a legacy stress command line into the syntax its tool
 * accepts. The orchestrator is parameterised by one of these.
 */

export interface TranslationContext {
  /** Index of the keyspace this invocation loads (1-based within a session). */
  keyspaceIndex: number;
  /** Explicit keyspace name; wins over anything in the command. */
  keyspaceName?: string;
  compactionStrategy?: string;
  /** CQL addresses of the target database nodes. */
  nodeList?: readonly string[];
  multiRegion?: boolean;
  loaderRegion?: string;
  /** Maps a loader region to the datacenter name the cluster reports for it. */
  resolveDatacenter?: (region: string) => string | undefined;
}

export interface DialectTranslator {
  /** Executable name the command line starts with, e.g. `cql-stress-cassandra-stress`. */
  readonly toolName: string;
  translate(command: string, context: TranslationContext): string;
}
