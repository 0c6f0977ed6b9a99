import { z } from 'zod';

export const DEFAULT_STRESS_IMAGE = 'scylladb/cql-stress:0.2.0';

/** Longest soft timeout whose hard deadline still fits a Node.js timer (2^31-1 ms). */
export const MAX_TIMEOUT_MS = 2_045_222_520;

export const DEFAULT_STRESS_CONFIG = {
  stressNum: 1,
  keyspaceNum: 1,
  keyspaceName: '',
  compactionStrategy: '',
  roundRobin: false,
  stopTestOnFailure: true,
  image: DEFAULT_STRESS_IMAGE,
  multiRegion: false,
  maxOutputBytes: 64 * 1024,
  metricsPollIntervalMs: 1000,
} as const;

export const StressConfigSchema = z.object({
  // Not trimmed: rewrite rules match on surrounding spaces such as ' -schema '
  stressCmd: z.string().regex(/\S/, 'must not be blank'),
  /** Soft timeout; the hard kill deadline is derived from it. */
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
  stressNum: z.number().int().min(1).default(DEFAULT_STRESS_CONFIG.stressNum),
  keyspaceNum: z.number().int().min(1).default(DEFAULT_STRESS_CONFIG.keyspaceNum),
  keyspaceName: z.string().default(DEFAULT_STRESS_CONFIG.keyspaceName),
  compactionStrategy: z.string().default(DEFAULT_STRESS_CONFIG.compactionStrategy),
  roundRobin: z.boolean().default(DEFAULT_STRESS_CONFIG.roundRobin),
  stopTestOnFailure: z.boolean().default(DEFAULT_STRESS_CONFIG.stopTestOnFailure),
  image: z.string().min(1).default(DEFAULT_STRESS_CONFIG.image),
  multiRegion: z.boolean().default(DEFAULT_STRESS_CONFIG.multiRegion),
  shellMarker: z.string().regex(/^[A-Za-z0-9_-]+$/).optional(),
  maxOutputBytes: z.number().int().positive().default(DEFAULT_STRESS_CONFIG.maxOutputBytes),
  metricsPollIntervalMs: z.number().int().positive().default(DEFAULT_STRESS_CONFIG.metricsPollIntervalMs),
});

export const LoaderNodeSchema = z.object({
  name: z.string().min(1),
  ipAddress: z.string().min(1),
  region: z.string().default(''),
  logDir: z.string().min(1),
});

export const DbNodeSchema = z.object({
  name: z.string().min(1),
  cqlAddress: z.string().min(1),
  region: z.string().optional(),
});

export const TransportConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('local') }),
  z.object({
    type: z.literal('ssh'),
    user: z.string().min(1),
    keyPath: z.string().optional(),
    port: z.number().int().positive().optional(),
  }),
]);

export const SessionFileSchema = z.object({
  // Defaults and required fields are applied later, beneath env overrides
  stress: StressConfigSchema.partial(),
  loaders: z.array(LoaderNodeSchema).min(1),
  dbNodes: z.array(DbNodeSchema).default([]),
  transport: TransportConfigSchema.default({ type: 'local' }),
  /** Region name -> datacenter name, used for multi-region node targeting. */
  datacenters: z.record(z.string()).default({}),
});

export type StressConfig = z.infer<typeof StressConfigSchema>;
export type StressConfigInput = z.input<typeof StressConfigSchema>;
export type LoaderNode = z.infer<typeof LoaderNodeSchema>;
export type DbNode = z.infer<typeof DbNodeSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type SessionFile = Omit<z.infer<typeof SessionFileSchema>, 'stress'> & { stress: StressConfig };
