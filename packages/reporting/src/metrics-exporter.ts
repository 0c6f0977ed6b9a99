/**
 * Stress Metrics Exporter
 *
 * Follows a stress log while the run lasts and turns the tool's periodic
 * `total,` summary lines into gauges.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import { createLogger, describeError } from '@stress-bridge/utils';
import type { MetricsRegistry } from './metrics-registry.js';

const log = createLogger('metrics');

export const STRESS_GAUGE = 'cql_stress_cassandra_stress_gauge';

export type StressMetricType =
  | 'ops'
  | 'lat_mean'
  | 'lat_med'
  | 'lat_perc_95'
  | 'lat_perc_99'
  | 'lat_perc_999'
  | 'lat_max'
  | 'errors';

// Column positions in a `total, ops, op/s, pk/s, row/s, mean, med, .95, .99, .999, max, time, stderr, errors, ...` line
const METRIC_COLUMNS: ReadonlyArray<readonly [StressMetricType, number]> = [
  ['ops', 2],
  ['lat_mean', 5],
  ['lat_med', 6],
  ['lat_perc_95', 7],
  ['lat_perc_99', 8],
  ['lat_perc_999', 9],
  ['lat_max', 10],
  ['errors', 13],
];

export const DEFAULT_METRICS_POLL_INTERVAL_MS = 1000;
const READ_CHUNK_BYTES = 64 * 1024;

export type StressSample = Partial<Record<StressMetricType, number>>;

export function parseTotalLine(line: string): StressSample | undefined {
  if (!line.startsWith('total,')) {
    return undefined;
  }
  const fields = line.split(',').map((field) => field.trim());
  const sample: StressSample = {};
  let found = false;
  for (const [type, column] of METRIC_COLUMNS) {
    const raw = fields[column];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (Number.isFinite(value)) {
      sample[type] = value;
      found = true;
    }
  }
  return found ? sample : undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface StressMetricsExporterOptions {
  instanceName: string;
  registry: MetricsRegistry;
  operation: string;
  logFile: string;
  loaderIndex: number;
  cpuIndex: number;
  pollIntervalMs?: number;
}

export class StressMetricsExporter {
  private offset = 0;
  private partial = '';
  private decoder = new StringDecoder('utf8');
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private samples = 0;

  constructor(private readonly options: StressMetricsExporterOptions) {
    options.registry.describe(STRESS_GAUGE, 'Latest cql-stress summary values per invocation');
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /** Summary lines turned into gauges so far. */
  get sampleCount(): number {
    return this.samples;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.pollIntervalMs ?? DEFAULT_METRICS_POLL_INTERVAL_MS);
    log.debug('Metrics exporter started', { logFile: this.options.logFile });
  }

  /** Stop polling and pick up whatever the run wrote since the last poll. */
  async stop(): Promise<void> {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;

    if (this.inFlight) {
      await this.inFlight;
    }
    await this.pollSafely();
    const rest = this.partial + this.decoder.end();
    this.partial = '';
    if (rest) {
      this.handleLine(rest);
    }
    log.debug('Metrics exporter stopped', { logFile: this.options.logFile, samples: this.samples });
  }

  /** Read everything appended to the log since the previous poll. */
  async poll(): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await open(this.options.logFile, 'r');
    } catch (error) {
      // The run has not written anything yet
      if (isMissingFile(error)) return;
      throw error;
    }

    try {
      const { size } = await handle.stat();
      if (size < this.offset) {
        this.offset = 0;
        this.partial = '';
      }
      while (this.offset < size) {
        const buffer = Buffer.alloc(Math.min(READ_CHUNK_BYTES, size - this.offset));
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.offset);
        if (bytesRead === 0) break;
        this.offset += bytesRead;
        this.consume(this.decoder.write(buffer.subarray(0, bytesRead)));
      }
    } finally {
      await handle.close();
    }
  }

  private tick(): void {
    if (this.inFlight) return;
    this.inFlight = this.pollSafely().finally(() => {
      this.inFlight = undefined;
    });
  }

  private async pollSafely(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      log.warn('Failed to read stress log for metrics', {
        logFile: this.options.logFile,
        error: describeError(error),
      });
    }
  }

  private consume(text: string): void {
    const lines = (this.partial + text).split('\n');
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      this.handleLine(line);
    }
  }

  private handleLine(line: string): void {
    const sample = parseTotalLine(line.trim());
    if (!sample) return;

    const { instanceName, operation, loaderIndex, cpuIndex, registry } = this.options;
    for (const [type, value] of Object.entries(sample)) {
      if (value === undefined) continue;
      registry.setGauge(
        STRESS_GAUGE,
        {
          instance: instanceName,
          loader_idx: String(loaderIndex),
          cpu_idx: String(cpuIndex),
          operation,
          type,
        },
        value
      );
    }
    this.samples++;
  }
}
