/**
 * Stress Metrics Registry
 *
 * In-memory gauges keyed by name and label set.
 * - Prometheus text exposition
 * - Bounded history of every sample
 */

export type Labels = Record<string, string>;

export interface MetricPoint {
  name: string;
  value: number;
  labels: Labels;
  timestamp: number;
}

interface GaugeSeries {
  labels: Labels;
  value: number;
}

function labelKey(labels: Labels): string {
  return JSON.stringify(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)));
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function formatLabels(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(',')}}`;
}

export class MetricsRegistry {
  private gauges = new Map<string, Map<string, GaugeSeries>>();
  private help = new Map<string, string>();
  private history: MetricPoint[] = [];

  constructor(private readonly maxHistorySize = 10000) {}

  describe(name: string, help: string): void {
    this.help.set(name, help);
  }

  setGauge(name: string, labels: Labels, value: number): void {
    let series = this.gauges.get(name);
    if (!series) {
      series = new Map();
      this.gauges.set(name, series);
    }
    series.set(labelKey(labels), { labels: { ...labels }, value });
    this.record(name, value, labels);
  }

  getGauge(name: string, labels: Labels): number | undefined {
    return this.gauges.get(name)?.get(labelKey(labels))?.value;
  }

  /**
   * Get recent samples, optionally for one metric and from a point in time on
   */
  getHistory(name?: string, since?: Date): MetricPoint[] {
    let points = this.history;

    if (since) {
      const sinceTs = since.getTime();
      points = points.filter((p) => p.timestamp >= sinceTs);
    }

    if (name) {
      points = points.filter((p) => p.name === name);
    }

    return [...points];
  }

  toPrometheus(): string {
    const lines: string[] = [];
    for (const [name, series] of this.gauges) {
      const help = this.help.get(name);
      if (help) {
        lines.push(`# HELP ${name} ${help}`);
      }
      lines.push(`# TYPE ${name} gauge`);
      for (const { labels, value } of series.values()) {
        lines.push(`${name}${formatLabels(labels)} ${value}`);
      }
    }
    return lines.join('\n');
  }

  reset(): void {
    this.gauges.clear();
    this.history = [];
  }

  private record(name: string, value: number, labels: Labels): void {
    this.history.push({ name, value, labels: { ...labels }, timestamp: Date.now() });

    // Trim history if too large
    if (this.history.length > this.maxHistorySize) {
      this.history = this.history.slice(-Math.floor(this.maxHistorySize / 2));
    }
  }
}
