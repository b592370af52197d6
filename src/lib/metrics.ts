import { z } from "zod";

export const metricNameSchema = z.enum(["response_time", "cache_hit", "cache_miss", "error_count"]);

export type MetricName = z.infer<typeof metricNameSchema>;

export type MetricSample = {
  name: MetricName;
  value: number;
  tags: Record<string, string>;
  timestamp: string;
};

export interface IMetrics {
  record(name: MetricName, value: number, tags?: Record<string, string>): void;
  /** Oldest first; only the latest `MAX_SAMPLES` are kept. */
  get(name: MetricName): MetricSample[];
  snapshot(): Record<MetricName, MetricSample[]>;
}

export const MAX_SAMPLES = 50;

/**
 * Process-local metrics buffer. Keeps a rolling window of samples per metric.
 */
export class InMemoryMetrics implements IMetrics {
  private samples = new Map<MetricName, MetricSample[]>();

  constructor(private readonly now: () => number = Date.now) {}

  record(name: MetricName, value: number, tags: Record<string, string> = {}): void {
    const list = this.samples.get(name) ?? [];
    list.push({ name, value, tags, timestamp: new Date(this.now()).toISOString() });
    if (list.length > MAX_SAMPLES) {
      list.splice(0, list.length - MAX_SAMPLES);
    }
    this.samples.set(name, list);
  }

  get(name: MetricName): MetricSample[] {
    return [...(this.samples.get(name) ?? [])];
  }

  snapshot(): Record<MetricName, MetricSample[]> {
    return {
      response_time: this.get("response_time"),
      cache_hit: this.get("cache_hit"),
      cache_miss: this.get("cache_miss"),
      error_count: this.get("error_count"),
    };
  }
}
