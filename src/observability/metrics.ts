import type { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSummary {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, HistogramSummary>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.getCounter(name) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = performance.now();
    return () => {
      const durationMs = Math.round(performance.now() - startedAt);
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  summary(): MetricsSummary {
    return {
      counters: {
        sites_discovered: this.getCounter("sites_discovered"),
        sites_ok: this.getCounter("sites_ok"),
        sites_partial: this.getCounter("sites_partial"),
        sites_failed: this.getCounter("sites_failed"),
        contact_pages_fetched: this.getCounter("contact_pages_fetched"),
        contact_pages_failed: this.getCounter("contact_pages_failed"),
      },
      timers: {
        page_fetch_ms: this.summarize("page_fetch_ms"),
        site_ms: this.summarize("site_ms"),
      },
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          ...this.summary(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    const total = values.reduce((sum, value) => sum + value, 0);
    return {
      count: values.length,
      min: Math.min(...values),
      max: Math.max(...values),
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
