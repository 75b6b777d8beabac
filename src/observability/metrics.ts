import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      fragments_discovered: this.getCounter("fragments_discovered"),
      fragments_selected: this.getCounter("fragments_selected"),
      fragments_unparsed: this.getCounter("fragments_unparsed"),
      probe_get_fallbacks: this.getCounter("probe_get_fallbacks"),
      files_downloaded: this.getCounter("files_downloaded"),
      files_updated: this.getCounter("files_updated"),
      files_skipped: this.getCounter("files_skipped"),
      files_failed: this.getCounter("files_failed"),
      metadata_ok: this.getCounter("metadata_ok"),
      metadata_failed: this.getCounter("metadata_failed"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      discovery_ms: this.summarize("discovery_ms"),
      probe_ms: this.summarize("probe_ms"),
      transfer_ms: this.summarize("transfer_ms"),
      metadata_ms: this.summarize("metadata_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: "info",
        msg: "metrics_summary",
        counters: this.getCounters(),
        timers: this.getTimerSummaries(),
      }),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
