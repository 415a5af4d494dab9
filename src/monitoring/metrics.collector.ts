/**
 * Metrics Collector
 *
 * In-memory Prometheus text exposition, served at GET /api/v1/metrics.
 *
 * Counters: checks_total{scope,status}, changes_detected_total{type},
 * events_extracted_total{scope}.
 * Gauges: snapshot_events{scope}, last_check_timestamp_seconds{scope}.
 * Histogram: check_duration_seconds.
 */

type Labels = Record<string, string>;

interface MetricFamily {
  type: "counter" | "gauge";
  help: string;
}

const FAMILIES: Record<string, MetricFamily> = {
  checks_total: { type: "counter", help: "Check runs by scope and outcome" },
  changes_detected_total: { type: "counter", help: "Changes detected by type" },
  events_extracted_total: { type: "counter", help: "Events extracted from the listing" },
  notifications_failed_total: { type: "counter", help: "Reports a notifier failed to deliver" },
  snapshot_events: { type: "gauge", help: "Events in the latest snapshot" },
  last_check_timestamp_seconds: { type: "gauge", help: "Unix time of the last successful check" },
};

const DURATION_BUCKETS = [1, 5, 10, 30, 60];
const MAX_DURATION_SAMPLES = 1000;

function seriesKey(name: string, labels: Labels): string {
  const pairs = Object.entries(labels).map(([k, v]) => `${k}="${v}"`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(",")}}`;
}

export class MetricsCollector {
  private series = new Map<string, { name: string; value: number }>();
  private durations: number[] = [];

  increment(name: string, labels: Labels = {}, by: number = 1): void {
    const key = seriesKey(name, labels);
    const current = this.series.get(key)?.value ?? 0;
    this.series.set(key, { name, value: current + by });
  }

  /** Set a gauge */
  set(name: string, labels: Labels, value: number): void {
    this.series.set(seriesKey(name, labels), { name, value });
  }

  /** 0 for a series never touched */
  get(name: string, labels: Labels = {}): number {
    return this.series.get(seriesKey(name, labels))?.value ?? 0;
  }

  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    if (this.durations.length > MAX_DURATION_SAMPLES) {
      this.durations.splice(0, this.durations.length - MAX_DURATION_SAMPLES);
    }
  }

  format(): string {
    const lines: string[] = [];

    for (const [name, family] of Object.entries(FAMILIES)) {
      lines.push(`# HELP ${name} ${family.help}`, `# TYPE ${name} ${family.type}`);
      for (const [key, entry] of this.series) {
        if (entry.name === name) lines.push(`${key} ${entry.value}`);
      }
      lines.push("");
    }

    lines.push(
      "# HELP check_duration_seconds Check run duration",
      "# TYPE check_duration_seconds histogram"
    );
    for (const le of DURATION_BUCKETS) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`check_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(
      `check_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`,
      `check_duration_seconds_count ${this.durations.length}`,
      `check_duration_seconds_sum ${sum.toFixed(2)}`
    );

    return lines.join("\n");
  }

  /** Tests only */
  reset(): void {
    this.series.clear();
    this.durations = [];
  }
}

export const metrics = new MetricsCollector();
