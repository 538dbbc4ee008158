/**
 * Prometheus metrics for the namespace guard webhook
 */

type Labels = Record<string, string>;

interface Counter {
  value: number;
  labels: Labels;
}

interface Histogram {
  sum: number;
  count: number;
  buckets: Map<number, number>;
  labels: Labels;
}

interface Gauge {
  value: number;
  labels: Labels;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function series<T>(families: Map<string, Map<string, T>>, name: string): Map<string, T> {
  let family = families.get(name);
  if (!family) {
    family = new Map();
    families.set(name, family);
  }
  return family;
}

class MetricsCollector {
  private counters = new Map<string, Map<string, Counter>>();
  private histograms = new Map<string, Map<string, Histogram>>();
  private gauges = new Map<string, Map<string, Gauge>>();

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    const family = series(this.counters, name);
    const key = this.getLabelKey(labels);
    const counter = family.get(key) ?? { value: 0, labels };
    counter.value += value;
    family.set(key, counter);
  }

  /**
   * Observe a histogram metric (durations in seconds)
   */
  observeHistogram(
    name: string,
    value: number,
    labels: Labels = {},
    buckets: number[] = DEFAULT_BUCKETS
  ): void {
    const family = series(this.histograms, name);
    const key = this.getLabelKey(labels);
    let histogram = family.get(key);
    if (!histogram) {
      const bucketMap = new Map<number, number>();
      buckets.forEach((b) => bucketMap.set(b, 0));
      bucketMap.set(Infinity, 0);
      histogram = { sum: 0, count: 0, buckets: bucketMap, labels };
      family.set(key, histogram);
    }

    histogram.sum += value;
    histogram.count += 1;
    for (const [bucket, count] of histogram.buckets) {
      if (value <= bucket) {
        histogram.buckets.set(bucket, count + 1);
      }
    }
  }

  setGauge(name: string, value: number, labels: Labels = {}): void {
    series(this.gauges, name).set(this.getLabelKey(labels), { value, labels });
  }

  incrementGauge(name: string, labels: Labels = {}, value = 1): void {
    const family = series(this.gauges, name);
    const key = this.getLabelKey(labels);
    const current = family.get(key)?.value ?? 0;
    family.set(key, { value: current + value, labels });
  }

  decrementGauge(name: string, labels: Labels = {}, value = 1): void {
    this.incrementGauge(name, labels, -value);
  }

  /**
   * Generate Prometheus text format output
   */
  generatePrometheusMetrics(): string {
    const lines: string[] = [];

    this.counters.forEach((family, name) => {
      lines.push(`# TYPE ${name} counter`);
      family.forEach((counter) => {
        lines.push(`${name}${this.formatLabels(counter.labels)} ${counter.value}`);
      });
    });

    this.histograms.forEach((family, name) => {
      lines.push(`# TYPE ${name} histogram`);
      family.forEach((histogram) => {
        histogram.buckets.forEach((count, bucket) => {
          const le = bucket === Infinity ? "+Inf" : String(bucket);
          lines.push(`${name}_bucket${this.formatLabels({ ...histogram.labels, le })} ${count}`);
        });
        const labelsStr = this.formatLabels(histogram.labels);
        lines.push(`${name}_sum${labelsStr} ${histogram.sum}`);
        lines.push(`${name}_count${labelsStr} ${histogram.count}`);
      });
    });

    this.gauges.forEach((family, name) => {
      lines.push(`# TYPE ${name} gauge`);
      family.forEach((gauge) => {
        lines.push(`${name}${this.formatLabels(gauge.labels)} ${gauge.value}`);
      });
    });

    return lines.join("\n") + "\n";
  }

  private getLabelKey(labels: Labels): string {
    return JSON.stringify(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)));
  }

  private formatLabels(labels: Labels): string {
    const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
    if (entries.length === 0) return "";

    const formatted = entries
      .map(([key, value]) => {
        const escaped = value
          .replace(/\\/g, "\\\\")
          .replace(/\n/g, "\\n")
          .replace(/"/g, '\\"');
        return `${key}="${escaped}"`;
      })
      .join(",");

    return `{${formatted}}`;
  }
}

// Global metrics instance
export const metrics = new MetricsCollector();

export { MetricsCollector };

export const METRICS = {
  ADMISSION_REQUESTS_TOTAL: "namespace_guard_admission_requests_total",
  ADMISSION_REQUEST_DURATION: "namespace_guard_admission_request_duration_seconds",
  RESOURCE_QUERIES_TOTAL: "namespace_guard_resource_queries_total",
  REQUESTS_IN_FLIGHT: "namespace_guard_requests_in_flight",
} as const;
