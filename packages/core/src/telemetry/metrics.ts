/**
 * Metrics abstraction shaped after prom-client.
 * The API wires real Prometheus collectors; everything else falls back to in-memory
 * instruments that tests can read back.
 */

export interface AdmissionMetrics {
  admitted: Counter;
  quotaDenied: Counter;
  capacityDenied: Counter;
  leasesInFlight: Gauge;
  operationLatencyMs: Histogram;
}

export type Labels = Record<string, string>;

export interface Counter {
  inc(labels?: Labels, value?: number): void;
}

export interface Gauge {
  set(value: number): void;
}

export interface Histogram {
  observe(labels: Labels, value: number): void;
}

export class InMemoryCounter implements Counter {
  private total = 0;
  private byLabel = new Map<string, number>();

  inc(labels?: Labels, amount = 1): void {
    this.total += amount;
    if (labels) {
      const key = labelKey(labels);
      this.byLabel.set(key, (this.byLabel.get(key) ?? 0) + amount);
    }
  }

  get(labels?: Labels): number {
    if (!labels) return this.total;
    return this.byLabel.get(labelKey(labels)) ?? 0;
  }
}

export class InMemoryGauge implements Gauge {
  private value = 0;
  set(value: number): void {
    this.value = value;
  }
  get(): number {
    return this.value;
  }
}

export class InMemoryHistogram implements Histogram {
  private values: number[] = [];
  observe(_labels: Labels, value: number): void {
    this.values.push(value);
  }
  getValues(): number[] {
    return [...this.values];
  }
}

export interface InMemoryAdmissionMetrics extends AdmissionMetrics {
  admitted: InMemoryCounter;
  quotaDenied: InMemoryCounter;
  capacityDenied: InMemoryCounter;
  leasesInFlight: InMemoryGauge;
  operationLatencyMs: InMemoryHistogram;
}

export function createInMemoryMetrics(): InMemoryAdmissionMetrics {
  return {
    admitted: new InMemoryCounter(),
    quotaDenied: new InMemoryCounter(),
    capacityDenied: new InMemoryCounter(),
    leasesInFlight: new InMemoryGauge(),
    operationLatencyMs: new InMemoryHistogram(),
  };
}

function labelKey(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`)
    .join(",");
}
