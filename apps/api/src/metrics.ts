import client from "prom-client";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { AdmissionMetrics, Counter, Gauge, Histogram } from "@slidesmith/core";

class PromCounter implements Counter {
  private counter: client.Counter;
  constructor(registry: client.Registry, name: string, help: string, labelNames: string[]) {
    this.counter = new client.Counter({ name, help, labelNames, registers: [registry] });
  }
  inc(labels?: Record<string, string>, value?: number): void {
    if (labels) {
      this.counter.inc(labels, value ?? 1);
    } else {
      this.counter.inc(value ?? 1);
    }
  }
}

class PromGauge implements Gauge {
  private gauge: client.Gauge;
  constructor(registry: client.Registry, name: string, help: string) {
    this.gauge = new client.Gauge({ name, help, registers: [registry] });
  }
  set(value: number): void {
    this.gauge.set(value);
  }
}

class PromHistogram implements Histogram {
  private histogram: client.Histogram;
  constructor(registry: client.Registry, name: string, help: string, labelNames: string[], buckets?: number[]) {
    this.histogram = new client.Histogram({ name, help, labelNames, buckets, registers: [registry] });
  }
  observe(labels: Record<string, string>, value: number): void {
    this.histogram.observe(labels, value);
  }
}

const ROUTE_LABELS = ["route"];
const LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

export interface PromMetrics {
  registry: client.Registry;
  admission: AdmissionMetrics;
}

/** One registry per server so test instances never collide on metric names. */
export function createPromMetrics(options: { collectDefaults?: boolean } = {}): PromMetrics {
  const registry = new client.Registry();
  if (options.collectDefaults ?? true) {
    client.collectDefaultMetrics({ register: registry });
  }

  return {
    registry,
    admission: {
      admitted: new PromCounter(registry, "slidesmith_admitted_total", "Protected requests admitted", ROUTE_LABELS),
      quotaDenied: new PromCounter(
        registry,
        "slidesmith_rate_limited_total",
        "Requests rejected by the rate limiter",
        ROUTE_LABELS,
      ),
      capacityDenied: new PromCounter(
        registry,
        "slidesmith_capacity_rejected_total",
        "Protected requests shed by the concurrency gate",
        ROUTE_LABELS,
      ),
      leasesInFlight: new PromGauge(registry, "slidesmith_leases_in_flight", "Concurrency leases currently held"),
      operationLatencyMs: new PromHistogram(
        registry,
        "slidesmith_protected_operation_latency_ms",
        "Time spent holding a concurrency lease, in ms",
        ROUTE_LABELS,
        LATENCY_BUCKETS,
      ),
    },
  };
}

export function metricsRoute(registry: client.Registry) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const metrics = await registry.metrics();
    return reply.type(registry.contentType).send(metrics);
  };
}
