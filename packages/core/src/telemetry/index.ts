export {
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryGauge,
  InMemoryHistogram,
} from "./metrics.js";
export type {
  AdmissionMetrics,
  InMemoryAdmissionMetrics,
  Counter,
  Gauge,
  Histogram,
  Labels,
} from "./metrics.js";
