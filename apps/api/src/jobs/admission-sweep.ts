import type { AdmissionController } from "@slidesmith/core";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export interface AdmissionSweepJobConfig {
  admission: AdmissionController;
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Periodically drops expired rate-limit windows and idle per-identity permit pools.
 * Returns a cleanup function that stops the interval.
 */
export function startAdmissionSweepJob(config: AdmissionSweepJobConfig): () => void {
  const { admission, intervalMs = 60_000, logger = createLogger("admission-sweep") } = config;

  const timer = setInterval(() => {
    try {
      const swept = admission.sweep();
      if (swept.windows > 0 || swept.pools > 0) {
        logger.debug({ windows: swept.windows, pools: swept.pools }, "Swept admission state");
      }
    } catch (err) {
      logger.error({ err }, "Error sweeping admission state");
    }
  }, intervalMs);
  timer.unref();

  return () => {
    clearInterval(timer);
  };
}
