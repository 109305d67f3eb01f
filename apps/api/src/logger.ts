import pino from "pino";
import type { Logger } from "@slidesmith/core";

export type { Logger };

export function createLogger(name?: string, level = process.env["LOG_LEVEL"] ?? "info"): Logger {
  return pino({ name: name ?? "slidesmith", level });
}
