// Admission
export * from "./admission/index.js";

// Presentations
export * from "./presentation/index.js";

// Generation
export * from "./generation/index.js";

// Cache
export * from "./cache/index.js";

// Storage
export * from "./storage/index.js";

// Export
export * from "./export/index.js";

// Telemetry
export * from "./telemetry/index.js";

// Utils
export { withTimeout, TimeoutError } from "./utils/timeout.js";
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
