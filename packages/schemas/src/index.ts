export * from "./theme.js";
export * from "./aspect-ratio.js";
export * from "./presentation.js";
export * from "./admission.js";
