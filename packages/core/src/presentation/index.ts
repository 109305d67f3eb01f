export { THEMES, DEFAULT_THEME, getTheme, listThemes } from "./themes.js";
export {
  ASPECT_RATIOS,
  DEFAULT_ASPECT_RATIO,
  resolvePageSize,
  listAspectRatios,
  customAspectRatio,
  orientationOf,
  isValidCustomDimension,
} from "./aspect-ratios.js";
export type { PageSize } from "./aspect-ratios.js";
export { PresentationService, DEFAULT_EXPORT_TIMEOUT_MS } from "./service.js";
export type { PresentationServiceDeps, ExportedDeck } from "./service.js";
