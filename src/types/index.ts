/**
 * Central type exports
 */

// Configuration
export type {
  HarvestConfig,
  PartialHarvestConfig,
  ApiConfig,
  OutputConfig,
  SearchConfig,
  LoggingConfig,
  LogLevel,
  ConfigIssue,
} from "./config";
export {
  HarvestConfigSchema,
  PartialHarvestConfigSchema,
} from "./config";

// Pexels API
export type { Page, Photo, PhotoSource, PhotoVariant } from "./pexels";
export { PageSchema, PhotoSchema, DOWNLOAD_VARIANT } from "./pexels";

// Context
export type { HarvestContext, PageSource, Result, RunState } from "./context";
