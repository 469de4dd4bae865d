/**
 * Utility exports
 */

// Errors
export {
  HarvestError,
  ConfigError,
  TransportError,
  ProtocolError,
  DecodeError,
  IOError,
} from "./errors";
export type { HarvestErrorKind } from "./errors";

// Network utilities
export { sendRequest, readText, readBytes } from "./http";
export type { Transport } from "./http";

// Path/filename utilities
export { deriveFilename } from "./derive-filename";

// Filesystem utilities
export { ensureDirectory } from "./ensure-directory";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Classes
export { Logger } from "./logger";
