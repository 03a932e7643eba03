/**
 * Utility exports
 */

// String utilities
export { slugify } from "./slugify";
export { parseDuration } from "./parse-duration";

// Binary utilities
export { sniffImageFormat, mimeTypeFor } from "./sniff-image";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  assertRunnable,
  getUserConfigPath,
} from "./load-config";

// Errors
export {
  MigrationError,
  FormatError,
  TransportError,
  ConfigError,
  errorMessage,
} from "./errors";

// Timing
export { wait } from "./wait";

// Classes
export { IdGenerator } from "./id-generator";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
export { HttpTransport } from "./http-transport";
export type { HttpTransportOptions } from "./http-transport";
