/**
 * Utility exports
 */

// URL utilities
export {
  parseUrl,
  isHostOrSubdomain,
  stripQueryAndFragment,
  getUrlBasename,
} from "./url";

// Content type utilities
export {
  ACCEPTED_IMAGE_TYPES,
  parseContentType,
  resolveContentType,
  isAcceptedImageType,
} from "./mime";

// Network utilities
export { request, requestWithRetry, HttpError, InvalidUrlError } from "./http";
export type {
  HttpFetch,
  BodyReader,
  RequestOptions,
  RetryOptions,
} from "./http";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { ensureDirectory } from "./ensure-directory";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker, mapTransportError } from "./tracker";
