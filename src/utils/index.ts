/**
 * Utility exports
 */

// Album URL utilities
export { parseAlbumUrl, tryParseAlbumUrl } from "./album-url";

// Naming utilities
export {
  NameRegistry,
  nameFor,
  stemFor,
  extensionFor,
} from "./name-registry";

// Script payload utilities
export { sliceJsonValue, tryParseJson } from "./slice-json-value";

// Filesystem utilities
export { fileExists, fileSize } from "./file-exists";

// Timing utilities
export { sleep, backoffDelay } from "./sleep";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
