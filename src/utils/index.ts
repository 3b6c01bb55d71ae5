/**
 * Utility exports
 */

// Errors
export {
  ConvertError,
  isConvertError,
  errorReason,
  formatError,
} from "./errors";
export type { ErrorCode } from "./errors";

// Path/filename utilities
export {
  PART_PLACEHOLDER,
  fromNativeSeparators,
  singleOutput,
  templatedOutput,
  parseOutputTemplate,
  outputKind,
  resolvePartPath,
  resolvePagePath,
  formatOutputSpec,
} from "./output-path";

// Filesystem utilities
export { OutputFile } from "./output-file";
export type { OutputFileMetaKey } from "./output-file";
export { fileExists } from "./file-exists";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./conversion-tracker";
