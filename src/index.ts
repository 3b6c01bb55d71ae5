/**
 * sheetpress public API
 */

export { Converter } from "./converter";
export * from "./modules";
export * from "./types";
export {
  ConvertError,
  isConvertError,
  errorReason,
  formatError,
  PART_PLACEHOLDER,
  singleOutput,
  templatedOutput,
  parseOutputTemplate,
  resolvePartPath,
  resolvePagePath,
  formatOutputSpec,
  OutputFile,
  loadConfig,
  Logger,
} from "./utils";
export type { ErrorCode, OutputFileMetaKey } from "./utils";
export * from "./sheet";
