/**
 * Central type exports
 */

// Configuration
export type {
  ConverterConfig,
  PartialConverterConfig,
  DocumentConfig,
  FormatsConfig,
  MarkdownConfig,
  SvgConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConverterConfigSchema,
  PartialConverterConfigSchema,
} from "./config";

// Jobs
export type {
  Job,
  OutputSpec,
  TemplatedOutput,
  WriterOptions,
  WriteUnit,
  JobFailure,
  BatchResult,
} from "./jobs";

// Transposition
export type { TransposeOptions, TransformOptions } from "./transpose";
export { TransposeOptionsSchema } from "./transpose";

// Collaborators
export type {
  ConvertibleDocument,
  SubDocument,
  LoadOptions,
  DocumentLoader,
  Writer,
  WriterRegistry,
  Transposer,
  ExtensionRunner,
  ProgressSink,
} from "./ports";

// Context
export type {
  ConversionContext,
  ConverterServices,
  ConvertOptions,
  Issue,
  IssueType,
  JobIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/conversion-tracker";
