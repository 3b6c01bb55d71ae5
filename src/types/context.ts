/**
 * Conversion context - flows through the dispatcher and batch runner
 * Each module reads what it needs from here
 */

import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/conversion-tracker";
import type {
  ConvertibleDocument,
  DocumentLoader,
  ExtensionRunner,
  ProgressSink,
  Transposer,
  WriterRegistry,
} from "./ports";

// Re-export types from conversion-tracker
export type {
  Issue,
  IssueType,
  JobIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/conversion-tracker";

export interface ConverterServices<D extends ConvertibleDocument<D>> {
  loader: DocumentLoader<D>;
  writers: WriterRegistry<D>;
  transposer: Transposer<D>;
  extensions?: ExtensionRunner<D>;
}

/**
 * Options applied to every job of a run
 */
export interface ConvertOptions {
  stylePath?: string;
  force?: boolean;
  soundProfile?: string;
  extensionUri?: URL;
}

export interface ConversionContext<D extends ConvertibleDocument<D>> {
  services: ConverterServices<D>;
  options: ConvertOptions;

  // Suffixes handled by ConvertibleDocument.save
  nativeKinds: ReadonlySet<string>;

  logger: Logger;

  // Unified tracking for stats and errors
  tracker: Tracker;

  progress?: ProgressSink;
  signal?: AbortSignal;
}
