/**
 * Collaborator contracts consumed by the orchestrator.
 * Implementations live outside the core (see src/sheet for the HTML ones).
 */

import type { OutputFile } from "../utils/output-file";
import type { BatchResult, WriterOptions } from "./jobs";
import type { TransformOptions } from "./transpose";

/**
 * A loaded document. `Self` is the concrete document type so that parts
 * hand back the same type writers already know how to serialize.
 */
export interface ConvertibleDocument<Self> {
  readonly name: string;
  parts(): SubDocument<Self>[];
  pageCount(): number;
  setSoundProfile(profile: string): void;
  save(path: string): Promise<void>;
  dispose(): void;
}

export interface SubDocument<D> {
  readonly name: string;
  readonly document: D;
}

export interface LoadOptions {
  stylePath?: string;
  // Skip version/compatibility checks
  force: boolean;
}

export interface DocumentLoader<D> {
  load(path: string, options: LoadOptions): Promise<D>;
}

export interface Writer<D> {
  // Written one file per page (`name-1.ext`, `name-2.ext`, ...)
  readonly pageSegmented: boolean;
  // Accepts templated outputs and `unit: "part"`
  readonly supportsParts: boolean;
  write(document: D, file: OutputFile, options: WriterOptions): Promise<void>;
}

export interface WriterRegistry<D> {
  lookup(kind: string): Writer<D> | undefined;
}

export interface Transposer<D> {
  /**
   * Validate a raw `transpose` object from a job file.
   * Throws when the object is malformed.
   */
  parseOptions(raw: unknown): TransformOptions;
  apply(document: D, options: TransformOptions): void;
}

export interface ExtensionRunner<D> {
  // May mutate the document in place
  perform(uri: URL, document: D): Promise<void>;
}

export interface ProgressSink {
  start(): void;
  progress(current: number, total: number, label: string): void;
  finish(result: BatchResult): void;
}
