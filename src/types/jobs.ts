/**
 * Job and result types shared by the parser, dispatcher and batch runner
 */

import type { TransformOptions } from "./transpose";

// ============================================================================
// Output specs
// ============================================================================

/**
 * Where a job writes to.
 *
 * - `single`: one concrete path. A `*` in it is an ordinary character.
 * - `templated`: one file per part; every `*` in `baseName` is replaced with
 *   the part name, e.g. `{ dir: "parts", baseName: "*", suffix: "pdf" }`.
 */
export type OutputSpec =
  | { readonly kind: "single"; readonly path: string }
  | {
      readonly kind: "templated";
      readonly dir: string;
      readonly baseName: string;
      readonly suffix: string;
    };

export type TemplatedOutput = Extract<OutputSpec, { kind: "templated" }>;

// ============================================================================
// Jobs
// ============================================================================

export interface Job {
  readonly input: string;
  readonly output: OutputSpec;
  readonly transform?: TransformOptions;
}

// ============================================================================
// Writer options
// ============================================================================

export type WriteUnit = "document" | "part";

export interface WriterOptions {
  // 0-based; file names use the 1-based number
  pageNumber?: number;
  unit?: WriteUnit;
}

// ============================================================================
// Batch results
// ============================================================================

export interface JobFailure {
  input: string;
  output: string;
  // ErrorCode for orchestrator errors, error class name otherwise
  reason: string;
  message: string;
}

export type BatchResult =
  | { ok: true; failures: readonly JobFailure[] }
  | { ok: false; error: Error; failures: readonly JobFailure[] };
