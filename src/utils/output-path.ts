/**
 * Output path utilities
 * Builds output specs and derives the concrete file names a job writes
 */

import path from "node:path";
import type { OutputSpec, TemplatedOutput } from "../types";
import { ConvertError } from "./errors";

// Job paths are normalized to forward slashes, so posix rules apply everywhere
const posix = path.posix;

export const PART_PLACEHOLDER = "*";

/**
 * Convert platform separators to forward slashes
 *
 * @example
 * fromNativeSeparators("scores\\in\\a.html") // "scores/in/a.html"
 */
export function fromNativeSeparators(value: string): string {
  return value.replace(/\\/g, "/");
}

export function singleOutput(outputPath: string): OutputSpec {
  return { kind: "single", path: fromNativeSeparators(outputPath) };
}

/**
 * Parse a `*` template such as `parts/score-*.pdf`
 * Throws NotSupported when the base name has no placeholder
 */
export function parseOutputTemplate(template: string): TemplatedOutput {
  const normalized = fromNativeSeparators(template);
  const extension = posix.extname(normalized);
  const baseName = posix.basename(normalized, extension);

  if (!baseName.includes(PART_PLACEHOLDER)) {
    throw new ConvertError(
      "NotSupported",
      `Output template "${template}" has no "${PART_PLACEHOLDER}" in its file name`,
    );
  }

  return {
    kind: "templated",
    dir: posix.dirname(normalized),
    baseName,
    suffix: extension.slice(1),
  };
}

/**
 * Templated output from a job file's `[prefix, suffix]` pair:
 * `prefix + "*" + "." + suffix`
 *
 * @example
 * templatedOutput("parts/", "pdf") // { dir: "parts", baseName: "*", suffix: "pdf" }
 */
export function templatedOutput(prefix: string, suffix: string): TemplatedOutput {
  const extension = suffix.replace(/^\./, "");
  return parseOutputTemplate(`${prefix}${PART_PLACEHOLDER}.${extension}`);
}

/**
 * Lower-cased suffix that selects the writer
 */
export function outputKind(spec: OutputSpec): string {
  const suffix =
    spec.kind === "single" ? posix.extname(spec.path).slice(1) : spec.suffix;
  return suffix.toLowerCase();
}

/**
 * Concrete path for one part of a templated output
 *
 * @example
 * resolvePartPath({ kind: "templated", dir: "parts", baseName: "*", suffix: "pdf" }, "Violin")
 * // "parts/Violin.pdf"
 */
export function resolvePartPath(spec: TemplatedOutput, partName: string): string {
  // Part names come from the document and stay inside the template directory
  const safeName = partName.replace(/[/\\]/g, "_");
  const name = spec.baseName.split(PART_PLACEHOLDER).join(safeName);
  return posix.join(spec.dir, `${name}.${spec.suffix}`);
}

/**
 * Path of one page of a page-segmented output, numbered from 1
 *
 * @example
 * resolvePagePath("out/score.svg", 0) // "out/score-1.svg"
 */
export function resolvePagePath(outputPath: string, pageIndex: number): string {
  const extension = posix.extname(outputPath);
  const name = posix.basename(outputPath, extension);
  return posix.join(posix.dirname(outputPath), `${name}-${pageIndex + 1}${extension}`);
}

/**
 * Display form used in logs and failure messages
 */
export function formatOutputSpec(spec: OutputSpec): string {
  if (spec.kind === "single") return spec.path;
  return posix.join(spec.dir, `${spec.baseName}.${spec.suffix}`);
}
