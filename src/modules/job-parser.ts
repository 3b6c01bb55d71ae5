/**
 * Job Parser Module
 * Turns a batch job file into a flat, ordered list of jobs
 *
 * Wire format (JSON array):
 *   [{ "in": "a.html", "transpose": { ... }, "out": "a.md" },
 *    { "in": "b.html", "out": ["b.md", "b.svg", ["parts/b-", "txt"]] }]
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import type { Job, OutputSpec, TransformOptions } from "../types";
import {
  ConvertError,
  fromNativeSeparators,
  isConvertError,
  singleOutput,
  templatedOutput,
} from "../utils";

// ============================================================================
// Schema
// ============================================================================

// Elements are read leniently: a bad field fails or drops its own job only
const BatchJobEntrySchema = z.object({
  in: z.string().catch(""),
  transpose: z.unknown().optional(),
  out: z.union([z.string(), z.array(z.unknown())]).optional().catch(undefined),
});

const OutputEntrySchema = z.union([z.string(), z.tuple([z.string(), z.string()])]);

/**
 * Validates a raw `transpose` object. Whatever it throws aborts the parse.
 */
export type TransformParser = (raw: Record<string, unknown>) => TransformOptions;

// ============================================================================
// Parsing
// ============================================================================

function createJob(
  input: string,
  output: OutputSpec,
  transform: TransformOptions | undefined,
): Job {
  return Object.freeze(transform ? { input, output, transform } : { input, output });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * An entry of the wrong shape gets an empty path, so its job fails with
 * ConvertTypeUnknown without touching the others
 */
function toOutputSpec(entry: unknown): OutputSpec {
  const result = OutputEntrySchema.safeParse(entry);
  if (!result.success) {
    return singleOutput("");
  }
  if (typeof result.data === "string") {
    return singleOutput(result.data);
  }
  const [prefix, suffix] = result.data;
  try {
    return templatedOutput(prefix, suffix);
  } catch (error) {
    // e.g. a suffix with a slash leaves no "*" in the file name
    if (isConvertError(error, "NotSupported")) return singleOutput("");
    throw error;
  }
}

/**
 * Expand parsed job file data into jobs, in declaration order.
 * Every element of an `out` array becomes its own job right after the
 * previous one, sharing `in` and `transpose`.
 *
 * Only a non-array document and a malformed transform fail the whole parse.
 * Elements without a usable `out` are skipped; a missing `in` or an `out`
 * item of the wrong shape yields a job that fails when it runs.
 */
export function parseBatchJobs(data: unknown, parseTransform: TransformParser): Job[] {
  if (!Array.isArray(data)) {
    throw new ConvertError(
      "BatchJobFileFailedParse",
      "Failed to parse batch job file: expected an array of jobs",
    );
  }

  const jobs: Job[] = [];

  for (const element of data) {
    const result = BatchJobEntrySchema.safeParse(element);
    if (!result.success) continue;

    const entry = result.data;
    const input = fromNativeSeparators(entry.in);

    // Fail fast: a malformed transform means a malformed batch file
    const transform =
      isPlainObject(entry.transpose) && Object.keys(entry.transpose).length > 0
        ? parseTransform(entry.transpose)
        : undefined;

    if (entry.out === undefined) continue;

    const outputs: unknown[] = typeof entry.out === "string" ? [entry.out] : entry.out;
    for (const output of outputs) {
      jobs.push(createJob(input, toOutputSpec(output), transform));
    }
  }

  return jobs;
}

/**
 * Read and parse a batch job file
 */
export async function readBatchJobFile(
  path: string,
  parseTransform: TransformParser,
): Promise<Job[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConvertError(
      "BatchJobFileFailedOpen",
      `Failed to open batch job file: ${path}`,
      { cause: error },
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConvertError(
      "BatchJobFileFailedParse",
      `Failed to parse batch job file: ${details}`,
      { cause: error },
    );
  }

  return parseBatchJobs(data, parseTransform);
}
