/**
 * Batch Runner Module
 * Runs jobs in order; a failing job is recorded and the batch moves on
 */

import type {
  BatchResult,
  ConversionContext,
  ConvertibleDocument,
  Job,
  JobFailure,
} from "../types";
import {
  ConvertError,
  errorReason,
  formatError,
  formatOutputSpec,
} from "../utils";
import { convertJob } from "./dispatcher";
import { readBatchJobFile } from "./job-parser";

// ============================================================================
// Failure formatting
// ============================================================================

function toJobFailure(job: Job, error: unknown): JobFailure {
  return {
    input: job.input,
    output: formatOutputSpec(job.output),
    reason: errorReason(error),
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * @example
 * "failed convert, err: InFileFailedLoad: Failed to load input file, in: b.html, out: b.md"
 */
export function formatJobFailure(failure: JobFailure): string {
  return `failed convert, err: ${failure.reason}: ${failure.message}, in: ${failure.input}, out: ${failure.output}`;
}

export function summarizeFailures(failures: readonly JobFailure[]): BatchResult {
  if (failures.length === 0) {
    return { ok: true, failures };
  }
  return {
    ok: false,
    error: new ConvertError(
      "ConvertFailed",
      failures.map(formatJobFailure).join("\n"),
    ),
    failures,
  };
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Process jobs one after another and collect failures.
 * Reports progress per job but does not start or finish the sink.
 */
export async function processJobs<D extends ConvertibleDocument<D>>(
  jobs: readonly Job[],
  ctx: ConversionContext<D>,
): Promise<BatchResult> {
  const { tracker, progress, logger } = ctx;
  const failures: JobFailure[] = [];
  const total = jobs.length;

  tracker.setTotalJobs(total);

  for (const [index, job] of jobs.entries()) {
    progress?.progress(index + 1, total, job.input);

    try {
      if (ctx.signal?.aborted) {
        throw new ConvertError("Cancelled");
      }
      const written = await convertJob(job, ctx);
      tracker.incrementSuccessful();
      tracker.trackWrittenFiles(written);
    } catch (error) {
      const failure = toJobFailure(job, error);
      logger.debug(formatError(error));
      failures.push(failure);
      tracker.incrementFailed();
      tracker.trackJobError(failure.input, failure.output, error);
    }
  }

  return summarizeFailures(failures);
}

/**
 * Run an already parsed job list, reporting start and finish to the
 * progress sink exactly once
 */
export async function runBatch<D extends ConvertibleDocument<D>>(
  jobs: readonly Job[],
  ctx: ConversionContext<D>,
): Promise<BatchResult> {
  ctx.progress?.start();
  const result = await processJobs(jobs, ctx);
  ctx.progress?.finish(result);
  return result;
}

/**
 * Parse a batch job file and run it.
 * A file that cannot be read or parsed runs no job at all; its error is
 * the result's error.
 */
export async function batchConvert<D extends ConvertibleDocument<D>>(
  jobFile: string,
  ctx: ConversionContext<D>,
): Promise<BatchResult> {
  const { progress, logger, services } = ctx;
  progress?.start();

  let jobs: Job[];
  try {
    jobs = await readBatchJobFile(jobFile, (raw) =>
      services.transposer.parseOptions(raw),
    );
  } catch (error) {
    const parseError =
      error instanceof Error
        ? error
        : new ConvertError("UnknownError", String(error));
    logger.error(`failed parse batch job file, err: ${formatError(parseError)}`);
    const result: BatchResult = { ok: false, error: parseError, failures: [] };
    progress?.finish(result);
    return result;
  }

  const result = await processJobs(jobs, ctx);
  progress?.finish(result);
  return result;
}
