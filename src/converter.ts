/**
 * Converter - Orchestrator facade
 * Binds a conversion context to the batch and single-file operations
 */

import type {
  BatchResult,
  ConversionContext,
  ConvertibleDocument,
  Job,
  TransformOptions,
} from "./types";
import * as modules from "./modules";
import { fromNativeSeparators, parseOutputTemplate, singleOutput } from "./utils";

export class Converter<D extends ConvertibleDocument<D>> {
  constructor(private readonly ctx: ConversionContext<D>) {}

  /**
   * Parse a batch job file and convert every job in it
   */
  batchConvert(jobFile: string): Promise<BatchResult> {
    return modules.batchConvert(jobFile, this.ctx);
  }

  /**
   * Convert an already parsed job list
   */
  run(jobs: readonly Job[]): Promise<BatchResult> {
    return modules.runBatch(jobs, this.ctx);
  }

  /**
   * Convert one input to one output; throws on failure.
   * Resolves with the files written.
   */
  convertFile(
    input: string,
    output: string,
    transform?: TransformOptions,
  ): Promise<string[]> {
    const job: Job = transform
      ? { input: fromNativeSeparators(input), output: singleOutput(output), transform }
      : { input: fromNativeSeparators(input), output: singleOutput(output) };
    return modules.convertJob(job, this.ctx);
  }

  /**
   * Same as convertFile, with transform options given as JSON text.
   * Malformed JSON or options fail before the input is touched.
   */
  async convertFileWithRawTransform(
    input: string,
    output: string,
    transformJson: string,
  ): Promise<string[]> {
    const raw: unknown = JSON.parse(transformJson);
    const transform = this.ctx.services.transposer.parseOptions(raw);
    return this.convertFile(input, output, transform);
  }

  /**
   * Write one output per part, e.g. `parts/*.md` → `parts/Violin.md`
   */
  async convertParts(input: string, outputTemplate: string): Promise<string[]> {
    return modules.convertJob(
      { input: fromNativeSeparators(input), output: parseOutputTemplate(outputTemplate) },
      this.ctx,
    );
  }
}
