/**
 * Batch command - Runs every job of a batch job file
 */

import { Converter } from "../../converter";
import * as modules from "../../modules";
import { ConversionOptionsSchema, createContext, type ConversionOptions } from "../setup";

export async function batchCommand(
  jobFile: string,
  opts: ConversionOptions,
): Promise<void> {
  try {
    const options = ConversionOptionsSchema.parse(opts);
    const ctx = await createContext(options);

    const result = await new Converter(ctx).batchConvert(jobFile);

    await modules.stats(ctx.tracker, {
      verbose: options.verbose,
      reportPath: options.report,
    });

    if (!result.ok) {
      process.exit(1);
    }
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
