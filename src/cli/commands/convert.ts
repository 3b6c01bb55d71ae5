/**
 * Convert command - Converts a single input without a job file
 */

import { z } from "zod";
import { Converter } from "../../converter";
import * as modules from "../../modules";
import type { Job, OutputSpec } from "../../types";
import { fromNativeSeparators, parseOutputTemplate, singleOutput } from "../../utils";
import { ConversionOptionsSchema, createContext } from "../setup";

const ConvertOptionsSchema = ConversionOptionsSchema.extend({
  // Raw transposition options as JSON text
  transpose: z.string().optional(),
  // Treat the output as a `*` template, one file per part
  parts: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

function parseJson(text: string): unknown {
  return JSON.parse(text);
}

export async function convertCommand(
  input: string,
  output: string,
  opts: Options,
): Promise<void> {
  try {
    const options = ConvertOptionsSchema.parse(opts);
    const ctx = await createContext(options);

    const outputSpec: OutputSpec = options.parts
      ? parseOutputTemplate(output)
      : singleOutput(output);
    const transform = options.transpose
      ? ctx.services.transposer.parseOptions(parseJson(options.transpose))
      : undefined;
    const job: Job = transform
      ? { input: fromNativeSeparators(input), output: outputSpec, transform }
      : { input: fromNativeSeparators(input), output: outputSpec };

    const result = await new Converter(ctx).run([job]);

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
