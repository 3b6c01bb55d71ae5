/**
 * Jobs command - Scans inputs and writes a batch job file for them
 */

import { writeFile } from "fs/promises";
import { posix } from "path";
import chalk from "chalk";
import fg from "fast-glob";
import { z } from "zod";
import { fromNativeSeparators } from "../../utils";

const JobsOptionsSchema = z.object({
  format: z.array(z.string()).optional(),
  parts: z.string().optional(),
  outDir: z.string().optional(),
  write: z.string().optional(),
});

type Options = z.infer<typeof JobsOptionsSchema>;

export type JobEntryOutput = string | [prefix: string, suffix: string];

export interface JobEntry {
  in: string;
  out: JobEntryOutput[];
}

export interface JobEntryOptions {
  formats: readonly string[];
  // One file per part in this format, named `<name>-<part>.<format>`
  partsFormat?: string;
  // Defaults to the directory of each input
  outDir?: string;
}

/**
 * @example
 * buildJobEntries(["songs/a.html"], { formats: ["md"], partsFormat: "txt", outDir: "out" })
 * // [{ in: "songs/a.html", out: ["out/a.md", ["out/a-", "txt"]] }]
 */
export function buildJobEntries(
  files: readonly string[],
  options: JobEntryOptions,
): JobEntry[] {
  return files.map((file) => {
    const input = fromNativeSeparators(file);
    const { dir, name } = posix.parse(input);
    const outDir = options.outDir ? fromNativeSeparators(options.outDir) : dir;

    const out: JobEntryOutput[] = options.formats.map((format) =>
      posix.join(outDir, `${name}.${format}`),
    );
    if (options.partsFormat) {
      out.push([posix.join(outDir, `${name}-`), options.partsFormat]);
    }

    return { in: input, out };
  });
}

export async function jobsCommand(pattern: string, opts: Options): Promise<void> {
  try {
    const options = JobsOptionsSchema.parse(opts);
    const files = await fg(fromNativeSeparators(pattern), { onlyFiles: true });

    if (files.length === 0) {
      console.error(chalk.red(`No input files match ${pattern}`));
      process.exit(1);
    }

    const entries = buildJobEntries(files.sort(), {
      formats: options.format ?? (options.parts ? [] : ["md"]),
      partsFormat: options.parts,
      outDir: options.outDir,
    });
    const json = JSON.stringify(entries, null, 2) + "\n";

    if (!options.write) {
      process.stdout.write(json);
      return;
    }

    await writeFile(options.write, json);
    console.log(
      `${chalk.green("✔")} Wrote ${chalk.white(entries.length)} job(s) to ${chalk.cyan(options.write)}`,
    );
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
