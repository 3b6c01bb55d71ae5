/**
 * Builds the conversion context shared by the batch and convert commands
 */

import { z } from "zod";
import { createSheetServices, type SheetDocument } from "../sheet";
import type { ConversionContext } from "../types";
import { loadConfig, Logger, Tracker } from "../utils";
import { SpinnerProgress } from "./progress";

export const ConversionOptionsSchema = z.object({
  style: z.string().optional(),
  force: z.boolean().optional(),
  soundProfile: z.string().optional(),
  extension: z.string().optional(),
  config: z.string().optional(),
  report: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type ConversionOptions = z.infer<typeof ConversionOptionsSchema>;

export async function createContext(
  options: ConversionOptions,
): Promise<ConversionContext<SheetDocument>> {
  // Load configuration (default → user → custom)
  const { config, errors } = await loadConfig(options.config);

  const tracker = new Tracker();
  for (const err of errors) {
    tracker.trackResourceError(err.path, err.error);
  }

  const logger = new Logger(options.verbose ? "debug" : config.logging.level);
  const progress = config.logging.showProgress ? new SpinnerProgress() : undefined;

  // Per-job info lines would tear the spinner
  if (progress && !options.verbose && logger.getLevel() === "info") {
    logger.setLevel("warn");
  }

  // First Ctrl-C stops after the current job, the second one kills
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  return {
    services: await createSheetServices(config),
    options: {
      stylePath: options.style,
      force: options.force ?? false,
      soundProfile: options.soundProfile,
      extensionUri: options.extension ? new URL(options.extension) : undefined,
    },
    nativeKinds: new Set(config.formats.native.map((kind) => kind.toLowerCase())),
    logger,
    tracker,
    progress,
    signal: controller.signal,
  };
}
