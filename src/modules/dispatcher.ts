/**
 * Dispatcher Module
 * Converts one job: looks up the writer, loads the input, applies the
 * transform and writes every output the selected strategy calls for
 */

import {
  ConvertError,
  OutputFile,
  outputKind,
  formatOutputSpec,
  resolvePagePath,
  resolvePartPath,
  type Logger,
  type OutputFileMetaKey,
} from "../utils";
import type {
  ConversionContext,
  ConvertibleDocument,
  Job,
  OutputSpec,
  TemplatedOutput,
  Writer,
  WriterOptions,
} from "../types";
import { selectStrategy } from "./strategy";

// ============================================================================
// Main Dispatcher Function
// ============================================================================

/**
 * Convert a single job and return the paths that were written.
 * Throws on the first failure; nothing written before it is removed.
 */
export async function convertJob<D extends ConvertibleDocument<D>>(
  job: Job,
  ctx: ConversionContext<D>,
): Promise<string[]> {
  const { services, options, logger } = ctx;
  const kind = outputKind(job.output);

  logger.info(`in: ${job.input}, out: ${formatOutputSpec(job.output)}`);

  // Writer lookup comes first so an unknown type never costs a load
  const writer = services.writers.lookup(kind);
  const isNative = ctx.nativeKinds.has(kind);
  if (!writer && !isNative) {
    throw new ConvertError("ConvertTypeUnknown", `Unknown output type "${kind}"`);
  }

  const strategy = selectStrategy({
    templated: job.output.kind === "templated",
    hasExtension: options.extensionUri !== undefined,
    isNative,
    isPageSegmented: writer?.pageSegmented ?? false,
  });

  if (strategy === "parts" && !writer?.supportsParts) {
    throw new ConvertError(
      "NotSupported",
      `Output type "${kind}" cannot be written per part`,
    );
  }

  const document = await loadDocument(job.input, ctx);

  return withDocument(document, async (doc) => {
    if (options.soundProfile) {
      doc.setSoundProfile(options.soundProfile);
    }

    if (job.transform) {
      // Transposer errors are passed through as they are
      services.transposer.apply(doc, job.transform);
    }

    switch (strategy) {
      case "parts":
        return convertParts(
          doc,
          requireTemplated(job.output),
          requireWriter(writer, kind),
          ctx,
        );
      case "extension": {
        await runExtension(doc, ctx);
        const outputPath = requireSingle(job.output);
        return isNative
          ? saveNative(doc, outputPath, ctx)
          : convertWhole(doc, outputPath, requireWriter(writer, kind), ctx);
      }
      case "native":
        return saveNative(doc, requireSingle(job.output), ctx);
      case "pages":
        return convertPages(
          doc,
          requireSingle(job.output),
          requireWriter(writer, kind),
          {},
          ctx,
        );
      case "whole":
        return convertWhole(
          doc,
          requireSingle(job.output),
          requireWriter(writer, kind),
          ctx,
        );
    }
  });
}

// ============================================================================
// Document Lifetime
// ============================================================================

/**
 * Run `fn` with a loaded document and dispose it on every exit path
 */
export async function withDocument<D extends { dispose(): void }, T>(
  document: D,
  fn: (document: D) => Promise<T>,
): Promise<T> {
  try {
    return await fn(document);
  } finally {
    document.dispose();
  }
}

async function loadDocument<D extends ConvertibleDocument<D>>(
  input: string,
  ctx: ConversionContext<D>,
): Promise<D> {
  const { stylePath, force = false } = ctx.options;
  try {
    return await ctx.services.loader.load(input, { stylePath, force });
  } catch (error) {
    // Loader detail is logged; callers only see the uniform code
    ctx.logger.error(
      `failed load document, err: ${describe(error)}, path: ${input}`,
      error,
    );
    throw new ConvertError("InFileFailedLoad", undefined, { cause: error });
  }
}

// ============================================================================
// Strategies
// ============================================================================

async function convertParts<D extends ConvertibleDocument<D>>(
  document: D,
  spec: TemplatedOutput,
  writer: Writer<D>,
  ctx: ConversionContext<D>,
): Promise<string[]> {
  const parts = document.parts();
  if (parts.length === 0) {
    ctx.logger.warn(`${document.name} has no parts, nothing written for ${formatOutputSpec(spec)}`);
  }

  const written: string[] = [];
  for (const part of parts) {
    checkCancelled(ctx);
    const partPath = resolvePartPath(spec, part.name);

    if (writer.pageSegmented) {
      written.push(
        ...(await convertPages(part.document, partPath, writer, { unit: "part" }, ctx)),
      );
      continue;
    }

    await writeOutput(
      part.document,
      partPath,
      writer,
      { unit: "part" },
      [["file_path", partPath]],
      ctx,
    );
    written.push(partPath);
  }

  return written;
}

async function convertPages<D extends ConvertibleDocument<D>>(
  document: D,
  outputPath: string,
  writer: Writer<D>,
  baseOptions: WriterOptions,
  ctx: ConversionContext<D>,
): Promise<string[]> {
  const written: string[] = [];
  const pageCount = document.pageCount();

  for (let page = 0; page < pageCount; page++) {
    checkCancelled(ctx);
    const pagePath = resolvePagePath(outputPath, page);
    await writeOutput(
      document,
      pagePath,
      writer,
      { ...baseOptions, pageNumber: page },
      [
        ["dir_path", outputPath],
        ["file_path", pagePath],
      ],
      ctx,
    );
    written.push(pagePath);
  }

  return written;
}

async function convertWhole<D extends ConvertibleDocument<D>>(
  document: D,
  outputPath: string,
  writer: Writer<D>,
  ctx: ConversionContext<D>,
): Promise<string[]> {
  await writeOutput(document, outputPath, writer, {}, [["file_path", outputPath]], ctx);
  return [outputPath];
}

async function saveNative<D extends ConvertibleDocument<D>>(
  document: D,
  outputPath: string,
  ctx: ConversionContext<D>,
): Promise<string[]> {
  try {
    await document.save(outputPath);
  } catch (error) {
    ctx.logger.error(`failed save, err: ${describe(error)}, path: ${outputPath}`, error);
    throw new ConvertError("OutFileFailedWrite", undefined, { cause: error });
  }
  return [outputPath];
}

async function runExtension<D extends ConvertibleDocument<D>>(
  document: D,
  ctx: ConversionContext<D>,
): Promise<void> {
  const { extensionUri } = ctx.options;
  const runner = ctx.services.extensions;
  if (!extensionUri) return;
  if (!runner) {
    throw new ConvertError(
      "UnknownError",
      `No extension runner configured for ${extensionUri.href}`,
    );
  }

  // Extension errors are passed through as they are
  await runner.perform(extensionUri, document);
}

// ============================================================================
// Helpers
// ============================================================================

async function writeOutput<D>(
  document: D,
  outputPath: string,
  writer: Writer<D>,
  options: WriterOptions,
  meta: ReadonlyArray<[OutputFileMetaKey, string]>,
  ctx: { logger: Logger },
): Promise<void> {
  let file: OutputFile;
  try {
    file = await OutputFile.open(outputPath);
  } catch (error) {
    ctx.logger.error(`failed open, err: ${describe(error)}, path: ${outputPath}`, error);
    throw new ConvertError("OutFileFailedOpen", undefined, { cause: error });
  }

  try {
    for (const [key, value] of meta) {
      file.setMeta(key, value);
    }
    await writer.write(document, file, options);
  } catch (error) {
    ctx.logger.error(`failed write, err: ${describe(error)}, path: ${outputPath}`, error);
    // The write error is the one reported
    await file.close().catch((closeError: unknown) => {
      ctx.logger.debug(`failed close, err: ${describe(closeError)}, path: ${outputPath}`);
    });
    throw new ConvertError("OutFileFailedWrite", undefined, { cause: error });
  }

  try {
    await file.close();
  } catch (error) {
    ctx.logger.error(`failed close, err: ${describe(error)}, path: ${outputPath}`, error);
    throw new ConvertError("OutFileFailedWrite", undefined, { cause: error });
  }
}

function checkCancelled(ctx: { signal?: AbortSignal }): void {
  if (ctx.signal?.aborted) {
    throw new ConvertError("Cancelled");
  }
}

function requireWriter<D>(writer: Writer<D> | undefined, kind: string): Writer<D> {
  if (!writer) {
    throw new ConvertError("ConvertTypeUnknown", `Unknown output type "${kind}"`);
  }
  return writer;
}

function requireSingle(spec: OutputSpec): string {
  if (spec.kind !== "single") {
    throw new ConvertError("UnknownError", `Expected a single output, got ${formatOutputSpec(spec)}`);
  }
  return spec.path;
}

function requireTemplated(spec: OutputSpec): TemplatedOutput {
  if (spec.kind !== "templated") {
    throw new ConvertError("UnknownError", `Expected a templated output, got ${spec.path}`);
  }
  return spec;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
