/**
 * Sheet Loader
 * Reads HTML lead sheets from disk
 */

import { readFile } from "fs/promises";
import path from "node:path";
import type { DocumentConfig, DocumentLoader, LoadOptions } from "../types";
import { SheetDocument } from "./document";

// Newest <meta name="sheet-version"> this loader understands
export const SUPPORTED_SHEET_VERSION = 1;

export class SheetLoader implements DocumentLoader<SheetDocument> {
  constructor(private readonly config: DocumentConfig) {}

  async load(inputPath: string, options: LoadOptions): Promise<SheetDocument> {
    const html = await readFile(inputPath, "utf-8");
    const name = path.basename(inputPath, path.extname(inputPath));
    const document = SheetDocument.fromHtml(name, html, this.config);

    if (!document.hasContent()) {
      throw new Error(
        `No content matching "${this.config.contentSelector}" in ${inputPath}`,
      );
    }

    const version = document.version();
    if (version !== null && version > SUPPORTED_SHEET_VERSION && !options.force) {
      throw new Error(
        `Sheet version ${version} is newer than supported version ${SUPPORTED_SHEET_VERSION}, use force mode to load it anyway`,
      );
    }

    if (options.stylePath) {
      document.applyStyle(await readFile(options.stylePath, "utf-8"));
    }

    return document;
  }
}
