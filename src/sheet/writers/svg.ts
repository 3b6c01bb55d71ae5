/**
 * SVG Page Writer
 * One SVG file per page; lines of text laid out top to bottom
 */

import type { SvgConfig, Writer, WriterOptions } from "../../types";
import type { PageTemplate } from "../../templates";
import type { OutputFile } from "../../utils";
import type { SheetDocument } from "../document";

export class SvgPageWriter implements Writer<SheetDocument> {
  readonly pageSegmented = true;
  readonly supportsParts = true;

  constructor(
    private readonly config: SvgConfig,
    private readonly template: PageTemplate,
  ) {}

  async write(
    document: SheetDocument,
    file: OutputFile,
    options: WriterOptions,
  ): Promise<void> {
    const pageIndex = options.pageNumber ?? 0;
    const { width, height, margin, fontSize, lineHeight, fontFamily } = this.config;

    const lines = document.pageLines(pageIndex).map((text, index) => ({
      text,
      y: margin + fontSize + index * lineHeight,
    }));

    const svg = this.template({
      width,
      height,
      margin,
      fontSize,
      fontFamily,
      title: document.title,
      pageNumber: pageIndex + 1,
      pageCount: document.pageCount(),
      lines,
    });

    await file.write(svg);
  }
}
