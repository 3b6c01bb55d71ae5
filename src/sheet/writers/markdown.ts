/**
 * Markdown Writer
 * Whole sheets and single parts through turndown
 */

import type TurndownService from "turndown";
import { createTurndownService } from "../../turndown";
import type { MarkdownConfig, Writer } from "../../types";
import type { OutputFile } from "../../utils";
import type { SheetDocument } from "../document";

export class MarkdownWriter implements Writer<SheetDocument> {
  readonly pageSegmented = false;
  readonly supportsParts = true;
  private readonly turndown: TurndownService;

  constructor(config: MarkdownConfig) {
    this.turndown = createTurndownService(config);
  }

  async write(document: SheetDocument, file: OutputFile): Promise<void> {
    const markdown = this.turndown.turndown(document.contentHtml());
    await file.write(`${markdown}\n`);
  }
}
