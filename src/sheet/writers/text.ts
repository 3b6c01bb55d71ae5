/**
 * Plain Text Writer
 */

import type { Writer } from "../../types";
import type { OutputFile } from "../../utils";
import type { SheetDocument } from "../document";

export class TextWriter implements Writer<SheetDocument> {
  readonly pageSegmented = false;
  readonly supportsParts = true;

  async write(document: SheetDocument, file: OutputFile): Promise<void> {
    await file.write(`${document.text()}\n`);
  }
}
