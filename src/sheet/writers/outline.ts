/**
 * Outline Writer
 * JSON summary of a sheet: title, key, parts, page count and chords
 */

import type { Writer } from "../../types";
import type { OutputFile } from "../../utils";
import type { SheetDocument } from "../document";

export interface SheetOutline {
  name: string;
  title: string;
  key: number | null;
  soundProfile: string | null;
  pageCount: number;
  parts: string[];
  chords: string[];
}

export function buildOutline(document: SheetDocument): SheetOutline {
  return {
    name: document.name,
    title: document.title,
    key: document.key(),
    soundProfile: document.soundProfile() ?? null,
    pageCount: document.pageCount(),
    parts: document.parts().map((part) => part.name),
    chords: document.chordSymbols(),
  };
}

export class OutlineWriter implements Writer<SheetDocument> {
  readonly pageSegmented = false;
  // Parts are listed inside the outline instead
  readonly supportsParts = false;

  async write(document: SheetDocument, file: OutputFile): Promise<void> {
    await file.write(`${JSON.stringify(buildOutline(document), null, 2)}\n`);
  }
}
