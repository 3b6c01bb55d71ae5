/**
 * HTML lead-sheet collaborators
 */

import type { ConverterConfig, ConverterServices } from "../types";
import { SheetDocument } from "./document";
import { BuiltinExtensions } from "./extensions";
import { SheetLoader } from "./loader";
import { ChordTransposer } from "./transposer";
import { createWriterRegistry } from "./writers";

export { SheetDocument, textLines } from "./document";
export { SheetLoader, SUPPORTED_SHEET_VERSION } from "./loader";
export {
  ChordTransposer,
  TransposeError,
  transposeChord,
  transposeKey,
  transposeSemitones,
} from "./transposer";
export { BuiltinExtensions, ExtensionError } from "./extensions";
export * from "./writers";

export async function createSheetServices(
  config: ConverterConfig,
): Promise<ConverterServices<SheetDocument>> {
  return {
    loader: new SheetLoader(config.document),
    writers: await createWriterRegistry(config),
    transposer: new ChordTransposer(),
    extensions: new BuiltinExtensions(),
  };
}
