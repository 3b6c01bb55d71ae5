/**
 * Chord Transposer
 * Validates transposition options and applies them to chord symbols and
 * the declared key of a sheet
 */

import { ZodError } from "zod";
import type { Transposer, TransposeOptions } from "../types";
import { TransposeOptionsSchema } from "../types";
import type { SheetDocument } from "./document";

const SHARP_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"];
const FLAT_NAMES = ["C", "Db", "D", "Eb", "E", "F", "Gb", "G", "Ab", "A", "Bb", "B"];
const NATURAL_PITCHES: Record<string, number> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11,
};

// Root, then anything up to an optional slash bass
const CHORD_PATTERN = /^([A-G])(#|b)?([^/]*)(?:\/([A-G])(#|b)?)?$/;

export class TransposeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransposeError";
  }
}

// ============================================================================
// Pitch arithmetic
// ============================================================================

function mod12(value: number): number {
  return ((value % 12) + 12) % 12;
}

function pitchOf(letter: string, accidental: string | undefined): number {
  const natural = NATURAL_PITCHES[letter] ?? 0;
  if (accidental === "#") return mod12(natural + 1);
  if (accidental === "b") return mod12(natural - 1);
  return natural;
}

function nameOf(pitch: number, preferFlats: boolean): string {
  return (preferFlats ? FLAT_NAMES : SHARP_NAMES)[mod12(pitch)];
}

/**
 * Key after moving `semitones`, kept on the circle of fifths between
 * -5 (Db) and 6 (F#)
 */
export function transposeKey(fifths: number, semitones: number): number {
  const moved = mod12(fifths + semitones * 7);
  return moved > 6 ? moved - 12 : moved;
}

/**
 * Signed semitone shift described by the options for a sheet in `currentKey`
 *
 * @example
 * transposeSemitones({ mode: "to_key", targetKey: 2, direction: "closest", ... }, 0) // 2
 * transposeSemitones({ mode: "by_interval", transposeInterval: 5, direction: "down", ... }, 0) // -5
 */
export function transposeSemitones(
  options: TransposeOptions,
  currentKey: number,
): number {
  if (options.mode === "by_interval") {
    const interval = mod12(options.transposeInterval ?? 0);
    if (interval === 0) return 0;
    switch (options.direction) {
      case "up":
        return interval;
      case "down":
        return -interval;
      case "closest":
        return interval > 6 ? interval - 12 : interval;
    }
  }

  // Upward distance to the target key
  const distance = mod12(((options.targetKey ?? currentKey) - currentKey) * 7);
  if (distance === 0) return 0;

  switch (options.direction) {
    case "up":
      return distance;
    case "down":
      return distance - 12;
    case "closest":
      return distance > 6 ? distance - 12 : distance;
  }
}

/**
 * Transpose one chord symbol; symbols that do not parse are returned unchanged
 *
 * @example
 * transposeChord("Am7/G", 2, false) // "Bm7/A"
 */
export function transposeChord(
  symbol: string,
  semitones: number,
  preferFlats: boolean,
): string {
  const match = CHORD_PATTERN.exec(symbol);
  if (!match) return symbol;

  const [, rootLetter, rootAccidental, quality, bassLetter, bassAccidental] = match;
  const root = nameOf(pitchOf(rootLetter, rootAccidental) + semitones, preferFlats);
  if (bassLetter === undefined) {
    return `${root}${quality}`;
  }
  const bass = nameOf(pitchOf(bassLetter, bassAccidental) + semitones, preferFlats);
  return `${root}${quality}/${bass}`;
}

// ============================================================================
// Transposer
// ============================================================================

export class ChordTransposer implements Transposer<SheetDocument> {
  parseOptions(raw: unknown): TransposeOptions {
    try {
      return TransposeOptionsSchema.parse(raw);
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.issues
          .map((issue) => `${issue.path.join(".") || "transpose"}: ${issue.message}`)
          .join("; ");
        throw new TransposeError(`Invalid transpose options: ${details}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  apply(document: SheetDocument, options: TransposeOptions): void {
    const currentKey = document.key() ?? 0;
    const semitones = transposeSemitones(options, currentKey);
    if (semitones === 0) return;

    const newKey =
      options.mode === "to_key" && options.targetKey !== undefined
        ? options.targetKey
        : transposeKey(currentKey, semitones);

    if (options.transposeChordNames) {
      document.mapChords((symbol) => transposeChord(symbol, semitones, newKey < 0));
    }

    if (options.transposeKeySignatures) {
      document.setKey(newKey);
    }
  }
}
