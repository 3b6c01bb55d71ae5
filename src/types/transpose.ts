/**
 * Transposition options carried by batch jobs
 */

import { z } from "zod";

export const TransposeOptionsSchema = z
  .object({
    mode: z.enum(["to_key", "by_interval"]),
    direction: z.enum(["up", "down", "closest"]).default("closest"),
    // Key as a position on the circle of fifths: -7 (Cb) .. 7 (C#)
    targetKey: z.number().int().min(-7).max(7).optional(),
    // Semitones
    transposeInterval: z.number().int().min(0).max(11).optional(),
    transposeKeySignatures: z.boolean().default(true),
    transposeChordNames: z.boolean().default(true),
  })
  .refine((o) => o.mode !== "to_key" || o.targetKey !== undefined, {
    message: "targetKey is required when mode is to_key",
    path: ["targetKey"],
  })
  .refine((o) => o.mode !== "by_interval" || o.transposeInterval !== undefined, {
    message: "transposeInterval is required when mode is by_interval",
    path: ["transposeInterval"],
  });

export type TransposeOptions = z.output<typeof TransposeOptionsSchema>;

/**
 * Transform options threaded through a job. The orchestrator never looks
 * inside; only the transposer collaborator does.
 */
export type TransformOptions = TransposeOptions;
