/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const DocumentConfigSchema = z.object({
  contentSelector: z.string(),
  // Each match becomes one part, named by its data-part attribute
  partSelector: z.string(),
  pageBreakSelector: z.string(),
  chordSelector: z.string(),
  keySelector: z.string(),
});

export const FormatsConfigSchema = z.object({
  // Output suffixes saved by the document itself instead of a writer
  native: z.array(z.string()).min(1),
});

export const MarkdownConfigSchema = z.object({
  headingStyle: z.enum(["atx", "setext"]),
  codeBlockStyle: z.enum(["fenced", "indented"]),
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
  bulletMarker: z.enum(["-", "+", "*"]),
  horizontalRule: z.string(),
  lineBreak: z.string(),
  codeFence: z.enum(["```", "~~~"]),
  // Inline chord symbols are rendered as `open + chord + close`
  chordOpen: z.string(),
  chordClose: z.string(),
});

export const SvgConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  margin: z.number().int().nonnegative(),
  fontSize: z.number().positive(),
  lineHeight: z.number().positive(),
  fontFamily: z.string(),
  // Handlebars page template; null uses the built-in one
  template: z.string().nullable(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const ConverterConfigSchema = z.object({
  document: DocumentConfigSchema,
  formats: FormatsConfigSchema,
  markdown: MarkdownConfigSchema,
  svg: SvgConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConverterConfigSchema = z.object({
  document: DocumentConfigSchema.partial().optional(),
  formats: FormatsConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  svg: SvgConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type DocumentConfig = z.infer<typeof DocumentConfigSchema>;
export type FormatsConfig = z.infer<typeof FormatsConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type SvgConfig = z.infer<typeof SvgConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type PartialConverterConfig = z.infer<typeof PartialConverterConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
