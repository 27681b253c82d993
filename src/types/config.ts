/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const DeliveryConfigSchema = z.object({
  mode: z.enum(["copy", "move"]),
  overwrite: z.boolean(),
});

export const OcrConfigSchema = z.object({
  language: z.string(),
});

export const PdfConfigSchema = z.object({
  font: z.string().nullable(), // Path to a TTF/OTF file, null = built-in Helvetica
  fontSize: z.number().positive(),
  margin: z.number().nonnegative(),
});

export const MarkdownConfigSchema = z.object({
  template: z.string().nullable(), // Path to a .md.hbs template, null = built-in
});

export const DatesConfigSchema = z.object({
  enabled: z.boolean(),
});

export const CategorizationConfigSchema = z.object({
  enabled: z.boolean(),
  model: z.string(),
  apiKeyEnv: z.string(), // Name of the environment variable holding the key
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const AppConfigSchema = z.object({
  input: z.string(),
  output: z.string(), // Generated artifacts before delivery
  destination: z.string(), // Delivery root
  // Kept as a free string: unsupported formats are rejected by the generator
  format: z.string(),
  organization: z.string(),
  delivery: DeliveryConfigSchema,
  ocr: OcrConfigSchema,
  pdf: PdfConfigSchema,
  markdown: MarkdownConfigSchema,
  dates: DatesConfigSchema,
  categorization: CategorizationConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  delivery: DeliveryConfigSchema.partial().optional(),
  ocr: OcrConfigSchema.partial().optional(),
  pdf: PdfConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  dates: DatesConfigSchema.partial().optional(),
  categorization: CategorizationConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type DeliveryConfig = z.infer<typeof DeliveryConfigSchema>;
export type OcrConfig = z.infer<typeof OcrConfigSchema>;
export type PdfConfig = z.infer<typeof PdfConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type DatesConfig = z.infer<typeof DatesConfigSchema>;
export type CategorizationConfig = z.infer<typeof CategorizationConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
