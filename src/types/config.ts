/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const AppTargetSchema = z.object({
  uri: z.string().url(),
  // Single character repeated to form a header line in the data file
  separator: z.string().length(1),
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/),
});

export const ParserConfigSchema = z.object({
  separatorLength: z.number().int().positive(),
  debugName: z.string().regex(/^[\p{L}\p{N}_]+$/u),
  debugTarget: AppTargetSchema.omit({ separator: true }),
});

export const RegistryConfigSchema = z.object({
  apiUri: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
});

export const PreviewConfigSchema = z.object({
  filename: z.string(),
  // Custom Handlebars template for the DOT file (optional)
  template: z.string().optional(),
  // Graphviz layout engine written into the DOT file (e.g., "sfdp", "dot")
  engine: z.enum(["dot", "neato", "fdp", "sfdp", "circo", "twopi"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const LinkerConfigSchema = z.object({
  apps: z.array(AppTargetSchema).min(1),
  parser: ParserConfigSchema,
  registry: RegistryConfigSchema,
  preview: PreviewConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialLinkerConfigSchema = LinkerConfigSchema.partial().extend({
  parser: ParserConfigSchema.partial().optional(),
  registry: RegistryConfigSchema.partial().optional(),
  preview: PreviewConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type AppTargetConfig = z.infer<typeof AppTargetSchema>;
export type ParserConfig = z.infer<typeof ParserConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type PreviewConfig = z.infer<typeof PreviewConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LinkerConfig = z.infer<typeof LinkerConfigSchema>;
export type PartialLinkerConfig = z.infer<typeof PartialLinkerConfigSchema>;

export interface ConfigLoadError {
  path: string;
  error: unknown;
}
