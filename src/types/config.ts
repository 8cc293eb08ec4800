/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

/**
 * A single path segment: no separators, and not "." or ".."
 */
export function plainFileName(message: string) {
  return z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, message)
    .refine((name) => name !== "." && name !== "..", { message });
}

// Attribute names become file names under the data directory and binary/
const AttributeNameSchema = plainFileName("Attribute names must be plain file names");

export const AttributesConfigSchema = z
  .array(AttributeNameSchema)
  .nonempty("At least one attribute is required")
  .refine((names) => new Set(names).size === names.length, {
    message: "Attribute names must be unique",
  });

export const ToolchainConfigSchema = z.object({
  // Command prefix used to launch the ordering script, e.g. ["python3"]
  interpreter: z.array(z.string().min(1)).nonempty(),
});

export const ProcessConfigSchema = z.object({
  // When false, a non-zero exit is logged instead of aborting the run
  checkExitStatus: z.boolean(),
});

export const OutputConfigSchema = z.object({
  // Remove intermediate binary files after a successful run
  clean: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const PipelineConfigSchema = z.object({
  attributes: AttributesConfigSchema,
  toolchain: ToolchainConfigSchema,
  process: ProcessConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

// Infer TypeScript types from Zod schemas
export type ToolchainConfig = z.infer<typeof ToolchainConfigSchema>;
export type ProcessConfig = z.infer<typeof ProcessConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
