import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { ZodError } from "zod";
import type { LogLevel, PipelineConfig } from "../types";
import { PipelineConfigSchema } from "../types";
import { ConfigError } from "./errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Command-line overrides, applied over the bundled defaults
 */
export interface ConfigOverrides {
  attributes?: string[];
  interpreter?: string[];
  checkExitStatus?: boolean;
  clean?: boolean;
  level?: LogLevel;
}

export function getDefaultConfigPath(): string {
  return join(__dirname, "..", "config", "default.json");
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

function validateConfig(raw: unknown, source: string): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration from ${source}: ${formatIssues(result.error)}`,
      { source },
    );
  }

  return result.data;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<PipelineConfig> {
  const defaultConfigPath = getDefaultConfigPath();
  const content = await readFile(defaultConfigPath, "utf-8");
  return validateConfig(JSON.parse(content), defaultConfigPath);
}

function mergeConfig(
  base: PipelineConfig,
  overrides: ConfigOverrides,
): Record<string, unknown> {
  return {
    ...base,
    attributes: overrides.attributes ?? base.attributes,
    toolchain: {
      ...base.toolchain,
      interpreter: overrides.interpreter ?? base.toolchain.interpreter,
    },
    process: {
      ...base.process,
      checkExitStatus: overrides.checkExitStatus ?? base.process.checkExitStatus,
    },
    output: { ...base.output, clean: overrides.clean ?? base.output.clean },
    logging: { ...base.logging, level: overrides.level ?? base.logging.level },
  };
}

/**
 * Load defaults and apply overrides
 * Priority: command line > default config
 */
export async function loadConfig(
  overrides: ConfigOverrides = {},
): Promise<PipelineConfig> {
  const config = await loadDefaultConfig();
  return validateConfig(mergeConfig(config, overrides), "command line");
}
