/**
 * Error formatting for the CLI
 */

import chalk from "chalk";
import { ZodError } from "zod";
import { ExternalProcessError, PipelineError } from "./errors";

function cross(): string {
  return chalk.red("✖");
}

function indent(text: string): string[] {
  return text.split("\n").map((line) => `    ${chalk.dim(line)}`);
}

export function formatError(error: unknown): string {
  if (error instanceof PipelineError) {
    const lines = [`${cross()} ${chalk.bold(error.message)} ${chalk.dim(`[${error.code}]`)}`];

    if (error instanceof ExternalProcessError && error.stderr) {
      lines.push(...indent(error.stderr));
    }
    if (error.suggestion) {
      lines.push(`  ${chalk.dim("→")} ${error.suggestion}`);
    }

    return lines.join("\n");
  }

  if (error instanceof ZodError) {
    return [
      `${cross()} ${chalk.bold("Invalid arguments")}`,
      ...error.issues.map((issue) => `  ${chalk.dim("·")} ${issue.message}`),
    ].join("\n");
  }

  if (error instanceof Error) {
    return `${cross()} ${error.message}`;
  }

  return `${cross()} ${String(error)}`;
}
