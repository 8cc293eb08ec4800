/**
 * Error hierarchy for the ordering pipeline
 *
 * Every error is fatal to the run; the CLI prints it and exits with status 1.
 *
 * - MissingInputError: attribute files absent before conversion
 * - ExternalProcessError: converter or ordering tool could not start or failed
 * - LayoutError: binary/ or ordering/ could not be created
 * - OrderingFormatError: the text order is not a node permutation
 * - OrderingReadError: the text order could not be read
 * - ConfigError: defaults merged with command-line overrides failed validation
 */

export interface ErrorContext {
  [key: string]: unknown;
}

export interface PipelineErrorOptions {
  suggestion?: string;
  cause?: unknown;
}

export interface PipelineErrorJSON {
  code: string;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(
    message: string,
    context: ErrorContext = {},
    options: PipelineErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = options.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): PipelineErrorJSON {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

export class MissingInputError extends PipelineError {
  readonly code = "ERR_INPUT_MISSING";
  readonly missing: string[];

  constructor(missing: string[], options: PipelineErrorOptions = {}) {
    super(
      `Missing attribute file${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
      { missing },
      options,
    );
    this.missing = missing;
  }
}

export type ExternalProcessErrorCode = "ERR_PROCESS_SPAWN" | "ERR_PROCESS_EXIT";

export class ExternalProcessError extends PipelineError {
  readonly code: ExternalProcessErrorCode;
  readonly argv: string[];
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(
    message: string,
    code: ExternalProcessErrorCode,
    details: {
      argv: string[];
      exitCode?: number | null;
      signal?: NodeJS.Signals | null;
      stderr?: string;
    },
    options: PipelineErrorOptions = {},
  ) {
    super(
      message,
      {
        argv: details.argv,
        exitCode: details.exitCode ?? null,
        signal: details.signal ?? null,
      },
      options,
    );
    this.code = code;
    this.argv = details.argv;
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    this.stderr = details.stderr ?? "";
  }
}

export type LayoutErrorCode = "ERR_LAYOUT_CREATE" | "ERR_LAYOUT_NOT_DIRECTORY";

export class LayoutError extends PipelineError {
  readonly code: LayoutErrorCode;

  constructor(
    message: string,
    code: LayoutErrorCode,
    directory: string,
    options: PipelineErrorOptions = {},
  ) {
    super(message, { directory }, options);
    this.code = code;
  }
}

export class OrderingFormatError extends PipelineError {
  readonly code = "ERR_ORDERING_FORMAT";
}

export class OrderingReadError extends PipelineError {
  readonly code = "ERR_ORDERING_READ";
}

export class ConfigError extends PipelineError {
  readonly code = "ERR_CONFIG_INVALID";
}

/**
 * Narrow an unknown error to a Node.js system error with a code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
