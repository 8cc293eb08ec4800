/**
 * Utility exports
 */

// Paths and external-interface constants
export {
  CONVERTER_PATH,
  ORDERING_SCRIPT,
  BINARY_DIRECTORY,
  ORDERING_DIRECTORY,
  BINARY_ORDER_SUFFIX,
  ConversionMode,
  resolveToolchain,
  resolveLayout,
  sourceVectorPath,
  binaryVectorPath,
  binaryDirectoryArgument,
} from "./toolchain";

// Filesystem utilities
export { isFile } from "./fs";

// Config utilities
export { loadConfig, loadDefaultConfig, getDefaultConfigPath } from "./load-config";
export type { ConfigOverrides } from "./load-config";

// Errors
export {
  PipelineError,
  MissingInputError,
  ExternalProcessError,
  LayoutError,
  OrderingFormatError,
  OrderingReadError,
  ConfigError,
  isErrnoException,
} from "./errors";
export { formatError } from "./format-error";

// Processes
export { ProcessRunner, DryRunRunner } from "./command-runner";
export { invoke } from "./invoke";

// Classes
export { Logger } from "./logger";
export type { LoggerOptions } from "./logger";
export { Tracker } from "./tracker";
export { createContext } from "./create-context";
export type { CreateContextOptions } from "./create-context";
