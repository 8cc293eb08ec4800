/**
 * Central type exports
 */

// Configuration
export type {
  PipelineConfig,
  ToolchainConfig,
  ProcessConfig,
  OutputConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  PipelineConfigSchema,
  AttributesConfigSchema,
  plainFileName,
} from "./config";

// Context
export type { OrderingContext, ToolchainPaths, DataLayout } from "./context";

// Commands
export type { CommandRunner, CompletionStatus } from "./command";

// Pipeline
export type { Phase, PipelineHooks, Invocation, RunStats } from "./pipeline";

// Network
export type { RoutingKitNetwork } from "./network";
