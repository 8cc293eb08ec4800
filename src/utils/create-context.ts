import type { CommandRunner, OrderingContext, PipelineConfig } from "../types";
import { DryRunRunner, ProcessRunner } from "./command-runner";
import { Logger } from "./logger";
import { resolveLayout, resolveToolchain } from "./toolchain";
import { Tracker } from "./tracker";

export interface CreateContextOptions {
  inertialFlowPath: string;
  dataPath: string;
  graphName: string;
  config: PipelineConfig;
  runner?: CommandRunner;
  logger?: Logger;
  dryRun?: boolean;
}

/**
 * Build the context for one graph. Without an explicit runner, commands are
 * spawned as child processes, or only recorded on a dry run.
 */
export function createContext(options: CreateContextOptions): OrderingContext {
  const logger = options.logger ?? new Logger(options.config.logging.level);
  const runner =
    options.runner ??
    (options.dryRun ? new DryRunRunner() : new ProcessRunner(logger));

  return {
    config: options.config,
    toolchain: resolveToolchain(options.inertialFlowPath),
    layout: resolveLayout(options.dataPath, options.graphName),
    runner,
    logger,
    tracker: new Tracker(),
    dryRun: options.dryRun,
  };
}
