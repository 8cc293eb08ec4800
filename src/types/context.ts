/**
 * Ordering context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { PipelineConfig } from "./config";
import type { CommandRunner } from "./command";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

export interface ToolchainPaths {
  converter: string;
  orderingScript: string;
}

export interface DataLayout {
  dataPath: string;
  graphName: string;
  binaryDirectory: string;
  orderingDirectory: string;
  binaryOrderPath: string;
  textOrderPath: string;
}

export interface OrderingContext {
  // Input - provided at initialization
  config: PipelineConfig;
  toolchain: ToolchainPaths;
  layout: DataLayout;
  runner: CommandRunner;
  logger: Logger;
  tracker: Tracker;
  dryRun?: boolean;

  binaryVectors?: string[]; // Written by binary conversion, in attribute order
  binaryOrderPath?: string; // Written by the ordering tool
  textOrderPath?: string; // Written by text conversion
  ordering?: number[]; // Parsed text order (node ids)
}
