/**
 * Shared fixtures for tests
 */

import { copyFile, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type {
  CommandRunner,
  CompletionStatus,
  OrderingContext,
  PipelineConfig,
  RoutingKitNetwork,
} from "../types";
import { ConversionMode, Logger, createContext } from "../utils";

const SUCCESS: CompletionStatus = { code: 0, signal: null, stderr: "" };

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    attributes: ["head", "travel_time", "first_out", "latitude", "longitude"],
    toolchain: { interpreter: ["python3"] },
    process: { checkExitStatus: true },
    output: { clean: false },
    logging: { level: "error" },
    ...overrides,
  };
}

export function testContext(
  dataPath: string,
  runner: CommandRunner,
  overrides: Partial<PipelineConfig> = {},
): OrderingContext {
  return createContext({
    inertialFlowPath: "/tools",
    dataPath,
    graphName: "berlin",
    config: testConfig(overrides),
    runner,
    logger: new Logger("error"),
  });
}

// Three nodes connected in a cycle
export const TRIANGLE: RoutingKitNetwork = {
  firstOut: [0, 1, 2, 3],
  head: [1, 2, 0],
  travelTime: [10, 20, 30],
  latitude: [52.5, 52.51, 52.52],
  longitude: [13.4, 13.41, 13.42],
};

export async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "network-order-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Records every argv and answers with `respond`
 */
export class RecordingRunner implements CommandRunner {
  readonly calls: string[][] = [];

  constructor(
    private respond: (argv: readonly string[]) => CompletionStatus = () => SUCCESS,
  ) {}

  async execute(argv: readonly string[]): Promise<CompletionStatus> {
    this.calls.push([...argv]);
    return this.respond(argv);
  }
}

/**
 * Stands in for the console tool and the ordering script: conversions copy
 * source to destination, ordering writes `ordering` as a text vector.
 */
export class CopyingRunner implements CommandRunner {
  readonly calls: string[][] = [];

  constructor(private ordering: readonly number[]) {}

  async execute(argv: readonly string[]): Promise<CompletionStatus> {
    this.calls.push([...argv]);
    const mode = argv[1];
    const destination = argv[argv.length - 1];

    if (mode === ConversionMode.TextToBinary || mode === ConversionMode.BinaryToText) {
      const source = argv[2];
      try {
        await copyFile(source, destination);
        return SUCCESS;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { code: 1, signal: null, stderr: reason };
      }
    }

    const content = this.ordering.map((node) => `${node}\n`).join("");
    await writeFile(destination, content, "utf-8");
    return SUCCESS;
  }
}
