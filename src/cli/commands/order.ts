/**
 * Order command - Loads config and runs the ordering pipeline
 */

import ora from "ora";
import { z } from "zod";
import { Logger, createContext, formatError, loadConfig } from "../../utils";
import type { ConfigOverrides } from "../../utils";
import * as modules from "../../modules";
import { plainFileName } from "../../types";
import type { Phase } from "../../types";

const PHASE_TEXT: Record<Phase, string> = {
  verify: "Checking attribute files...",
  "convert-to-binary": "Converting attributes to binary...",
  "compute-ordering": "Computing node ordering...",
  "convert-to-text": "Converting ordering to text...",
};

export const OrderArgumentsSchema = z.object({
  inertialFlowPath: z.string().min(1),
  dataPath: z.string().min(1),
  graphName: plainFileName("Graph name must be a plain file name"),
});

export const OrderOptionsSchema = z.object({
  attributes: z.array(z.string()).optional(),
  interpreter: z.string().optional(),
  checkExit: z.boolean().optional(),
  clean: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof OrderOptionsSchema>;

/**
 * Map command-line options onto config overrides
 */
export function toOverrides(options: Options): ConfigOverrides {
  return {
    attributes: options.attributes,
    interpreter: options.interpreter?.split(/\s+/).filter(Boolean),
    checkExitStatus: options.checkExit,
    clean: options.clean,
    level: options.verbose ? "debug" : undefined,
  };
}

export async function orderCommand(
  inertialFlowPath: string,
  dataPath: string,
  graphName: string,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI arguments and options
    const args = OrderArgumentsSchema.parse({ inertialFlowPath, dataPath, graphName });
    const options = OrderOptionsSchema.parse(opts);

    const config = await loadConfig(toOverrides(options));

    // Clear the spinner line before each log line so frames and output don't mix
    const logger = new Logger(config.logging.level, {
      beforeWrite: () => spinner.clear(),
    });

    const ctx = createContext({ ...args, config, logger, dryRun: options.dryRun });

    await modules.run(ctx, {
      onPhase: (phase) => {
        spinner.text = PHASE_TEXT[phase];
      },
    });

    spinner.text = "Reading ordering...";
    await modules.read(ctx);

    if (config.output.clean) {
      spinner.text = "Removing intermediates...";
      await modules.clean(ctx);
    }

    spinner.clear();
    spinner.stop();

    modules.stats(ctx);
  } catch (error) {
    spinner.fail("Ordering failed");
    console.error(formatError(error));
    process.exit(1);
  }
}
