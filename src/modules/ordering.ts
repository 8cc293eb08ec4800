/**
 * Ordering Module
 * Runs InertialFlowCutter's ordering script over the binary vectors
 */

import { ORDERING_DIRECTORY, binaryDirectoryArgument, invoke } from "../utils";
import type { OrderingContext } from "../types";
import { ensureSubdirectory } from "./layout";

export function buildOrderingArgs(
  interpreter: readonly string[],
  script: string,
  binaryDirectory: string,
  destination: string,
): string[] {
  return [...interpreter, script, binaryDirectory, destination];
}

/**
 * Computes the node ordering into ordering/<graph>_bin
 *
 * Reads from context:
 * - binaryVectors
 *
 * Writes to context:
 * - binaryOrderPath
 */
export async function order(ctx: OrderingContext): Promise<void> {
  if (!ctx.binaryVectors) {
    throw new Error("Binary conversion must run before ordering");
  }

  await ensureSubdirectory(ctx, ctx.layout.dataPath, ORDERING_DIRECTORY);

  await invoke(
    ctx,
    "compute-ordering",
    buildOrderingArgs(
      ctx.config.toolchain.interpreter,
      ctx.toolchain.orderingScript,
      binaryDirectoryArgument(ctx.layout),
      ctx.layout.binaryOrderPath,
    ),
  );

  ctx.binaryOrderPath = ctx.layout.binaryOrderPath;
}
