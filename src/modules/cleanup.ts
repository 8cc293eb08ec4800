/**
 * Cleanup Module
 * Removes the intermediate binary files written by this run
 */

import { readdir, rm, rmdir } from "fs/promises";
import type { OrderingContext } from "../types";

/**
 * Deletes the binary attribute vectors and the binary order. binary/ itself
 * is removed only when nothing else is left in it.
 *
 * Reads from context:
 * - binaryVectors
 * - binaryOrderPath
 * - textOrderPath
 */
export async function clean(ctx: OrderingContext): Promise<void> {
  if (!ctx.textOrderPath) {
    throw new Error("The pipeline must complete before cleaning intermediates");
  }

  const intermediates = [...(ctx.binaryVectors ?? [])];
  if (ctx.binaryOrderPath) {
    intermediates.push(ctx.binaryOrderPath);
  }

  if (ctx.dryRun) {
    for (const file of intermediates) {
      ctx.logger.info(`Would remove ${file}`);
    }
    return;
  }

  for (const file of intermediates) {
    await rm(file, { force: true });
    ctx.logger.debug(`Removed ${file}`);
  }

  const remaining = await readdir(ctx.layout.binaryDirectory);
  if (remaining.length === 0) {
    await rmdir(ctx.layout.binaryDirectory);
    ctx.logger.debug(`Removed ${ctx.layout.binaryDirectory}`);
  } else {
    ctx.logger.debug(
      `Kept ${ctx.layout.binaryDirectory}: ${remaining.length} unrelated entries`,
    );
  }
}
