/**
 * Layout Module
 * Creates the binary/ and ordering/ subdirectories on demand
 */

import { mkdir, stat } from "fs/promises";
import path from "node:path";
import { LayoutError, isErrnoException } from "../utils";
import type { OrderingContext } from "../types";

/**
 * Ensures `base/name` exists as a directory and returns its path
 *
 * Creation is single-level: the base directory must already exist. An
 * existing directory is left untouched, contents included.
 */
export async function ensureSubdirectory(
  ctx: OrderingContext,
  base: string,
  name: string,
): Promise<string> {
  const directory = path.join(base, name);

  if (ctx.dryRun) {
    ctx.logger.debug(`Would ensure directory ${directory}`);
    return directory;
  }

  try {
    await mkdir(directory);
    ctx.tracker.trackDirectory(directory);
    ctx.logger.debug(`Created directory ${directory}`);
    return directory;
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EEXIST") {
      throw new LayoutError(
        `Failed to create directory ${directory}`,
        "ERR_LAYOUT_CREATE",
        directory,
        { cause: error },
      );
    }
  }

  const info = await stat(directory);
  if (!info.isDirectory()) {
    throw new LayoutError(
      `${directory} exists but is not a directory`,
      "ERR_LAYOUT_NOT_DIRECTORY",
      directory,
      { suggestion: `Move or remove ${directory} and run again` },
    );
  }

  return directory;
}
