/**
 * Reader Module
 * Parses the final text order into node ids
 */

import { readFile } from "fs/promises";
import { OrderingFormatError, OrderingReadError, isErrnoException } from "../utils";
import type { OrderingContext } from "../types";

/**
 * Parse a text order: one node id per line, forming a permutation of 0..n-1
 */
export function parseTextOrdering(content: string, source = "ordering"): number[] {
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const ordering = lines.map((line, index) => {
    const value = line.trim();
    if (!/^\d+$/.test(value)) {
      throw new OrderingFormatError(
        `Line ${index + 1} of ${source} is not a node id: "${line}"`,
        { source, line: index + 1 },
      );
    }
    return Number(value);
  });

  const seen = new Array<boolean>(ordering.length).fill(false);
  for (const node of ordering) {
    if (node >= ordering.length) {
      throw new OrderingFormatError(
        `${source} is not a node permutation: node ${node} is out of range for ${ordering.length} nodes`,
        { source, node },
      );
    }
    if (seen[node]) {
      throw new OrderingFormatError(
        `${source} is not a node permutation: node ${node} appears twice`,
        { source, node },
      );
    }
    seen[node] = true;
  }

  return ordering;
}

export async function readTextOrdering(path: string): Promise<number[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new OrderingReadError(
        `Ordering file ${path} does not exist`,
        { path },
        { cause: error },
      );
    }
    throw error;
  }
  return parseTextOrdering(content, path);
}

/**
 * Reads the text order produced by the pipeline
 *
 * Reads from context:
 * - textOrderPath
 *
 * Writes to context:
 * - ordering
 */
export async function read(ctx: OrderingContext): Promise<void> {
  if (!ctx.textOrderPath) {
    throw new Error("Text conversion must run before reading the ordering");
  }

  if (ctx.dryRun) {
    return;
  }

  // With exit checks disabled a failed conversion still reaches this point;
  // whatever sits at textOrderPath was not written by this run
  const failed = ctx.tracker
    .getStats()
    .invocations.some((i) => i.phase === "convert-to-text" && i.code !== 0);
  if (failed) {
    ctx.logger.warn(
      `Skipping ${ctx.textOrderPath}: text conversion did not exit successfully`,
    );
    return;
  }

  ctx.ordering = await readTextOrdering(ctx.textOrderPath);
  ctx.logger.debug(`Read ordering of ${ctx.ordering.length} nodes`);
}
