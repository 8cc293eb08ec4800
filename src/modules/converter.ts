/**
 * Converter Module
 * Text <-> binary vector conversion through InertialFlowCutter's console tool
 */

import {
  BINARY_DIRECTORY,
  ConversionMode,
  binaryVectorPath,
  invoke,
  sourceVectorPath,
} from "../utils";
import type { OrderingContext, Phase } from "../types";
import { ensureSubdirectory } from "./layout";

export function buildConversionArgs(
  converter: string,
  mode: ConversionMode,
  source: string,
  destination: string,
): string[] {
  return [converter, mode, source, destination];
}

export async function convertVector(
  ctx: OrderingContext,
  phase: Phase,
  mode: ConversionMode,
  source: string,
  destination: string,
): Promise<void> {
  await invoke(
    ctx,
    phase,
    buildConversionArgs(ctx.toolchain.converter, mode, source, destination),
  );
}

/**
 * Converts every attribute file into binary/, one at a time in list order
 *
 * Writes to context:
 * - binaryVectors
 */
export async function toBinary(ctx: OrderingContext): Promise<void> {
  await ensureSubdirectory(ctx, ctx.layout.dataPath, BINARY_DIRECTORY);

  const written: string[] = [];
  for (const name of ctx.config.attributes) {
    const destination = binaryVectorPath(ctx.layout, name);
    await convertVector(
      ctx,
      "convert-to-binary",
      ConversionMode.TextToBinary,
      sourceVectorPath(ctx.layout, name),
      destination,
    );
    written.push(destination);
  }

  ctx.binaryVectors = written;
}

/**
 * Converts the binary order vector into the final text order
 *
 * Reads from context:
 * - binaryOrderPath
 *
 * Writes to context:
 * - textOrderPath
 */
export async function toText(ctx: OrderingContext): Promise<void> {
  if (!ctx.binaryOrderPath) {
    throw new Error("Ordering must run before converting the order to text");
  }

  await convertVector(
    ctx,
    "convert-to-text",
    ConversionMode.BinaryToText,
    ctx.binaryOrderPath,
    ctx.layout.textOrderPath,
  );

  ctx.textOrderPath = ctx.layout.textOrderPath;
}
