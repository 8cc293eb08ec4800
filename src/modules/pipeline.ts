/**
 * Pipeline Module
 * Sequences verification and the three conversion/ordering phases
 */

import type { OrderingContext, Phase, PipelineHooks } from "../types";
import { verify } from "./verifier";
import { toBinary, toText } from "./converter";
import { order } from "./ordering";

/**
 * Runs one graph through the pipeline, strictly in order:
 * verify -> binary conversion -> ordering -> text conversion.
 * The first failure aborts the run; nothing is retried or skipped.
 */
export async function run(
  ctx: OrderingContext,
  hooks: PipelineHooks = {},
): Promise<void> {
  const step = async (
    phase: Phase,
    module: (ctx: OrderingContext) => Promise<void>,
  ): Promise<void> => {
    hooks.onPhase?.(phase);
    await module(ctx);
    ctx.tracker.completePhase(phase);
  };

  await step("verify", verify);
  await step("convert-to-binary", toBinary);
  await step("compute-ordering", order);
  await step("convert-to-text", toText);
}
