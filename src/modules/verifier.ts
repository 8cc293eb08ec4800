/**
 * Verifier Module
 * Checks that every attribute file is present before conversion starts
 */

import { MissingInputError, isFile, sourceVectorPath } from "../utils";
import type { OrderingContext } from "../types";

export async function verify(ctx: OrderingContext): Promise<void> {
  const missing: string[] = [];

  for (const name of ctx.config.attributes) {
    const source = sourceVectorPath(ctx.layout, name);
    if (!(await isFile(source))) {
      missing.push(source);
    }
  }

  if (missing.length > 0) {
    throw new MissingInputError(missing, {
      suggestion: `Write the RoutingKit text vectors to ${ctx.layout.dataPath} first`,
    });
  }

  ctx.logger.debug(
    `Found ${ctx.config.attributes.length} attribute files in ${ctx.layout.dataPath}`,
  );
}
