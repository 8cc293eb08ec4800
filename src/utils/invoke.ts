/**
 * Shared invocation path for every external tool call
 */

import path from "node:path";
import type { CompletionStatus, OrderingContext, Phase } from "../types";
import { ExternalProcessError } from "./errors";

function describeTermination(status: CompletionStatus): string {
  if (status.signal) {
    return `was terminated by ${status.signal}`;
  }
  return `exited with status ${status.code}`;
}

/**
 * Trace, execute and check one external command
 *
 * Throws ExternalProcessError when the command cannot be started, and when
 * it exits unsuccessfully unless exit status checks are disabled.
 */
export async function invoke(
  ctx: OrderingContext,
  phase: Phase,
  argv: string[],
): Promise<CompletionStatus> {
  const command = argv[0] ?? "";
  ctx.logger.info(`Call process: ${argv.join(" ")}`);

  const startedAt = Date.now();
  let status: CompletionStatus;

  try {
    status = await ctx.runner.execute(argv);
  } catch (error) {
    ctx.tracker.trackInvocation({
      phase,
      argv,
      code: null,
      signal: null,
      duration: Date.now() - startedAt,
    });
    throw new ExternalProcessError(
      `Failed to start ${command}`,
      "ERR_PROCESS_SPAWN",
      { argv },
      {
        cause: error,
        suggestion: `Check that ${path.basename(command)} exists and is executable`,
      },
    );
  }

  ctx.tracker.trackInvocation({
    phase,
    argv,
    code: status.code,
    signal: status.signal,
    duration: Date.now() - startedAt,
  });

  if (status.code === 0) {
    return status;
  }

  const termination = describeTermination(status);

  if (ctx.config.process.checkExitStatus) {
    throw new ExternalProcessError(
      `${command} ${termination}`,
      "ERR_PROCESS_EXIT",
      {
        argv,
        exitCode: status.code,
        signal: status.signal,
        stderr: status.stderr,
      },
      { suggestion: "Re-run with --verbose to see the tool's output" },
    );
  }

  ctx.logger.warn(`${command} ${termination}, continuing`);
  return status;
}
