/**
 * Command Runners
 * Execute external tools through the CommandRunner capability
 */

import { spawn } from "node:child_process";
import path from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { CommandRunner, CompletionStatus } from "../types";
import type { Logger } from "./logger";

const STDERR_TAIL_LINES = 20;

function forwardLines(stream: Readable, onLine: (line: string) => void): void {
  createInterface({ input: stream, crlfDelay: Infinity }).on("line", onLine);
}

/**
 * Spawns each command as a child process and waits for it to exit.
 * Output is forwarded to the logger at debug level.
 */
export class ProcessRunner implements CommandRunner {
  constructor(private logger: Logger) {}

  execute(argv: readonly string[]): Promise<CompletionStatus> {
    const [command, ...args] = argv;
    if (command === undefined) {
      return Promise.reject(new Error("Cannot execute an empty command"));
    }

    const label = path.basename(command);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
      const stderrTail: string[] = [];

      forwardLines(child.stdout, (line) => {
        this.logger.debug(`${label}: ${line}`);
      });
      forwardLines(child.stderr, (line) => {
        this.logger.debug(`${label}: ${line}`);
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) {
          stderrTail.shift();
        }
      });

      child.once("error", reject);
      child.once("close", (code, signal) => {
        resolve({ code, signal, stderr: stderrTail.join("\n") });
      });
    });
  }
}

/**
 * Records commands without running them (--dry-run)
 */
export class DryRunRunner implements CommandRunner {
  readonly commands: string[][] = [];

  async execute(argv: readonly string[]): Promise<CompletionStatus> {
    this.commands.push([...argv]);
    return { code: 0, signal: null, stderr: "" };
  }
}
