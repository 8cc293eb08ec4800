/**
 * Command capability - the single seam through which external tools run
 */

export interface CompletionStatus {
  // null when the process was terminated by a signal
  code: number | null;
  signal: NodeJS.Signals | null;
  // Last lines the process wrote to stderr
  stderr: string;
}

export interface CommandRunner {
  execute(argv: readonly string[]): Promise<CompletionStatus>;
}
