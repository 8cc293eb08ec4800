/**
 * Pipeline data types
 */

export type Phase =
  | "verify"
  | "convert-to-binary"
  | "compute-ordering"
  | "convert-to-text";

export interface PipelineHooks {
  onPhase?: (phase: Phase) => void;
}

// ============================================================================
// Tracker
// ============================================================================

export interface Invocation {
  phase: Phase;
  argv: string[];
  code: number | null;
  signal: NodeJS.Signals | null;
  duration: number;
}

export interface RunStats {
  completedPhases: Phase[];
  invocations: Invocation[];
  createdDirectories: string[];
  failedInvocations: number;
  duration: number;
}
