/**
 * Run Tracker
 * Records phases, external invocations and created directories
 */

import type { Invocation, Phase, RunStats } from "../types";

export class Tracker {
  private completedPhases: Phase[] = [];
  private invocations: Invocation[] = [];
  private createdDirectories: string[] = [];
  private startTime = new Date();

  completePhase(phase: Phase): void {
    this.completedPhases.push(phase);
  }

  trackInvocation(invocation: Invocation): void {
    this.invocations.push(invocation);
  }

  trackDirectory(path: string): void {
    this.createdDirectories.push(path);
  }

  getStats(): RunStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      completedPhases: [...this.completedPhases],
      invocations: [...this.invocations],
      createdDirectories: [...this.createdDirectories],
      failedInvocations: this.invocations.filter((i) => i.code !== 0).length,
      duration,
    };
  }
}
