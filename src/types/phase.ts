/**
 * Phase reports.
 */

import type { JsonValue, ToolOutcome, ToolStatus } from './outcome.js';

export type PhaseName = 'foundation' | 'mechanical' | 'semantic';

/**
 * 0 → proceed; 1 → advance with caution; 2 → blocked, must not auto-advance.
 */
export type PhaseExitStatus = 0 | 1 | 2;

export interface PhaseSummary {
  phase: PhaseName;
  exitStatus: PhaseExitStatus;
  steps: Record<string, ToolStatus>;
  [key: string]: JsonValue;
}

export interface PhaseReport {
  phase: PhaseName;
  exitStatus: PhaseExitStatus;
  /** Outcome of each step that ran through the tool adapter */
  outcomes: Record<string, ToolOutcome>;
  /** The summary document written to disk */
  summary: PhaseSummary;
  /** Artifact files written during the phase */
  artifacts: string[];
}
