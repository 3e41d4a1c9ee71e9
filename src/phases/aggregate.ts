/**
 * Phase-level status from step statuses.
 */

import type { PartialPolicy } from '../config/migration-config.js';
import type { ToolStatus } from '../types/outcome.js';
import type { PhaseExitStatus } from '../types/phase.js';

/**
 * - every step complete or partial → 0 (proceed)
 * - any step error                 → 2 (blocked)
 * - otherwise (timeout / skipped)  → 1 (advance with caution)
 *
 * Under the 'caution' policy a partial step alone also yields 1.
 */
export function aggregatePhaseStatus(
  statuses: readonly ToolStatus[],
  policy: PartialPolicy = 'proceed'
): PhaseExitStatus {
  if (statuses.every(s => s === 'complete' || s === 'partial')) {
    return policy === 'caution' && statuses.includes('partial') ? 1 : 0;
  }
  if (statuses.includes('error')) {
    return 2;
  }
  return 1;
}

export function describeExitStatus(status: PhaseExitStatus): string {
  switch (status) {
    case 0:
      return 'proceed';
    case 1:
      return 'advance with caution';
    case 2:
      return 'blocked';
  }
}
