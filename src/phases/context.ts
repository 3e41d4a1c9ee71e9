/**
 * Everything a phase needs from its caller.
 */

import { resolveToolPath } from '../config/migration-config.js';
import type { MigrationConfig, ToolName } from '../config/migration-config.js';
import type { ToolRunner } from '../runner/tool-runner.js';
import type { ToolOutcome } from '../types/outcome.js';
import type { PhaseExitStatus } from '../types/phase.js';
import type { Logger } from '../utils/logger.js';
import type { Narrator } from '../utils/narrator.js';

export interface PhaseContext {
  config: MigrationConfig;
  tools: ToolRunner;
  logger: Logger;
  narrator: Narrator;
}

/** Run one tool-backed step, narrating it first. */
export function runStep(
  context: PhaseContext,
  tool: ToolName,
  args: string[],
  description: string
): ToolOutcome {
  const { config, tools, narrator } = context;
  narrator.step(description);
  return tools.invoke(resolveToolPath(config, tool), args, config.timeoutSeconds);
}

/** Closing narration for a phase, by exit status. */
export function narrateExit(
  narrator: Narrator,
  label: string,
  exitStatus: PhaseExitStatus,
  next: string
): void {
  if (exitStatus === 0) {
    narrator.success(`${label} complete. Ready for ${next}.`);
  } else if (exitStatus === 1) {
    narrator.warn(`${label} finished with skipped or timed-out steps. Review before ${next}.`);
  } else {
    narrator.blocked(`${label} blocked. Resolve the failing steps before ${next}.`);
  }
}
