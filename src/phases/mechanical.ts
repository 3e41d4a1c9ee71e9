/**
 * Phase 2: Mechanical
 *
 * Generates work items from the discovery scan, runs the pattern fixer once
 * per item labeled for the automated tier, then replaces deprecated
 * libraries. A failing fix is recorded and the loop moves on; earlier fixes
 * stay as they are.
 */

import { join, resolve } from 'path';
import { TierMatcher } from '../classifier/tier-classifier.js';
import { payloadObject } from '../types/outcome.js';
import type { ToolOutcome, ToolStatus } from '../types/outcome.js';
import type { PhaseReport, PhaseSummary } from '../types/phase.js';
import type { WorkItem } from '../types/work-item.js';
import { aggregatePhaseStatus } from './aggregate.js';
import { appendPhaseHistory, ensureOutputDir, writeArtifact } from './artifacts.js';
import { narrateExit, runStep } from './context.js';
import type { PhaseContext } from './context.js';
import { numberField, parseWorkItems } from './work-items.js';

export const DEFAULT_RAW_SCAN = 'raw-scan.json';

export interface MechanicalOptions {
  projectRoot: string;
  outputDir: string;
  /** Discovery scan fed to the work-item generator (default: `<projectRoot>/raw-scan.json`) */
  priorArtifact?: string;
}

/** Plain object type so failures serialize straight into the summary. */
export type FixFailure = {
  id: string;
  file: string;
  status: ToolStatus;
};

export interface PatternFixResult {
  status: 'complete' | 'partial';
  fixed: number;
  errors: number;
  failures: FixFailure[];
  outcomes: Record<string, ToolOutcome>;
}

/**
 * Run the pattern fixer for each item. complete/partial count as fixed,
 * everything else as an error; the step itself is never `error`.
 */
export function applyPatternFixes(
  items: readonly WorkItem[],
  outputDir: string,
  context: PhaseContext
): PatternFixResult {
  let fixed = 0;
  const failures: FixFailure[] = [];
  const outcomes: Record<string, ToolOutcome> = {};

  for (const item of items) {
    const outcome = runStep(
      context,
      'pattern-fixer',
      [item.id, item.file, outputDir],
      `Applying ${item.type} fix to ${item.file}`
    );
    outcomes[`pattern-fix:${item.id}`] = outcome;
    if (outcome.status === 'complete' || outcome.status === 'partial') {
      fixed++;
    } else {
      failures.push({ id: item.id, file: item.file, status: outcome.status });
      context.logger.warn(`Pattern fix ${item.id} (${item.file}) ended with ${outcome.status}`);
    }
  }

  return {
    status: failures.length === 0 ? 'complete' : 'partial',
    fixed,
    errors: failures.length,
    failures,
    outcomes,
  };
}

export function runMechanicalPhase(options: MechanicalOptions, context: PhaseContext): PhaseReport {
  const { config, logger, narrator } = context;
  const projectRoot = resolve(options.projectRoot);
  const outputDir = ensureOutputDir(options.outputDir);
  const priorArtifact = resolve(options.priorArtifact ?? join(projectRoot, DEFAULT_RAW_SCAN));

  narrator.heading('[PHASE 2] Mechanical - Apply automated fixes');
  narrator.detail('Project root', projectRoot);
  narrator.detail('Discovery scan', priorArtifact);
  narrator.detail('Output directory', outputDir);
  logger.info(`Mechanical phase started: ${projectRoot}`);

  const artifacts: string[] = [];
  const steps: Record<string, ToolStatus> = {};

  const generated = runStep(context, 'work-items', [priorArtifact, outputDir], 'Generating work items');
  steps['work-items'] = generated.status;
  const workItemsPayload = payloadObject(generated);
  let items: WorkItem[] = [];
  if (workItemsPayload) {
    artifacts.push(writeArtifact(outputDir, 'work-items', workItemsPayload));
    items = parseWorkItems(workItemsPayload);
  }

  const matcher = new TierMatcher(config.tierLabels);
  const automated = items.filter(item => matcher.isAutomatedLabel(item));
  narrator.detail('Automated-tier items', automated.length);
  const fixes = applyPatternFixes(automated, outputDir, context);
  steps['pattern-fixes'] = fixes.status;

  const replacement = runStep(
    context,
    'library-replacement',
    [projectRoot, outputDir],
    'Replacing deprecated libraries'
  );
  steps['library-replacement'] = replacement.status;
  const replacementPayload = payloadObject(replacement);
  if (replacementPayload) {
    artifacts.push(writeArtifact(outputDir, 'library-replacement-report', replacementPayload));
  }

  const exitStatus = aggregatePhaseStatus(Object.values(steps), config.partialPolicy);
  const summary: PhaseSummary = {
    phase: 'mechanical',
    projectRoot,
    outputDir,
    priorArtifact,
    steps,
    exitStatus,
    workItemsProcessed: items.length,
    automatedFixed: fixes.fixed,
    automatedErrors: fixes.errors,
    fixFailures: fixes.failures,
  };
  const totalItems = numberField(workItemsPayload, 'total_items');
  if (totalItems !== undefined) summary.totalWorkItems = totalItems;
  const automatedCount = numberField(workItemsPayload, 'automated_count');
  if (automatedCount !== undefined) summary.automatedTierItems = automatedCount;

  artifacts.push(writeArtifact(outputDir, 'mechanical-summary', summary));
  appendPhaseHistory(outputDir, summary);

  narrator.heading('[PHASE 2 SUMMARY]');
  for (const [step, status] of Object.entries(steps)) {
    narrator.detail(step, status);
  }
  narrator.detail('Work items processed', items.length);
  narrator.detail('Automated fixes applied', fixes.fixed);
  narrator.detail('Automated fix errors', fixes.errors);
  narrateExit(narrator, 'Phase 2', exitStatus, 'Phase 3 (semantic review)');
  logger.info(`Mechanical phase finished with status ${exitStatus}`);

  return {
    phase: 'mechanical',
    exitStatus,
    outcomes: {
      'work-items': generated,
      ...fixes.outcomes,
      'library-replacement': replacement,
    },
    summary,
    artifacts,
  };
}
