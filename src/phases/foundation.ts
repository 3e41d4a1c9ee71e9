/**
 * Phase 1: Foundation
 *
 * Prepares the codebase without changing behavior: compatibility imports,
 * a lint baseline and test scaffolds. Each step is one tool invocation with
 * `[projectRoot, outputDir]`.
 */

import { resolve } from 'path';
import type { ToolName } from '../config/migration-config.js';
import { payloadObject } from '../types/outcome.js';
import type { JsonValue, ToolOutcome, ToolStatus } from '../types/outcome.js';
import type { PhaseReport, PhaseSummary } from '../types/phase.js';
import { aggregatePhaseStatus } from './aggregate.js';
import { appendPhaseHistory, ensureOutputDir, writeArtifact } from './artifacts.js';
import { narrateExit, runStep } from './context.js';
import type { PhaseContext } from './context.js';
import { numberField } from './work-items.js';

export interface FoundationOptions {
  projectRoot: string;
  outputDir: string;
  /** Discovery artifact the run builds on; recorded in the summary */
  priorArtifact?: string;
}

interface FoundationStep {
  step: string;
  tool: ToolName;
  artifact: string;
  description: string;
}

const STEPS: readonly FoundationStep[] = [
  {
    step: 'compat-imports',
    tool: 'compat-imports',
    artifact: 'injection-report',
    description: 'Injecting compatibility imports',
  },
  {
    step: 'lint-baseline',
    tool: 'lint-baseline',
    artifact: 'lint-baseline',
    description: 'Capturing lint baseline',
  },
  {
    step: 'test-scaffolds',
    tool: 'test-scaffolds',
    artifact: 'test-scaffolds',
    description: 'Generating test scaffolds',
  },
];

export function runFoundationPhase(options: FoundationOptions, context: PhaseContext): PhaseReport {
  const { config, logger, narrator } = context;
  const projectRoot = resolve(options.projectRoot);
  const outputDir = ensureOutputDir(options.outputDir);
  const priorArtifact = options.priorArtifact ? resolve(options.priorArtifact) : null;

  narrator.heading('[PHASE 1] Foundation - Prepare codebase for migration');
  narrator.detail('Project root', projectRoot);
  narrator.detail('Output directory', outputDir);
  logger.info(`Foundation phase started: ${projectRoot}`);

  const outcomes: Record<string, ToolOutcome> = {};
  const steps: Record<string, ToolStatus> = {};
  const payloads: Record<string, { [key: string]: JsonValue } | undefined> = {};
  const artifacts: string[] = [];

  for (const { step, tool, artifact, description } of STEPS) {
    const outcome = runStep(context, tool, [projectRoot, outputDir], description);
    outcomes[step] = outcome;
    steps[step] = outcome.status;
    const payload = payloadObject(outcome);
    payloads[step] = payload;
    if (payload) {
      artifacts.push(writeArtifact(outputDir, artifact, payload));
    }
    logger.info(`Foundation step ${step}: ${outcome.status}`);
  }

  const exitStatus = aggregatePhaseStatus(Object.values(steps), config.partialPolicy);
  const summary: PhaseSummary = {
    phase: 'foundation',
    projectRoot,
    outputDir,
    priorArtifact,
    steps,
    exitStatus,
  };

  const filesModified = numberField(payloads['compat-imports'], 'files_modified');
  if (filesModified !== undefined) summary.filesWithCompatImports = filesModified;
  const testFiles = numberField(payloads['test-scaffolds'], 'test_files_created');
  if (testFiles !== undefined) summary.testFilesCreated = testFiles;

  artifacts.push(writeArtifact(outputDir, 'foundation-summary', summary));
  appendPhaseHistory(outputDir, summary);

  narrator.heading('[PHASE 1 SUMMARY]');
  for (const [step, status] of Object.entries(steps)) {
    narrator.detail(step, status);
  }
  if (filesModified !== undefined) narrator.detail('Files with compatibility imports', filesModified);
  if (testFiles !== undefined) narrator.detail('Test files created', testFiles);
  narrateExit(narrator, 'Phase 1', exitStatus, 'Phase 2 (mechanical fixes)');
  logger.info(`Foundation phase finished with status ${exitStatus}`);

  return { phase: 'foundation', exitStatus, outcomes, summary, artifacts };
}
