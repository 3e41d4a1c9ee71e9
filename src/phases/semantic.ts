/**
 * Phase 3: Semantic preparation
 *
 * Curates the work items that need reasoning into a bounded review brief.
 * Runs no tools and never blocks.
 */

import { join, resolve } from 'path';
import { classify } from '../classifier/tier-classifier.js';
import type { ReviewBrief } from '../classifier/tier-classifier.js';
import type { PhaseReport, PhaseSummary } from '../types/phase.js';
import { appendPhaseHistory, ensureOutputDir, writeArtifact } from './artifacts.js';
import type { PhaseContext } from './context.js';
import { loadWorkItems } from './work-items.js';

export interface SemanticOptions {
  outputDir: string;
  /** Work-items artifact (default: `<outputDir>/work-items.json`) */
  workItemsPath?: string;
}

export interface SemanticReport extends PhaseReport {
  brief: ReviewBrief;
}

export function runSemanticPhase(options: SemanticOptions, context: PhaseContext): SemanticReport {
  const { config, logger, narrator } = context;
  const outputDir = ensureOutputDir(options.outputDir);
  const workItemsPath = resolve(options.workItemsPath ?? join(outputDir, 'work-items.json'));

  narrator.heading('[PHASE 3] Semantic - Prepare items for review');
  narrator.detail('Work items', workItemsPath);
  narrator.detail('Output directory', outputDir);

  const loaded = loadWorkItems(workItemsPath);
  if (loaded.warning) {
    logger.warn(loaded.warning);
    narrator.warn(loaded.warning);
  }

  narrator.step('Classifying work items by tier');
  const brief = classify(loaded.items, {
    sampleSize: config.sampleSize,
    tierLabels: config.tierLabels,
    effortWeights: config.effortWeights,
  });
  const briefFile = writeArtifact(outputDir, 'semantic-review-brief', brief);

  const summary: PhaseSummary = {
    phase: 'semantic',
    outputDir,
    workItemsPath,
    steps: { 'review-brief': 'complete' },
    exitStatus: 0,
    totalItems: brief.totalItemsInProject,
    automatedItems: brief.summary.automatedItems,
    reasoningItems: brief.reasoningTier.count,
    deepReasoningItems: brief.deepReasoningTier.count,
    estimatedReviewTokens: brief.summary.estimatedReviewTokens,
    briefFile,
  };
  appendPhaseHistory(outputDir, summary);

  narrator.heading('[PHASE 3 SUMMARY]');
  narrator.detail('Total work items', brief.totalItemsInProject);
  narrator.detail('Reasoning tier', brief.reasoningTier.count);
  narrator.detail('Deep-reasoning tier', brief.deepReasoningTier.count);
  narrator.detail('Estimated review tokens', brief.summary.estimatedReviewTokens);
  narrator.success(`Review brief written to ${briefFile}`);
  logger.info(`Semantic phase prepared ${brief.itemsRequiringReview} items for review`);

  return { phase: 'semantic', exitStatus: 0, outcomes: {}, summary, artifacts: [briefFile], brief };
}
