/**
 * Tier classification and escalation.
 *
 * Splits work items by tier label and builds a bounded review brief for the
 * reasoning tiers. Items whose label matches neither reasoning tier count as
 * automated (already handled by the mechanical fixers) and stay out of the
 * brief.
 */

import type { EffortWeights, TierLabels } from '../config/migration-config.js';
import type { Tier, WorkItem } from '../types/work-item.js';

export type TierSample = {
  /** Exact number of items in the tier */
  count: number;
  description: string;
  /** At most `sampleSize` items, in input order */
  items: WorkItem[];
  /** States the true total against the sample shown */
  note: string;
};

export type ReviewBrief = {
  phase: 'semantic';
  purpose: string;
  totalItemsInProject: number;
  itemsRequiringReview: number;
  reasoningTier: TierSample;
  deepReasoningTier: TierSample;
  summary: {
    automatedItems: number;
    reviewItems: number;
    /** Advisory only: weighted sum of tier counts */
    estimatedReviewTokens: number;
    recommendation: string;
  };
};

export interface ClassifyOptions {
  sampleSize?: number;
  tierLabels?: TierLabels;
  effortWeights?: EffortWeights;
}

export const DEFAULT_SAMPLE_SIZE = 20;

export const DEFAULT_TIER_LABELS: TierLabels = {
  automated: ['automated'],
  reasoning: ['reasoning'],
  deepReasoning: ['deep-reasoning'],
};

export const DEFAULT_EFFORT_WEIGHTS: EffortWeights = {
  reasoning: 300,
  deepReasoning: 500,
};

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

/**
 * Matches raw tier labels against configured label sets.
 * Anything that is not a reasoning tier is automated.
 */
export class TierMatcher {
  private readonly reasoning: Set<string>;
  private readonly deepReasoning: Set<string>;
  private readonly automated: Set<string>;

  constructor(labels: TierLabels = DEFAULT_TIER_LABELS) {
    this.automated = new Set(labels.automated.map(normalizeLabel));
    this.reasoning = new Set(labels.reasoning.map(normalizeLabel));
    this.deepReasoning = new Set(labels.deepReasoning.map(normalizeLabel));
  }

  tierOf(item: WorkItem): Tier {
    const label = normalizeLabel(item.tier);
    if (this.deepReasoning.has(label)) return 'deep-reasoning';
    if (this.reasoning.has(label)) return 'reasoning';
    return 'automated';
  }

  /** Explicitly labeled for the mechanical fixers (unknown labels are not). */
  isAutomatedLabel(item: WorkItem): boolean {
    return this.automated.has(normalizeLabel(item.tier));
  }
}

export function partitionByTier(
  items: readonly WorkItem[],
  matcher: TierMatcher = new TierMatcher()
): Record<Tier, WorkItem[]> {
  const buckets: Record<Tier, WorkItem[]> = { automated: [], reasoning: [], 'deep-reasoning': [] };
  for (const item of items) {
    buckets[matcher.tierOf(item)].push(item);
  }
  return buckets;
}

export function estimateReviewEffort(
  counts: { reasoning: number; deepReasoning: number },
  weights: EffortWeights = DEFAULT_EFFORT_WEIGHTS
): number {
  return counts.reasoning * weights.reasoning + counts.deepReasoning * weights.deepReasoning;
}

/**
 * Build the review brief for items that need reasoning beyond mechanical fixes.
 */
export function classify(items: readonly WorkItem[], options: ClassifyOptions = {}): ReviewBrief {
  const {
    sampleSize = DEFAULT_SAMPLE_SIZE,
    tierLabels = DEFAULT_TIER_LABELS,
    effortWeights = DEFAULT_EFFORT_WEIGHTS,
  } = options;

  const buckets = partitionByTier(items, new TierMatcher(tierLabels));
  const reasoningCount = buckets.reasoning.length;
  const deepCount = buckets['deep-reasoning'].length;

  return {
    phase: 'semantic',
    purpose: 'Curated work items requiring reasoning beyond mechanical rewrites',
    totalItemsInProject: items.length,
    itemsRequiringReview: reasoningCount + deepCount,
    reasoningTier: sample(
      buckets.reasoning,
      sampleSize,
      'Medium-complexity semantic patterns needing first-tier reasoning'
    ),
    deepReasoningTier: sample(
      buckets['deep-reasoning'],
      sampleSize,
      'High-complexity patterns needing second-tier reasoning (reflection, serialization, native extensions)'
    ),
    summary: {
      automatedItems: buckets.automated.length,
      reviewItems: reasoningCount + deepCount,
      estimatedReviewTokens: estimateReviewEffort(
        { reasoning: reasoningCount, deepReasoning: deepCount },
        effortWeights
      ),
      recommendation:
        'Review the first-tier items first, then escalate to the second tier ' +
        'where the first-tier classification is uncertain',
    },
  };
}

function sample(items: WorkItem[], cap: number, description: string): TierSample {
  const shown = items.slice(0, cap);
  return {
    count: items.length,
    description,
    items: shown,
    note: `Total ${items.length} items; showing first ${shown.length}`,
  };
}
