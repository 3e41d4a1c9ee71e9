/**
 * Work items: one per detected migration pattern occurrence, produced by an
 * external analysis tool and never mutated here.
 */

import type { JsonValue } from './outcome.js';

export type Tier = 'automated' | 'reasoning' | 'deep-reasoning';

/** Ordered from cheapest to most expensive. */
export const TIER_ORDER: readonly Tier[] = ['automated', 'reasoning', 'deep-reasoning'];

export type WorkItem = {
  /** Unique within a run */
  readonly id: string;
  /** Source file the pattern was found in */
  readonly file: string;
  /** Pattern type, e.g. "dict_iteritems" */
  readonly type: string;
  /** Tier label as the analysis tool wrote it */
  readonly tier: string;
  /** Every other field, passed through for the fixer */
  readonly metadata: { readonly [key: string]: JsonValue };
};
