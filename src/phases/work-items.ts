/**
 * Work items as produced by the work-item generator tool.
 *
 * The generator writes `{ items: [...], total_items, automated_count, ... }`;
 * each item carries at least an id, a file and a tier label. Fields the
 * pipeline does not interpret are kept in `metadata`.
 */

import { existsSync, readFileSync } from 'fs';
import { errorMessage } from '../utils/errors.js';
import type { JsonValue } from '../types/outcome.js';
import type { WorkItem } from '../types/work-item.js';

export interface LoadedWorkItems {
  items: WorkItem[];
  /** Set when the source was missing or unreadable */
  warning?: string;
}

const KNOWN_FIELDS = new Set(['id', 'file', 'type', 'pattern', 'tier']);

/**
 * Normalize a generator document (or a bare item array) into WorkItems.
 * Entries that are not objects are dropped.
 */
export function parseWorkItems(document: JsonValue): WorkItem[] {
  let entries: JsonValue[] = [];
  if (Array.isArray(document)) {
    entries = document;
  } else if (isObject(document) && Array.isArray(document.items)) {
    entries = document.items;
  }

  const items: WorkItem[] = [];
  entries.forEach((entry, index) => {
    if (!isObject(entry)) return;
    const metadata: { [key: string]: JsonValue } = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!KNOWN_FIELDS.has(key)) metadata[key] = value;
    }
    items.push({
      id: textField(entry.id) ?? `item-${index + 1}`,
      file: textField(entry.file) ?? 'unknown',
      type: textField(entry.type) ?? textField(entry.pattern) ?? 'unknown',
      tier: textField(entry.tier) ?? '',
      metadata,
    });
  });
  return items;
}

/** Read work items from a JSON file; a missing or malformed file yields none. */
export function loadWorkItems(path: string): LoadedWorkItems {
  if (!existsSync(path)) {
    return { items: [], warning: `Work items file not found: ${path}` };
  }
  let document: JsonValue;
  try {
    document = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    return { items: [], warning: `Could not read work items from ${path}: ${errorMessage(err)}` };
  }
  return { items: parseWorkItems(document) };
}

/** Numeric counter from a tool payload, if present. */
export function numberField(
  payload: { [key: string]: JsonValue } | undefined,
  key: string
): number | undefined {
  const value = payload?.[key];
  return typeof value === 'number' ? value : undefined;
}

function isObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return value !== null && value !== undefined && typeof value === 'object' && !Array.isArray(value);
}

function textField(value: JsonValue | undefined): string | undefined {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}
