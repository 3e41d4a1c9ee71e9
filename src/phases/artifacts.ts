/**
 * Phase artifacts: one JSON document per file under the run's output
 * directory, written once per phase run.
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import type { JsonValue } from '../types/outcome.js';
import type { PhaseSummary } from '../types/phase.js';

export const PHASE_HISTORY_FILE = 'phase-history.jsonl';

export function ensureOutputDir(outputDir: string): string {
  const dir = resolve(outputDir);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/** Write `<outputDir>/<name>.json` and return its path. */
export function writeArtifact(outputDir: string, name: string, data: JsonValue): string {
  const path = join(outputDir, `${name}.json`);
  writeFileSync(path, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  return path;
}

/** Append one line per phase run to `<outputDir>/phase-history.jsonl`. */
export function appendPhaseHistory(outputDir: string, summary: PhaseSummary): string {
  const path = join(outputDir, PHASE_HISTORY_FILE);
  const entry = { timestamp: new Date().toISOString(), ...summary };
  appendFileSync(path, JSON.stringify(entry) + '\n', 'utf-8');
  return path;
}
