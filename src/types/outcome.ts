/**
 * Tool outcomes.
 *
 * Status is decided only by whether the tool exists, its exit code, and
 * whether stdout parses as JSON; never by what the payload says.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ToolStatus = 'complete' | 'partial' | 'error' | 'timeout' | 'skipped';

export const TOOL_STATUSES: readonly ToolStatus[] = ['complete', 'partial', 'error', 'timeout', 'skipped'];

/** What a successful tool printed on stdout. */
export type ToolPayload =
  | { kind: 'structured'; data: JsonValue }
  | { kind: 'raw-text'; text: string }
  | { kind: 'absent' };

interface OutcomeBase {
  /** Path of the tool executable */
  tool: string;
  /** Wall-clock time spent, 0 when nothing was spawned */
  durationMs: number;
}

export type ToolOutcome =
  | (OutcomeBase & { status: 'complete'; exitCode: 0; payload: ToolPayload })
  | (OutcomeBase & { status: 'partial'; exitCode: 1; payload: ToolPayload })
  | (OutcomeBase & { status: 'error'; exitCode: number | null; diagnostic: string })
  | (OutcomeBase & { status: 'timeout'; timeoutSeconds: number })
  | (OutcomeBase & { status: 'skipped'; reason: string });

/** complete or partial: the tool ran and its output is usable. */
export function isUsable(
  outcome: ToolOutcome
): outcome is Extract<ToolOutcome, { status: 'complete' | 'partial' }> {
  return outcome.status === 'complete' || outcome.status === 'partial';
}

/** Structured payload as a JSON object, or undefined for anything else. */
export function payloadObject(outcome: ToolOutcome): { [key: string]: JsonValue } | undefined {
  if (!isUsable(outcome) || outcome.payload.kind !== 'structured') return undefined;
  const data = outcome.payload.data;
  if (data === null || typeof data !== 'object' || Array.isArray(data)) return undefined;
  return data;
}
