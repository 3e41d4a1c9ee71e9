/**
 * JSON form of ParseResult. The arena layout is already acyclic, so the
 * serialized document mirrors the in-memory shape exactly.
 */

import { MalformedParseResultError } from '../../utils/errors.js';
import type { ErrorLocation, ParseResult, SourcePosition, SyntaxNode, SyntaxTree } from './types.js';

export function serializeParseResult(result: ParseResult, indent = 2): string {
  return JSON.stringify(result, null, indent);
}

/**
 * Rebuild a ParseResult from its JSON form (a string or an already-parsed
 * value). Throws MalformedParseResultError when the shape does not match.
 */
export function deserializeParseResult(input: unknown): ParseResult {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      throw new MalformedParseResultError(err instanceof Error ? err.message : String(err));
    }
  }

  const obj = record(raw, 'result');
  const filePath = string(obj.filePath, 'filePath');
  const language = string(obj.language, 'language');
  const provider = obj.provider === null || obj.provider === undefined ? null : string(obj.provider, 'provider');
  const tree = obj.tree === null || obj.tree === undefined ? null : readTree(obj.tree);
  const errors = array(obj.errors, 'errors').map((e, i) => readErrorLocation(e, `errors[${i}]`));

  if (tree) {
    for (const location of errors) {
      if (location.nodeId >= tree.nodes.length) {
        throw new MalformedParseResultError(`error location refers to missing node ${location.nodeId}`);
      }
    }
  }

  const result: ParseResult = {
    filePath,
    language,
    provider,
    tree,
    errors,
    success: tree !== null && errors.length === 0,
  };
  if (obj.error !== undefined) {
    return { ...result, error: string(obj.error, 'error') };
  }
  return result;
}

function readTree(value: unknown): SyntaxTree {
  const nodes = array(record(value, 'tree').nodes, 'tree.nodes').map((n, i) => readNode(n, i));
  if (nodes.length === 0) {
    throw new MalformedParseResultError('tree has no root node');
  }
  for (const node of nodes) {
    for (const child of node.children) {
      if (child <= node.id || child >= nodes.length || nodes[child].parent !== node.id) {
        throw new MalformedParseResultError(`node ${node.id} has an invalid child ${child}`);
      }
    }
  }
  return { nodes };
}

function readNode(value: unknown, index: number): SyntaxNode {
  const where = `tree.nodes[${index}]`;
  const obj = record(value, where);
  const id = integer(obj.id, `${where}.id`);
  if (id !== index) {
    throw new MalformedParseResultError(`${where}.id must equal its index`);
  }
  const parent = obj.parent === null ? null : integer(obj.parent, `${where}.parent`);
  if ((index === 0) !== (parent === null)) {
    throw new MalformedParseResultError(`${where}.parent: only the root may have no parent`);
  }
  return {
    id,
    kind: string(obj.kind, `${where}.kind`),
    startPosition: position(obj.startPosition, `${where}.startPosition`),
    endPosition: position(obj.endPosition, `${where}.endPosition`),
    startOffset: integer(obj.startOffset, `${where}.startOffset`),
    endOffset: integer(obj.endOffset, `${where}.endOffset`),
    parent,
    children: array(obj.children, `${where}.children`).map((c, i) => integer(c, `${where}.children[${i}]`)),
  };
}

function readErrorLocation(value: unknown, where: string): ErrorLocation {
  const obj = record(value, where);
  return {
    nodeId: integer(obj.nodeId, `${where}.nodeId`),
    startPosition: position(obj.startPosition, `${where}.startPosition`),
    endPosition: position(obj.endPosition, `${where}.endPosition`),
    startOffset: integer(obj.startOffset, `${where}.startOffset`),
    endOffset: integer(obj.endOffset, `${where}.endOffset`),
  };
}

function position(value: unknown, where: string): SourcePosition {
  const obj = record(value, where);
  return { row: integer(obj.row, `${where}.row`), column: integer(obj.column, `${where}.column`) };
}

function record(value: unknown, where: string): Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new MalformedParseResultError(`${where} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function array(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedParseResultError(`${where} must be an array`);
  }
  return value;
}

function string(value: unknown, where: string): string {
  if (typeof value !== 'string') {
    throw new MalformedParseResultError(`${where} must be a string`);
  }
  return value;
}

function integer(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new MalformedParseResultError(`${where} must be a non-negative integer`);
  }
  return value;
}
