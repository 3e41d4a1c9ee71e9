/**
 * Type abstractions for the syntax-tree layer.
 * These types decouple consumers from tree-sitter internals.
 */

/** Node kind tree-sitter assigns to regions it could not parse. */
export const ERROR_KIND = 'ERROR';

/**
 * Position in source code. Row is 0-indexed; column is a 0-indexed byte
 * offset from the start of the line.
 */
export interface SourcePosition {
  row: number;
  column: number;
}

/**
 * A node in the flattened syntax tree. Nodes live in `SyntaxTree.nodes` and
 * refer to each other by index, so the tree serializes without cycles.
 */
export interface SyntaxNode {
  /** Index of this node in `SyntaxTree.nodes` */
  readonly id: number;
  /** Grammar node type, e.g. "function_definition"; "ERROR" marks a parse failure */
  readonly kind: string;
  readonly startPosition: SourcePosition;
  readonly endPosition: SourcePosition;
  /** Byte offset of the start of this node */
  readonly startOffset: number;
  /** Byte offset just past the end of this node */
  readonly endOffset: number;
  /** Index of the parent node; null for the root */
  readonly parent: number | null;
  /** Indices of child nodes in document order */
  readonly children: readonly number[];
}

/** Pre-order node arena; the root is always `nodes[0]`. */
export interface SyntaxTree {
  readonly nodes: readonly SyntaxNode[];
}

/** Location of an ERROR node. */
export interface ErrorLocation {
  readonly nodeId: number;
  readonly startPosition: SourcePosition;
  readonly endPosition: SourcePosition;
  readonly startOffset: number;
  readonly endOffset: number;
}

/**
 * Result of parsing one file with one grammar.
 */
export interface ParseResult {
  /** Absolute path of the parsed file */
  readonly filePath: string;
  /** Normalized language name */
  readonly language: string;
  /** Grammar back-end that produced the tree */
  readonly provider: string | null;
  /** Parse tree; null only when the back-end raised instead of returning a tree */
  readonly tree: SyntaxTree | null;
  /** Every ERROR node, in pre-order */
  readonly errors: readonly ErrorLocation[];
  /** True when a tree was produced and it contains no ERROR nodes */
  readonly success: boolean;
  /** Message raised by the back-end, when it raised */
  readonly error?: string;
}

// ─── Back-end surface ───────────────────────────────────────────────

/**
 * The part of a tree-sitter node (native or WASM binding) the builder reads.
 * Indices are in UTF-16 code units of the parsed string.
 */
export interface BackendNode {
  readonly type: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly childCount: number;
  child(index: number): BackendNode | null;
}

export interface BackendTree {
  readonly rootNode: BackendNode;
}

/**
 * A ready-to-use parser for one language, produced by a grammar provider.
 */
export interface ParserHandle {
  readonly language: string;
  /** Name of the provider that loaded the grammar */
  readonly provider: string;
  parse(text: string): BackendTree;
}
