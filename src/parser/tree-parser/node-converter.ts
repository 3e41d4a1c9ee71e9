/**
 * Converts tree-sitter node trees into the flat SyntaxTree arena.
 * Consumers never need to interact with raw tree-sitter types.
 */

import type { OffsetTranslator } from './offsets.js';
import { ERROR_KIND } from './types.js';
import type { BackendNode, ErrorLocation, SyntaxNode, SyntaxTree } from './types.js';

interface MutableSyntaxNode extends SyntaxNode {
  readonly children: number[];
}

export interface ConvertedTree {
  tree: SyntaxTree;
  errors: ErrorLocation[];
}

/**
 * Walk a tree-sitter tree once, in pre-order, with an explicit stack.
 * Builds the node arena and collects every ERROR node, including ERROR nodes
 * nested inside other ERROR nodes.
 */
export function convertTree(root: BackendNode, offsets: OffsetTranslator): ConvertedTree {
  const nodes: MutableSyntaxNode[] = [];
  const errors: ErrorLocation[] = [];
  const stack: Array<{ node: BackendNode; parent: number | null }> = [{ node: root, parent: null }];

  let entry = stack.pop();
  while (entry) {
    const { node, parent } = entry;
    const startOffset = offsets.toByteOffset(node.startIndex);
    const endOffset = offsets.toByteOffset(node.endIndex);
    const converted: MutableSyntaxNode = {
      id: nodes.length,
      kind: node.type,
      startPosition: offsets.toPosition(startOffset),
      endPosition: offsets.toPosition(endOffset),
      startOffset,
      endOffset,
      parent,
      children: [],
    };
    nodes.push(converted);
    if (parent !== null) {
      nodes[parent].children.push(converted.id);
    }

    if (converted.kind === ERROR_KIND) {
      errors.push({
        nodeId: converted.id,
        startPosition: converted.startPosition,
        endPosition: converted.endPosition,
        startOffset,
        endOffset,
      });
    }

    // Push in reverse so the first child is visited next.
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push({ node: child, parent: converted.id });
    }
    entry = stack.pop();
  }

  return { tree: { nodes }, errors };
}

// ─── Arena navigation ───────────────────────────────────────────────

export function getRoot(tree: SyntaxTree): SyntaxNode {
  return tree.nodes[0];
}

export function getChildren(tree: SyntaxTree, node: SyntaxNode): SyntaxNode[] {
  return node.children.map(id => tree.nodes[id]);
}

export function getParent(tree: SyntaxTree, node: SyntaxNode): SyntaxNode | null {
  return node.parent === null ? null : tree.nodes[node.parent];
}

/** Whether `inner`'s byte span lies within `outer`'s. */
export function spanContains(
  outer: { startOffset: number; endOffset: number },
  inner: { startOffset: number; endOffset: number }
): boolean {
  return inner.startOffset >= outer.startOffset && inner.endOffset <= outer.endOffset;
}

/** Source bytes covered by a node, decoded as UTF-8. */
export function nodeText(source: Buffer, node: { startOffset: number; endOffset: number }): string {
  return source.subarray(node.startOffset, node.endOffset).toString('utf-8');
}
