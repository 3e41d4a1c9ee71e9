/**
 * Real tree-sitter grammars. Runs only where a Python grammar is installed
 * (tree-sitter + tree-sitter-python, or web-tree-sitter + tree-sitter-wasms).
 */

import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  SyntaxTreeBuilder,
  getRoot,
  nodeText,
  spanContains,
} from '../../src/parser/tree-parser/index.js';
import { tempDir } from '../helpers/fake-runner.js';

const builder = new SyntaxTreeBuilder();
const python = await builder.resolver.resolve('python');

describe.runIf(python.ok)('tree-sitter grammars', () => {
  function pythonFile(source: string): string {
    const path = join(tempDir(), 'sample.py');
    writeFileSync(path, source);
    return path;
  }

  it('should parse valid Python without errors', async () => {
    const source = 'def add(a, b):\n    return a + b\n';
    const result = await builder.parse(pythonFile(source), 'python');

    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
    const tree = result.tree;
    if (!tree) throw new Error('expected a tree');
    expect(getRoot(tree).kind).toBe('module');
    expect(getRoot(tree).startOffset).toBe(0);
    expect(getRoot(tree).endOffset).toBe(Buffer.byteLength(source));
  });

  it('should report syntax errors inside the root span', async () => {
    const result = await builder.parse(pythonFile('def f(:\n  x = = 1\n)))\n'), 'python');

    expect(result.success).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
    const tree = result.tree;
    if (!tree) throw new Error('expected a tree');
    for (const location of result.errors) {
      expect(tree.nodes[location.nodeId].kind).toBe('ERROR');
      expect(spanContains(getRoot(tree), location)).toBe(true);
    }
  });

  it('should succeed when recovery only inserts a missing token', async () => {
    // The grammar recovers from the unclosed parameter list with a MISSING ")".
    const result = await builder.parse(pythonFile('def broken(:\n    pass\n'), 'python');

    expect(result.tree).not.toBeNull();
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it('should report byte offsets after multi-byte characters', async () => {
    const source = 'x = "é"\ny = 1\n';
    const result = await builder.parse(pythonFile(source), 'python');

    const tree = result.tree;
    if (!tree) throw new Error('expected a tree');
    const y = tree.nodes.find(n => n.kind === 'identifier' && nodeText(Buffer.from(source), n) === 'y');
    expect(y?.startOffset).toBe(9);
    expect(y?.startPosition).toEqual({ row: 1, column: 0 });
  });
});
