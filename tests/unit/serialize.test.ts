/**
 * Tests for ParseResult JSON serialization
 */

import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  GrammarResolver,
  SyntaxTreeBuilder,
  deserializeParseResult,
  serializeParseResult,
} from '../../src/parser/tree-parser/index.js';
import type { ParseResult } from '../../src/parser/tree-parser/index.js';
import { MalformedParseResultError } from '../../src/utils/errors.js';
import { FakeProvider } from '../helpers/fake-grammar.js';
import { tempDir } from '../helpers/fake-runner.js';

async function parseText(text: string): Promise<ParseResult> {
  const file = join(tempDir(), 'input.txt');
  writeFileSync(file, text);
  const builder = new SyntaxTreeBuilder(new GrammarResolver([new FakeProvider('native', ['words'])]));
  return builder.parse(file, 'words');
}

describe('ParseResult serialization', () => {
  it('should round-trip a result with errors', async () => {
    const result = await parseText('one !two\nthree\n');
    const json = serializeParseResult(result);

    expect(deserializeParseResult(json)).toEqual(result);
    expect(deserializeParseResult(JSON.parse(json))).toEqual(result);
  });

  it('should round-trip a result without a tree', () => {
    const result: ParseResult = {
      filePath: '/src/a.py',
      language: 'python',
      provider: 'wasm',
      tree: null,
      errors: [],
      success: false,
      error: 'parser exploded',
    };
    expect(deserializeParseResult(serializeParseResult(result, 0))).toEqual(result);
  });

  it('should recompute success from the tree and errors', async () => {
    const result = await parseText('fine\n');
    const tampered = { ...JSON.parse(serializeParseResult(result)), success: false };
    expect(deserializeParseResult(tampered).success).toBe(true);
  });

  it('should reject invalid JSON', () => {
    expect(() => deserializeParseResult('{not json')).toThrow(MalformedParseResultError);
  });

  it('should reject node ids that do not match their position', async () => {
    const document = JSON.parse(serializeParseResult(await parseText('a b')));
    document.tree.nodes[1].id = 7;
    expect(() => deserializeParseResult(document)).toThrow('tree.nodes[1].id must equal its index');
  });

  it('should reject a child that does not point back at its parent', async () => {
    const document = JSON.parse(serializeParseResult(await parseText('a b')));
    document.tree.nodes[2].parent = 1;
    expect(() => deserializeParseResult(document)).toThrow('node 0 has an invalid child 2');
  });

  it('should reject error locations that refer to missing nodes', async () => {
    const document = JSON.parse(serializeParseResult(await parseText('!a')));
    document.errors[0].nodeId = 99;
    expect(() => deserializeParseResult(document)).toThrow('error location refers to missing node 99');
  });

  it('should reject a non-object document', () => {
    expect(() => deserializeParseResult([])).toThrow('Malformed parse result: result must be an object');
  });
});
