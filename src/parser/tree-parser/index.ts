/**
 * Syntax tree parser: public API
 *
 * Parses source files with tree-sitter into a flat, serializable tree plus
 * the list of ERROR nodes, abstracted so consumers don't need tree-sitter
 * knowledge.
 *
 * Grammars come from optional dependencies (tree-sitter + grammar packages,
 * or web-tree-sitter + tree-sitter-wasms). A language nobody can supply
 * raises UnsupportedLanguageError.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import {
  SourceNotFoundError,
  SourceReadError,
  UnsupportedLanguageError,
  errorMessage,
} from '../../utils/errors.js';
import { silentLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { GrammarResolver, normalizeLanguage } from './loader.js';
import { convertTree } from './node-converter.js';
import { OffsetTranslator, decodeSource } from './offsets.js';
import { defaultProviders } from './providers.js';
import type { BackendTree, ParseResult } from './types.js';

// Re-export types
export type {
  BackendNode,
  BackendTree,
  ErrorLocation,
  ParseResult,
  ParserHandle,
  SourcePosition,
  SyntaxNode,
  SyntaxTree,
} from './types.js';
export { ERROR_KIND } from './types.js';

// Re-export loader and helpers
export { GrammarCache, GrammarResolver, normalizeLanguage } from './loader.js';
export type { GrammarProvider, GrammarResolution, ProviderAttempt } from './loader.js';
export {
  NativeTreeSitterProvider,
  WasmTreeSitterProvider,
  defaultProviders,
  nativeGrammarFor,
  wasmAssetFor,
} from './providers.js';
export { getChildren, getParent, getRoot, nodeText, spanContains } from './node-converter.js';
export { serializeParseResult, deserializeParseResult } from './serialize.js';

/**
 * Builds ParseResults for files, resolving grammars through one resolver so
 * each language is loaded once per builder.
 *
 * @example
 * ```ts
 * const builder = new SyntaxTreeBuilder();
 * const result = await builder.parse('src/app.py', 'python');
 * if (!result.success) {
 *   console.log(`${result.errors.length} syntax error(s)`);
 * }
 * ```
 */
export class SyntaxTreeBuilder {
  constructor(
    readonly resolver: GrammarResolver = new GrammarResolver(defaultProviders()),
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Parse one file.
   *
   * @throws SourceNotFoundError if the file does not exist
   * @throws UnsupportedLanguageError if no provider has a grammar for `language`
   * @throws SourceReadError if the file cannot be read
   */
  async parse(filePath: string, language: string): Promise<ParseResult> {
    const absolutePath = resolve(filePath);
    if (!existsSync(absolutePath)) {
      throw new SourceNotFoundError(filePath);
    }

    const normalized = normalizeLanguage(language);
    const resolution = await this.resolver.resolve(normalized);
    if (!resolution.ok) {
      throw new UnsupportedLanguageError(
        normalized,
        resolution.attempts.map(a => `${a.provider}: ${a.message ?? a.outcome}`)
      );
    }
    const { handle } = resolution;

    let bytes: Buffer;
    try {
      bytes = await readFile(absolutePath);
    } catch (err) {
      throw new SourceReadError(filePath, err);
    }

    const source = decodeSource(bytes);
    let backendTree: BackendTree;
    try {
      backendTree = handle.parse(source.text);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Error parsing ${filePath}: ${message}`);
      return {
        filePath: absolutePath,
        language: normalized,
        provider: handle.provider,
        tree: null,
        errors: [],
        success: false,
        error: message,
      };
    }

    const { tree, errors } = convertTree(backendTree.rootNode, new OffsetTranslator(bytes, source));
    return {
      filePath: absolutePath,
      language: normalized,
      provider: handle.provider,
      tree,
      errors,
      success: errors.length === 0,
    };
  }
}

/**
 * Parse one file with the given builder (or a fresh one).
 * Prefer reusing a builder across files so grammars load once.
 */
export function parseFile(
  filePath: string,
  language: string,
  builder: SyntaxTreeBuilder = new SyntaxTreeBuilder()
): Promise<ParseResult> {
  return builder.parse(filePath, language);
}
