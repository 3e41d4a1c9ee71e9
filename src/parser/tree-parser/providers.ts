/**
 * Grammar providers for tree-sitter.
 *
 * - native: the `tree-sitter` Node addon plus a `tree-sitter-<language>`
 *   grammar package
 * - wasm: `web-tree-sitter` plus prebuilt grammars from `tree-sitter-wasms`
 *
 * All of these are optional dependencies. They are CJS packages, loaded with
 * createRequire from ESM, and every value read from them is checked before
 * use.
 */

import { createRequire } from 'module';
import type { GrammarProvider } from './loader.js';
import type { BackendTree, ParserHandle } from './types.js';

const require = createRequire(import.meta.url);

type ModuleLoader = (id: string) => unknown;
type AssetResolver = (id: string) => string;

interface TreeSitterParser {
  setLanguage(language: unknown): void;
  parse(text: string, oldTree?: undefined, options?: { bufferSize?: number }): BackendTree;
}

type TreeSitterParserConstructor = new () => TreeSitterParser;

/** Grammar packages whose layout differs from `tree-sitter-<language>`. */
const NATIVE_GRAMMARS: Record<string, { module: string; exportName?: string }> = {
  typescript: { module: 'tree-sitter-typescript', exportName: 'typescript' },
  tsx: { module: 'tree-sitter-typescript', exportName: 'tsx' },
  php: { module: 'tree-sitter-php', exportName: 'php' },
  ocaml: { module: 'tree-sitter-ocaml', exportName: 'ocaml' },
  csharp: { module: 'tree-sitter-c-sharp' },
};

const LANGUAGE_NAME = /^[a-z0-9][a-z0-9_-]*$/;

export function nativeGrammarFor(language: string): { module: string; exportName?: string } | undefined {
  if (!LANGUAGE_NAME.test(language)) return undefined;
  return NATIVE_GRAMMARS[language] ?? { module: `tree-sitter-${language}` };
}

export function wasmAssetFor(language: string): string | undefined {
  if (!LANGUAGE_NAME.test(language)) return undefined;
  const name = language === 'csharp' ? 'c_sharp' : language.replace(/-/g, '_');
  return `tree-sitter-wasms/out/tree-sitter-${name}.wasm`;
}

// ─── Native provider ────────────────────────────────────────────────

export class NativeTreeSitterProvider implements GrammarProvider {
  readonly name = 'native';
  private parserClass: TreeSitterParserConstructor | null | undefined;
  private loadError: Error | null = null;

  constructor(private readonly load: ModuleLoader = require) {}

  async tryResolve(language: string): Promise<ParserHandle | undefined> {
    const Parser = this.loadBinding();
    if (!Parser) return undefined;

    const pkg = nativeGrammarFor(language);
    if (!pkg) return undefined;

    const mod = this.optionalModule(pkg.module);
    if (mod === undefined) return undefined;

    const grammar = pkg.exportName ? readProperty(mod, pkg.exportName) : interopDefault(mod);
    if (grammar === undefined || grammar === null) return undefined;

    const parser = new Parser();
    parser.setLanguage(grammar);
    return {
      language,
      provider: this.name,
      // The binding reads strings in fixed-size chunks; one chunk covers the file.
      parse: text => parser.parse(text, undefined, { bufferSize: text.length + 1 }),
    };
  }

  private loadBinding(): TreeSitterParserConstructor | null {
    if (this.parserClass !== undefined) {
      if (this.loadError) throw this.loadError;
      return this.parserClass;
    }

    try {
      const mod = this.optionalModule('tree-sitter');
      const Parser = mod === undefined ? null : interopDefault(mod);
      this.parserClass = isParserConstructor(Parser) ? Parser : null;
    } catch (err) {
      // Installed but broken, e.g. a native build that failed.
      this.parserClass = null;
      this.loadError = new Error(
        'tree-sitter is installed but could not be loaded. ' +
        `Cause: ${err instanceof Error ? err.message : String(err)}`
      );
      throw this.loadError;
    }
    return this.parserClass;
  }

  private optionalModule(id: string): unknown {
    try {
      return this.load(id);
    } catch (err) {
      if (isModuleNotFound(err, id)) return undefined;
      throw err;
    }
  }
}

// ─── WASM provider ──────────────────────────────────────────────────

interface WasmRuntime {
  loadLanguage(path: string): Promise<unknown>;
  createParser(): TreeSitterParser;
}

export class WasmTreeSitterProvider implements GrammarProvider {
  readonly name = 'wasm';
  private runtime: Promise<WasmRuntime | null> | undefined;

  constructor(
    private readonly load: ModuleLoader = require,
    private readonly resolveAsset: AssetResolver = id => require.resolve(id)
  ) {}

  async tryResolve(language: string): Promise<ParserHandle | undefined> {
    const asset = wasmAssetFor(language);
    if (!asset) return undefined;

    let wasmPath: string;
    try {
      wasmPath = this.resolveAsset(asset);
    } catch (err) {
      if (isModuleNotFound(err)) return undefined;
      throw err;
    }

    const runtime = await this.initRuntime();
    if (!runtime) return undefined;

    const grammar = await runtime.loadLanguage(wasmPath);
    const parser = runtime.createParser();
    parser.setLanguage(grammar);
    return {
      language,
      provider: this.name,
      parse: text => parser.parse(text),
    };
  }

  private initRuntime(): Promise<WasmRuntime | null> {
    if (!this.runtime) {
      this.runtime = this.createRuntime().catch((err: unknown) => {
        this.runtime = undefined;
        throw err;
      });
    }
    return this.runtime;
  }

  private async createRuntime(): Promise<WasmRuntime | null> {
    let mod: unknown;
    try {
      mod = this.load('web-tree-sitter');
    } catch (err) {
      if (isModuleNotFound(err, 'web-tree-sitter')) return null;
      throw err;
    }

    // `prototype.parse` and `Language` only exist once `init` has resolved.
    const Parser = interopDefault(mod);
    const init = readProperty(Parser, 'init');
    if (typeof init !== 'function') return null;
    await init.call(Parser);

    if (!isParserConstructor(Parser)) return null;
    const Language = readProperty(Parser, 'Language');
    const loadLanguage = readProperty(Language, 'load');
    if (typeof loadLanguage !== 'function') return null;
    return {
      loadLanguage: (path: string) => Promise.resolve(loadLanguage.call(Language, path)),
      createParser: () => new Parser(),
    };
  }
}

export function defaultProviders(): GrammarProvider[] {
  return [new NativeTreeSitterProvider(), new WasmTreeSitterProvider()];
}

// ─── Module interop helpers ─────────────────────────────────────────

function isParserConstructor(value: unknown): value is TreeSitterParserConstructor {
  return typeof value === 'function'
    && typeof readProperty(readProperty(value, 'prototype'), 'parse') === 'function';
}

function readProperty(value: unknown, key: string): unknown {
  if ((typeof value === 'object' || typeof value === 'function') && value !== null) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function interopDefault(mod: unknown): unknown {
  const fallback = readProperty(mod, 'default');
  return fallback === undefined ? mod : fallback;
}

/** MODULE_NOT_FOUND for `id` itself, not for something `id` requires. */
function isModuleNotFound(err: unknown, id?: string): boolean {
  if (!(err instanceof Error) || readProperty(err, 'code') !== 'MODULE_NOT_FOUND') return false;
  return id === undefined || err.message.includes(`'${id}'`);
}
