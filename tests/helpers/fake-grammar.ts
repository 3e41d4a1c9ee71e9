/**
 * In-process stand-ins for tree-sitter: backend nodes built by hand and a
 * provider that serves a whitespace "grammar".
 */

import type { GrammarProvider } from '../../src/parser/tree-parser/loader.js';
import type { BackendNode, BackendTree, ParserHandle } from '../../src/parser/tree-parser/types.js';

export function backendNode(
  type: string,
  startIndex: number,
  endIndex: number,
  children: BackendNode[] = []
): BackendNode {
  return {
    type,
    startIndex,
    endIndex,
    childCount: children.length,
    child: i => children[i] ?? null,
  };
}

/**
 * Root `module` over the whole text, one `word` child per whitespace-separated
 * token. Tokens starting with "!" become ERROR nodes.
 */
export function wordTree(text: string): BackendTree {
  const children: BackendNode[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    const word = match[0];
    children.push(backendNode(word.startsWith('!') ? 'ERROR' : 'word', start, start + word.length));
  }
  return { rootNode: backendNode('module', 0, text.length, children) };
}

export class FakeProvider implements GrammarProvider {
  readonly calls: string[] = [];
  failure: Error | null = null;

  constructor(
    readonly name: string,
    readonly languages: string[],
    private readonly parse: (text: string) => BackendTree = wordTree
  ) {}

  async tryResolve(language: string): Promise<ParserHandle | undefined> {
    this.calls.push(language);
    if (this.failure) throw this.failure;
    if (!this.languages.includes(language)) return undefined;
    return { language, provider: this.name, parse: this.parse };
  }
}
