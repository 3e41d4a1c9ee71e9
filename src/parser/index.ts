export {
  SyntaxTreeBuilder,
  parseFile,
  GrammarCache,
  GrammarResolver,
  normalizeLanguage,
  NativeTreeSitterProvider,
  WasmTreeSitterProvider,
  defaultProviders,
  getRoot,
  getChildren,
  getParent,
  nodeText,
  spanContains,
  serializeParseResult,
  deserializeParseResult,
  ERROR_KIND,
} from './tree-parser/index.js';

export type {
  BackendNode,
  BackendTree,
  ErrorLocation,
  GrammarProvider,
  GrammarResolution,
  ParseResult,
  ParserHandle,
  ProviderAttempt,
  SourcePosition,
  SyntaxNode,
  SyntaxTree,
} from './tree-parser/index.js';

export { detectLanguage, supportedExtensions } from './language-detect.js';
