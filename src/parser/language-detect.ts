/**
 * File extension → tree-sitter language name.
 */

import { extname } from 'path';

const EXTENSION_MAP: Record<string, string> = {
  '.py': 'python',
  '.pyw': 'python',
  '.java': 'java',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.c': 'c',
  // Ambiguous, but start with C
  '.h': 'c',
  '.cpp': 'cpp',
  '.cc': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.rs': 'rust',
  '.go': 'go',
  '.rb': 'ruby',
  '.sh': 'bash',
  '.php': 'php',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.scala': 'scala',
};

/** Language for a file path, or undefined when the extension is unknown. */
export function detectLanguage(filePath: string): string | undefined {
  return EXTENSION_MAP[extname(filePath).toLowerCase()];
}

export function supportedExtensions(): string[] {
  return Object.keys(EXTENSION_MAP);
}
