/**
 * Error Handling Utilities
 */

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'MigrationError';
  }

  toString(): string {
    if (this.path) {
      return `${this.name} (${this.path}): ${this.message}`;
    }
    return `${this.name}: ${this.message}`;
  }
}

export class SourceNotFoundError extends MigrationError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, 'SOURCE_NOT_FOUND', filePath);
    this.name = 'SourceNotFoundError';
  }
}

export class UnsupportedLanguageError extends MigrationError {
  constructor(
    public readonly language: string,
    public readonly attempts: string[] = []
  ) {
    super(
      `Language '${language}' not supported. ` +
      'Install tree-sitter with a tree-sitter-<language> grammar, or web-tree-sitter with tree-sitter-wasms.',
      'UNSUPPORTED_LANGUAGE'
    );
    this.name = 'UnsupportedLanguageError';
  }
}

export class SourceReadError extends MigrationError {
  constructor(filePath: string, cause: unknown) {
    super(`Error reading ${filePath}: ${errorMessage(cause)}`, 'SOURCE_READ_ERROR', filePath);
    this.name = 'SourceReadError';
  }
}

export class MalformedParseResultError extends MigrationError {
  constructor(message: string) {
    super(`Malformed parse result: ${message}`, 'MALFORMED_PARSE_RESULT');
    this.name = 'MalformedParseResultError';
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string, configPath?: string) {
    super(message, 'CONFIG_ERROR', configPath);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
