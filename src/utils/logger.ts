/**
 * Audit logging for phase runs.
 *
 * Warnings and errors go to stderr; every level goes to `migration-audit.log`
 * once a log directory is known. Tool invocations are recorded one JSON object
 * per line in `skill-invocations.jsonl`.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import chalk from 'chalk';
import { errorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const AUDIT_LOG_NAME = 'migration-audit.log';
export const INVOCATIONS_LOG_NAME = 'skill-invocations.jsonl';
export const LOG_DIR_ENV = 'MIGRATION_LOG_DIR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Anything with a string `write`, e.g. `process.stderr`. */
export interface TextSink {
  write(text: string): unknown;
}

export interface Logger {
  readonly name: string;
  /** Directory the audit log is written to, or null when logging to stderr only */
  readonly logDir: string | null;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Explicit log directory; `null` disables file logging */
  logDir?: string | null;
  /** Minimum level written to the audit file (default: 'info') */
  level?: LogLevel;
  /** Destination for warnings and errors (default: process.stderr) */
  stderr?: TextSink;
}

/**
 * Locate the log directory.
 *
 * Order: explicit directory, `MIGRATION_LOG_DIR`, then the nearest ancestor of
 * `cwd` (at most 10 levels) that contains `migration-analysis/`, whose `logs/`
 * subdirectory is used.
 */
export function findLogDir(
  options: { explicit?: string; cwd?: string; env?: NodeJS.ProcessEnv } = {}
): string | null {
  const { explicit, cwd = process.cwd(), env = process.env } = options;

  if (explicit) return resolve(explicit);
  const fromEnv = env[LOG_DIR_ENV];
  if (fromEnv) return resolve(fromEnv);

  let current = resolve(cwd);
  for (let i = 0; i < 10; i++) {
    const analysisDir = join(current, 'migration-analysis');
    if (existsSync(analysisDir)) {
      return join(analysisDir, 'logs');
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

class AuditLogger implements Logger {
  private fileEnabled: boolean;

  constructor(
    readonly name: string,
    readonly logDir: string | null,
    private readonly level: LogLevel,
    private readonly stderr: TextSink
  ) {
    this.fileEnabled = logDir !== null;
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    const line = `${timestamp()} | ${this.name} | ${level.toUpperCase().padEnd(5)} | ${message}`;

    if (LEVEL_ORDER[level] >= LEVEL_ORDER.warn) {
      const color = level === 'error' ? chalk.red : chalk.yellow;
      this.stderr.write(color(line) + '\n');
    }

    if (this.fileEnabled && this.logDir && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]) {
      try {
        mkdirSync(this.logDir, { recursive: true });
        appendFileSync(join(this.logDir, AUDIT_LOG_NAME), line + '\n', 'utf-8');
      } catch (err) {
        // Fall back to stderr-only for the rest of the run.
        this.fileEnabled = false;
        this.stderr.write(chalk.yellow(`Audit log disabled: ${errorMessage(err)}`) + '\n');
      }
    }
  }
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const logDir = options.logDir === undefined ? findLogDir() : options.logDir;
  return new AuditLogger(name, logDir, options.level ?? 'info', options.stderr ?? process.stderr);
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  name: 'silent',
  logDir: null,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ─── Invocation log ─────────────────────────────────────────────────

export interface InvocationRecord {
  timestamp: string;
  tool: string;
  args: string[];
  exitCode: number | null;
  durationS: number;
  stdoutBytes: number;
  stderrBytes: number;
}

/**
 * Append one invocation record to `skill-invocations.jsonl`.
 * Returns false when no log directory is known or the write failed.
 */
export function logInvocation(
  logDir: string | null,
  entry: Omit<InvocationRecord, 'timestamp'>
): boolean {
  if (!logDir) return false;

  const record: InvocationRecord = {
    timestamp: new Date().toISOString(),
    ...entry,
    tool: basename(entry.tool),
    durationS: Math.round(entry.durationS * 100) / 100,
  };

  try {
    mkdirSync(logDir, { recursive: true });
    appendFileSync(join(logDir, INVOCATIONS_LOG_NAME), JSON.stringify(record) + '\n', 'utf-8');
    return true;
  } catch {
    return false;
  }
}

function timestamp(): string {
  return new Date().toISOString().slice(0, 19);
}
