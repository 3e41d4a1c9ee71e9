/**
 * External Tool Invocation
 *
 * Runs a remediation or analysis tool as a child process and maps the result
 * onto a ToolOutcome:
 *
 *   missing executable → skipped (nothing spawned)
 *   exit 0             → complete
 *   exit 1             → partial
 *   any other exit     → error (stderr kept, truncated)
 *   wall-clock expiry  → timeout (the child is killed)
 *
 * On complete/partial, stdout is parsed as JSON; output that is not JSON is
 * kept as truncated text.
 */

import { spawnSync } from 'child_process';
import { existsSync } from 'fs';
import { extname } from 'path';
import { logInvocation, silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { JsonValue, ToolOutcome, ToolPayload } from '../types/outcome.js';

// ─── Process runner ──────────────────────────────────────────────────

export interface ProcessResult {
  /** Exit code; null when the process never started or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started or its output overflowed */
  spawnError?: string;
}

export interface ProcessRunOptions {
  timeoutMs: number;
  cwd?: string;
}

/** Seam for spawning processes; tests substitute an in-process fake. */
export interface ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): ProcessResult;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/** Blocking runner on child_process.spawnSync; kills with SIGKILL on timeout. */
export const spawnSyncRunner: ProcessRunner = {
  run(command, args, { timeoutMs, cwd }) {
    const result = spawnSync(command, args, {
      cwd,
      timeout: timeoutMs,
      killSignal: 'SIGKILL',
      encoding: 'utf-8',
      maxBuffer: MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const code = result.error ? errorCode(result.error) : undefined;
    return {
      exitCode: result.status,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      timedOut: code === 'ETIMEDOUT',
      ...(result.error && code !== 'ETIMEDOUT' ? { spawnError: result.error.message } : {}),
    };
  },
};

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

// ─── Tool runner ─────────────────────────────────────────────────────

export interface ToolRunnerOptions {
  processRunner?: ProcessRunner;
  /** File extension (with dot) → interpreter command */
  interpreters?: Record<string, string>;
  /** Truncation length for raw stdout and stderr (default: 500) */
  outputLimit?: number;
  logger?: Logger;
  cwd?: string;
}

export class ToolRunner {
  private readonly processRunner: ProcessRunner;
  private readonly interpreters: Record<string, string>;
  private readonly outputLimit: number;
  private readonly logger: Logger;
  private readonly cwd?: string;
  private spawned = 0;

  constructor(options: ToolRunnerOptions = {}) {
    this.processRunner = options.processRunner ?? spawnSyncRunner;
    this.interpreters = options.interpreters ?? {};
    this.outputLimit = options.outputLimit ?? 500;
    this.logger = options.logger ?? silentLogger;
    this.cwd = options.cwd;
  }

  /** Number of processes started by this runner */
  get spawnCount(): number {
    return this.spawned;
  }

  /**
   * Run `toolPath` with `args`, waiting at most `timeoutSeconds`.
   * Blocks until the child exits or is killed.
   */
  invoke(toolPath: string, args: string[], timeoutSeconds: number): ToolOutcome {
    if (!existsSync(toolPath)) {
      this.logger.warn(`Script not found, skipping: ${toolPath}`);
      return { tool: toolPath, status: 'skipped', durationMs: 0, reason: `Script not found: ${toolPath}` };
    }

    const { command, commandArgs } = this.commandFor(toolPath, args);
    this.logger.info(`Invoking: ${command} ${commandArgs.join(' ')}`);

    const start = performance.now();
    this.spawned++;
    const result = this.processRunner.run(command, commandArgs, {
      timeoutMs: timeoutSeconds * 1000,
      cwd: this.cwd,
    });
    const durationMs = Math.round(performance.now() - start);

    logInvocation(this.logger.logDir, {
      tool: toolPath,
      args,
      exitCode: result.exitCode,
      durationS: durationMs / 1000,
      stdoutBytes: Buffer.byteLength(result.stdout),
      stderrBytes: Buffer.byteLength(result.stderr),
    });

    if (result.timedOut) {
      this.logger.error(`Script execution timed out after ${timeoutSeconds}s: ${toolPath}`);
      return { tool: toolPath, status: 'timeout', durationMs, timeoutSeconds };
    }

    if (result.spawnError !== undefined) {
      this.logger.error(`Script execution error: ${result.spawnError}`);
      return {
        tool: toolPath,
        status: 'error',
        durationMs,
        exitCode: result.exitCode,
        diagnostic: this.truncate(result.stderr || result.spawnError),
      };
    }

    if (result.exitCode === 0) {
      return { tool: toolPath, status: 'complete', durationMs, exitCode: 0, payload: this.parsePayload(result.stdout) };
    }
    if (result.exitCode === 1) {
      return { tool: toolPath, status: 'partial', durationMs, exitCode: 1, payload: this.parsePayload(result.stdout) };
    }

    // Killed by a signal other than our timeout, or a failing exit code.
    return {
      tool: toolPath,
      status: 'error',
      durationMs,
      exitCode: result.exitCode,
      diagnostic: this.truncate(result.stderr),
    };
  }

  private commandFor(toolPath: string, args: string[]): { command: string; commandArgs: string[] } {
    const interpreter = this.interpreters[extname(toolPath).toLowerCase()];
    if (interpreter) {
      return { command: interpreter, commandArgs: [toolPath, ...args] };
    }
    return { command: toolPath, commandArgs: args };
  }

  private parsePayload(stdout: string): ToolPayload {
    if (stdout.trim() === '') return { kind: 'absent' };
    try {
      const data: JsonValue = JSON.parse(stdout);
      return { kind: 'structured', data };
    } catch {
      return { kind: 'raw-text', text: this.truncate(stdout) };
    }
  }

  private truncate(text: string): string {
    return text.slice(0, this.outputLimit);
  }
}
