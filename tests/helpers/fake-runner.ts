/**
 * Fake process runner and a throwaway project with tool files on disk.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { DEFAULT_TOOL_FILES, TOOL_NAMES, defaultConfig } from '../../src/config/migration-config.js';
import type { MigrationConfig, ToolName } from '../../src/config/migration-config.js';
import type { PhaseContext } from '../../src/phases/context.js';
import { ToolRunner } from '../../src/runner/tool-runner.js';
import type { ProcessResult, ProcessRunner, ProcessRunOptions } from '../../src/runner/tool-runner.js';
import { silentLogger } from '../../src/utils/logger.js';
import { silentNarrator } from '../../src/utils/narrator.js';

export interface FakeCall {
  command: string;
  /** Tool file name, without directory */
  tool: string;
  args: string[];
  timeoutMs: number;
}

export type FakeResponse = Partial<ProcessResult>;

export class FakeProcessRunner implements ProcessRunner {
  readonly calls: FakeCall[] = [];

  constructor(private readonly respond: (call: FakeCall) => FakeResponse = () => ({})) {}

  run(command: string, args: string[], options: ProcessRunOptions): ProcessResult {
    const call: FakeCall = { command, tool: basename(command), args, timeoutMs: options.timeoutMs };
    this.calls.push(call);
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...this.respond(call) };
  }

  callsTo(tool: string): FakeCall[] {
    return this.calls.filter(c => c.tool === tool);
  }
}

export function tempDir(prefix = 'tiered-migration-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export interface TestProject {
  root: string;
  outputDir: string;
  config: MigrationConfig;
}

/** A project directory with `tools/` holding an empty file per tool. */
export function createProject(tools: readonly ToolName[] = TOOL_NAMES): TestProject {
  const root = tempDir();
  mkdirSync(join(root, 'tools'));
  for (const tool of tools) {
    writeFileSync(join(root, 'tools', DEFAULT_TOOL_FILES[tool]), '');
  }
  return { root, outputDir: join(root, 'migration_output'), config: defaultConfig(root, {}) };
}

export function phaseContext(config: MigrationConfig, runner: ProcessRunner): PhaseContext {
  return {
    config,
    tools: new ToolRunner({ processRunner: runner, interpreters: config.interpreters, logger: silentLogger }),
    logger: silentLogger,
    narrator: silentNarrator(),
  };
}
