/**
 * Tests for the tiered-migrate command exit codes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { createProgram } from '../../src/program.js';
import { tempDir } from '../helpers/fake-runner.js';

describe('tiered-migrate CLI', () => {
  let dir: string;
  let config: string;

  beforeEach(() => {
    dir = tempDir();
    config = join(dir, '.migration.yml');
    writeFileSync(config, '');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function run(...args: string[]): Promise<unknown> {
    return createProgram().parseAsync(['node', 'tiered-migrate', '-c', config, ...args]);
  }

  it('should exit 0 from semantic even without work items', async () => {
    await run('semantic', '-o', join(dir, 'out'));
    expect(process.exitCode).toBe(0);
  });

  it('should exit 1 when parse cannot detect the language', async () => {
    const notes = join(dir, 'notes.txt');
    writeFileSync(notes, 'plain text\n');

    await run('parse', notes);

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('not supported'));
  });

  it('should exit 1 when the file to parse does not exist', async () => {
    await run('parse', join(dir, 'missing.py'));
    expect(process.exitCode).toBe(1);
  });

  it('should exit 2 from a phase command when the config is invalid', async () => {
    writeFileSync(config, 'timeout: 10\n');
    await run('foundation', dir, '-o', join(dir, 'out'));
    expect(process.exitCode).toBe(2);
  });
});
