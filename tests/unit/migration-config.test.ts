/**
 * Tests for .migration.yml loading
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  CONFIG_FILE_NAME,
  defaultConfig,
  loadMigrationConfig,
  resolveToolPath,
} from '../../src/config/migration-config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { tempDir } from '../helpers/fake-runner.js';

function projectWithConfig(yaml: string): string {
  const root = tempDir();
  writeFileSync(join(root, CONFIG_FILE_NAME), yaml);
  return root;
}

describe('Migration config', () => {
  it('should fall back to defaults when there is no config file', () => {
    const config = loadMigrationConfig(tempDir(), { env: {} });

    expect(config.timeoutSeconds).toBe(300);
    expect(config.outputLimit).toBe(500);
    expect(config.sampleSize).toBe(20);
    expect(config.partialPolicy).toBe('proceed');
    expect(config.effortWeights).toEqual({ reasoning: 300, deepReasoning: 500 });
    expect(config.interpreters['.py']).toBe('python3');
  });

  it('should read values and resolve paths against the config file', () => {
    const root = projectWithConfig([
      'toolsDir: bin/tools',
      'tools:',
      '  pattern-fixer: scripts/fix.py',
      'timeoutSeconds: 45',
      'sampleSize: 5',
      'partialPolicy: caution',
      'tierLabels:',
      '  automated: [haiku]',
      '  reasoning: [sonnet]',
      'interpreters:',
      '  .RB: ruby',
      '',
    ].join('\n'));

    const config = loadMigrationConfig(root, { env: {} });

    expect(config.toolsDir).toBe(join(root, 'bin/tools'));
    expect(resolveToolPath(config, 'pattern-fixer')).toBe(join(root, 'scripts/fix.py'));
    expect(resolveToolPath(config, 'work-items')).toBe(join(root, 'bin/tools', 'generate-work-items'));
    expect(config.timeoutSeconds).toBe(45);
    expect(config.sampleSize).toBe(5);
    expect(config.partialPolicy).toBe('caution');
    expect(config.tierLabels).toEqual({
      automated: ['haiku'],
      reasoning: ['sonnet'],
      deepReasoning: ['deep-reasoning'],
    });
    expect(config.interpreters['.rb']).toBe('ruby');
  });

  it('should treat an empty file as defaults', () => {
    const config = loadMigrationConfig(projectWithConfig(''), { env: {} });
    expect(config.timeoutSeconds).toBe(300);
  });

  it('should reject unknown keys', () => {
    const root = projectWithConfig('timeout: 10\n');
    expect(() => loadMigrationConfig(root, { env: {} })).toThrow(ConfigError);
    expect(() => loadMigrationConfig(root, { env: {} })).toThrow('unknown key "timeout"');
  });

  it('should reject out-of-range values', () => {
    const root = projectWithConfig('timeoutSeconds: 0\n');
    expect(() => loadMigrationConfig(root, { env: {} })).toThrow('timeoutSeconds must be an integer between 1 and 86400');
  });

  it('should reject unknown tools and policies', () => {
    expect(() => loadMigrationConfig(projectWithConfig('tools:\n  formatter: x\n'), { env: {} }))
      .toThrow('tools.formatter is not a known tool');
    expect(() => loadMigrationConfig(projectWithConfig('partialPolicy: maybe\n'), { env: {} }))
      .toThrow('partialPolicy must be proceed or caution');
  });

  it('should reject a label assigned to more than one tier', () => {
    const root = projectWithConfig('tierLabels:\n  automated: [fix, review]\n  reasoning: [FIX]\n');
    expect(() => loadMigrationConfig(root, { env: {} })).toThrow(ConfigError);
    expect(() => loadMigrationConfig(root, { env: {} }))
      .toThrow('tierLabels: "fix" is listed under both automated and reasoning');
    expect(() => loadMigrationConfig(projectWithConfig('tierLabels:\n  deepReasoning: [Automated]\n'), { env: {} }))
      .toThrow('tierLabels: "automated" is listed under both automated and deepReasoning');
  });

  it('should reject invalid YAML', () => {
    expect(() => loadMigrationConfig(projectWithConfig('tools: [unclosed\n'), { env: {} })).toThrow(ConfigError);
  });

  it('should require an explicitly named config file to exist', () => {
    const missing = join(tempDir(), 'nope.yml');
    expect(() => loadMigrationConfig(tempDir(), { configPath: missing, env: {} }))
      .toThrow(`Config file not found: ${missing}`);
  });

  it('should let the environment override directories', () => {
    const root = projectWithConfig('toolsDir: local-tools\n');
    const toolsDir = join(root, 'env-tools');
    const logDir = join(root, 'env-logs');
    mkdirSync(toolsDir);

    const config = loadMigrationConfig(root, {
      env: { MIGRATION_TOOLS_DIR: toolsDir, MIGRATION_LOG_DIR: logDir },
    });

    expect(config.toolsDir).toBe(toolsDir);
    expect(config.logDir).toBe(logDir);
  });

  it('should place default tools under <baseDir>/tools', () => {
    const config = defaultConfig('/work/project', {});
    expect(resolveToolPath(config, 'compat-imports')).toBe('/work/project/tools/inject-compat-imports');
  });
});
