/**
 * .migration.yml loader.
 *
 * Missing file → defaults. Unknown keys or invalid values → ConfigError
 * (the CLI exits 2). Relative paths in the file resolve against the file's
 * directory; environment overrides win over the file.
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { parse } from 'yaml';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { LOG_DIR_ENV } from '../utils/logger.js';

export const CONFIG_FILE_NAME = '.migration.yml';
export const TOOLS_DIR_ENV = 'MIGRATION_TOOLS_DIR';

export const TOOL_NAMES = [
  'compat-imports',
  'lint-baseline',
  'test-scaffolds',
  'work-items',
  'pattern-fixer',
  'library-replacement',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Executable file names looked up under `toolsDir` when no override is set. */
export const DEFAULT_TOOL_FILES: Record<ToolName, string> = {
  'compat-imports': 'inject-compat-imports',
  'lint-baseline': 'lint-baseline',
  'test-scaffolds': 'generate-test-scaffolds',
  'work-items': 'generate-work-items',
  'pattern-fixer': 'apply-pattern-fix',
  'library-replacement': 'replace-libraries',
};

/**
 * How a `partial` step counts when aggregating a phase.
 * - 'proceed': same as complete
 * - 'caution': the phase advances with caution (status 1)
 */
export type PartialPolicy = 'proceed' | 'caution';

export interface TierLabels {
  automated: string[];
  reasoning: string[];
  deepReasoning: string[];
}

export interface EffortWeights {
  reasoning: number;
  deepReasoning: number;
}

export interface MigrationConfig {
  toolsDir: string;
  tools: Partial<Record<ToolName, string>>;
  timeoutSeconds: number;
  outputLimit: number;
  sampleSize: number;
  effortWeights: EffortWeights;
  tierLabels: TierLabels;
  partialPolicy: PartialPolicy;
  /** File extension (with dot) → interpreter command */
  interpreters: Record<string, string>;
  logDir?: string;
}

const ALLOWED_KEYS = new Set([
  'toolsDir',
  'tools',
  'timeoutSeconds',
  'outputLimit',
  'sampleSize',
  'effortWeights',
  'tierLabels',
  'partialPolicy',
  'interpreters',
  'logDir',
]);

const DEFAULT_TIMEOUT_SECONDS = 300;
const MIN_TIMEOUT_SECONDS = 1;
const MAX_TIMEOUT_SECONDS = 86400;
const DEFAULT_OUTPUT_LIMIT = 500;
const DEFAULT_SAMPLE_SIZE = 20;

export function defaultConfig(
  baseDir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): MigrationConfig {
  return applyEnv(
    {
      toolsDir: resolve(baseDir, 'tools'),
      tools: {},
      timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
      outputLimit: DEFAULT_OUTPUT_LIMIT,
      sampleSize: DEFAULT_SAMPLE_SIZE,
      effortWeights: { reasoning: 300, deepReasoning: 500 },
      tierLabels: {
        automated: ['automated'],
        reasoning: ['reasoning'],
        deepReasoning: ['deep-reasoning'],
      },
      partialPolicy: 'proceed',
      interpreters: {
        '.js': process.execPath,
        '.mjs': process.execPath,
        '.cjs': process.execPath,
        '.py': 'python3',
      },
    },
    env
  );
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration for a run rooted at `projectRoot`.
 * Reads `--config` when given, else `<projectRoot>/.migration.yml` if present.
 */
export function loadMigrationConfig(
  projectRoot: string,
  options: LoadConfigOptions = {}
): MigrationConfig {
  const env = options.env ?? process.env;
  const base = defaultConfig(process.cwd(), {});

  let path: string;
  if (options.configPath) {
    path = resolve(options.configPath);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`, path);
    }
  } else {
    path = join(resolve(projectRoot), CONFIG_FILE_NAME);
    if (!existsSync(path)) {
      return applyEnv(base, env);
    }
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`${path}: invalid YAML: ${errorMessage(err)}`, path);
  }

  // An empty file parses to null.
  if (raw === null || raw === undefined) {
    return applyEnv(base, env);
  }

  return applyEnv(parseConfigObject(raw, path, base), env);
}

/**
 * Validate a parsed config document over `base`.
 * Exported for callers that build configuration from other sources.
 */
export function parseConfigObject(raw: unknown, path: string, base: MigrationConfig): MigrationConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${path}: root must be an object`, path);
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`${path}: unknown key "${key}"`, path);
    }
  }

  const baseDir = dirname(path);
  const config: MigrationConfig = {
    ...base,
    tools: { ...base.tools },
    effortWeights: { ...base.effortWeights },
    tierLabels: { ...base.tierLabels },
    interpreters: { ...base.interpreters },
  };

  if (raw.toolsDir !== undefined) {
    config.toolsDir = resolve(baseDir, requireString(raw.toolsDir, 'toolsDir', path));
  }

  if (raw.tools !== undefined) {
    const tools = requireRecord(raw.tools, 'tools', path);
    for (const [name, value] of Object.entries(tools)) {
      if (!isToolName(name)) {
        throw new ConfigError(`${path}: tools.${name} is not a known tool (${TOOL_NAMES.join(', ')})`, path);
      }
      config.tools[name] = resolve(baseDir, requireString(value, `tools.${name}`, path));
    }
  }

  if (raw.timeoutSeconds !== undefined) {
    config.timeoutSeconds = requireInteger(
      raw.timeoutSeconds, 'timeoutSeconds', MIN_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS, path
    );
  }

  if (raw.outputLimit !== undefined) {
    config.outputLimit = requireInteger(raw.outputLimit, 'outputLimit', 1, 1_000_000, path);
  }

  if (raw.sampleSize !== undefined) {
    config.sampleSize = requireInteger(raw.sampleSize, 'sampleSize', 0, 100_000, path);
  }

  if (raw.effortWeights !== undefined) {
    const weights = requireRecord(raw.effortWeights, 'effortWeights', path);
    for (const [key, value] of Object.entries(weights)) {
      if (key !== 'reasoning' && key !== 'deepReasoning') {
        throw new ConfigError(`${path}: unknown key "effortWeights.${key}"`, path);
      }
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new ConfigError(`${path}: effortWeights.${key} must be a non-negative number`, path);
      }
      config.effortWeights[key] = value;
    }
  }

  if (raw.tierLabels !== undefined) {
    const labels = requireRecord(raw.tierLabels, 'tierLabels', path);
    for (const [key, value] of Object.entries(labels)) {
      if (key !== 'automated' && key !== 'reasoning' && key !== 'deepReasoning') {
        throw new ConfigError(`${path}: unknown key "tierLabels.${key}"`, path);
      }
      config.tierLabels[key] = requireStringList(value, `tierLabels.${key}`, path);
    }
    rejectSharedTierLabels(config.tierLabels, path);
  }

  const policy = raw.partialPolicy;
  if (policy !== undefined) {
    if (policy !== 'proceed' && policy !== 'caution') {
      throw new ConfigError(`${path}: partialPolicy must be proceed or caution`, path);
    }
    config.partialPolicy = policy;
  }

  if (raw.interpreters !== undefined) {
    const interpreters = requireRecord(raw.interpreters, 'interpreters', path);
    for (const [ext, command] of Object.entries(interpreters)) {
      if (!ext.startsWith('.')) {
        throw new ConfigError(`${path}: interpreters key "${ext}" must be an extension starting with "."`, path);
      }
      config.interpreters[ext.toLowerCase()] = requireString(command, `interpreters.${ext}`, path);
    }
  }

  if (raw.logDir !== undefined) {
    config.logDir = resolve(baseDir, requireString(raw.logDir, 'logDir', path));
  }

  return config;
}

/** Path of the executable for a step, honoring per-tool overrides. */
export function resolveToolPath(config: MigrationConfig, tool: ToolName): string {
  return config.tools[tool] ?? join(config.toolsDir, DEFAULT_TOOL_FILES[tool]);
}

function applyEnv(config: MigrationConfig, env: NodeJS.ProcessEnv): MigrationConfig {
  const toolsDir = env[TOOLS_DIR_ENV];
  const logDir = env[LOG_DIR_ENV];
  return {
    ...config,
    ...(toolsDir ? { toolsDir: resolve(toolsDir) } : {}),
    ...(logDir ? { logDir: resolve(logDir) } : {}),
  };
}

/** A label may name only one tier, compared the way the classifier matches. */
function rejectSharedTierLabels(labels: TierLabels, path: string): void {
  const owner = new Map<string, keyof TierLabels>();
  for (const tier of ['automated', 'reasoning', 'deepReasoning'] as const) {
    for (const label of labels[tier]) {
      const normalized = label.trim().toLowerCase();
      const other = owner.get(normalized);
      if (other !== undefined && other !== tier) {
        throw new ConfigError(`${path}: tierLabels: "${normalized}" is listed under both ${other} and ${tier}`, path);
      }
      owner.set(normalized, tier);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

function requireString(value: unknown, key: string, path: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${path}: ${key} must be a non-empty string`, path);
  }
  return value;
}

function requireRecord(value: unknown, key: string, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`${path}: ${key} must be a mapping`, path);
  }
  return value;
}

function requireStringList(value: unknown, key: string, path: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${path}: ${key} must be a non-empty list of strings`, path);
  }
  return value.map((v, i) => requireString(v, `${key}[${i}]`, path));
}

function requireInteger(value: unknown, key: string, min: number, max: number, path: string): number {
  const n = Number(value);
  if (typeof value === 'boolean' || !Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`${path}: ${key} must be an integer between ${min} and ${max}`, path);
  }
  return n;
}
