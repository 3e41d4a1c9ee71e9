/**
 * Tiered Migration library entry point. For the CLI, see cli.ts.
 */

// SDK: primary interface
export { MigrationPipeline } from './sdk.js';
export type { MigrationPipelineOptions } from './sdk.js';

// Syntax trees (requires optional tree-sitter dependencies)
export * from './parser/index.js';

// External tool invocation
export { ToolRunner, spawnSyncRunner } from './runner/tool-runner.js';
export type {
  ProcessResult,
  ProcessRunOptions,
  ProcessRunner,
  ToolRunnerOptions,
} from './runner/tool-runner.js';
export { TOOL_STATUSES, isUsable, payloadObject } from './types/outcome.js';
export type { JsonValue, ToolOutcome, ToolPayload, ToolStatus } from './types/outcome.js';

// Tier classification
export {
  DEFAULT_EFFORT_WEIGHTS,
  DEFAULT_SAMPLE_SIZE,
  DEFAULT_TIER_LABELS,
  TierMatcher,
  classify,
  estimateReviewEffort,
  partitionByTier,
} from './classifier/tier-classifier.js';
export type { ClassifyOptions, ReviewBrief, TierSample } from './classifier/tier-classifier.js';
export { TIER_ORDER } from './types/work-item.js';
export type { Tier, WorkItem } from './types/work-item.js';

// Phases
export { aggregatePhaseStatus, describeExitStatus } from './phases/aggregate.js';
export { PHASE_HISTORY_FILE } from './phases/artifacts.js';
export type { PhaseContext } from './phases/context.js';
export { runFoundationPhase } from './phases/foundation.js';
export type { FoundationOptions } from './phases/foundation.js';
export { DEFAULT_RAW_SCAN, applyPatternFixes, runMechanicalPhase } from './phases/mechanical.js';
export type { FixFailure, MechanicalOptions, PatternFixResult } from './phases/mechanical.js';
export { runSemanticPhase } from './phases/semantic.js';
export type { SemanticOptions, SemanticReport } from './phases/semantic.js';
export { loadWorkItems, parseWorkItems } from './phases/work-items.js';
export type { LoadedWorkItems } from './phases/work-items.js';
export type { PhaseExitStatus, PhaseName, PhaseReport, PhaseSummary } from './types/phase.js';

// Configuration
export {
  CONFIG_FILE_NAME,
  DEFAULT_TOOL_FILES,
  TOOL_NAMES,
  defaultConfig,
  loadMigrationConfig,
  parseConfigObject,
  resolveToolPath,
} from './config/migration-config.js';
export type {
  EffortWeights,
  MigrationConfig,
  PartialPolicy,
  TierLabels,
  ToolName,
} from './config/migration-config.js';

// Logging and errors
export { Narrator, silentNarrator } from './utils/narrator.js';
export { createLogger, findLogDir, logInvocation, silentLogger } from './utils/logger.js';
export type { InvocationRecord, LogLevel, Logger, TextSink } from './utils/logger.js';
export {
  ConfigError,
  MalformedParseResultError,
  MigrationError,
  SourceNotFoundError,
  SourceReadError,
  UnsupportedLanguageError,
} from './utils/errors.js';
