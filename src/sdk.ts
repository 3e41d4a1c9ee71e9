/**
 * Tiered Migration SDK
 *
 * One object that owns configuration, logging, the tool runner and the
 * syntax tree builder, and runs the phases with them.
 *
 * @example
 * ```ts
 * import { MigrationPipeline } from 'tiered-migration';
 *
 * const pipeline = new MigrationPipeline({ projectRoot: './legacy-app' });
 *
 * const foundation = pipeline.foundation({ projectRoot: './legacy-app', outputDir: './out' });
 * if (foundation.exitStatus === 0) {
 *   pipeline.mechanical({ projectRoot: './legacy-app', outputDir: './out' });
 *   const { brief } = pipeline.semantic({ outputDir: './out' });
 *   console.log(`${brief.itemsRequiringReview} items need review`);
 * }
 * ```
 */

import { classify } from './classifier/tier-classifier.js';
import type { ReviewBrief } from './classifier/tier-classifier.js';
import { loadMigrationConfig } from './config/migration-config.js';
import type { MigrationConfig } from './config/migration-config.js';
import { detectLanguage } from './parser/language-detect.js';
import { GrammarResolver, SyntaxTreeBuilder, defaultProviders } from './parser/tree-parser/index.js';
import type { ParseResult } from './parser/tree-parser/index.js';
import type { PhaseContext } from './phases/context.js';
import { runFoundationPhase } from './phases/foundation.js';
import type { FoundationOptions } from './phases/foundation.js';
import { runMechanicalPhase } from './phases/mechanical.js';
import type { MechanicalOptions } from './phases/mechanical.js';
import { runSemanticPhase } from './phases/semantic.js';
import type { SemanticOptions, SemanticReport } from './phases/semantic.js';
import { ToolRunner } from './runner/tool-runner.js';
import type { ProcessRunner } from './runner/tool-runner.js';
import type { PhaseReport } from './types/phase.js';
import type { WorkItem } from './types/work-item.js';
import { UnsupportedLanguageError } from './utils/errors.js';
import { createLogger, findLogDir } from './utils/logger.js';
import type { Logger } from './utils/logger.js';
import { Narrator } from './utils/narrator.js';

export interface MigrationPipelineOptions {
  /** Ready-made configuration; skips loading `.migration.yml` */
  config?: MigrationConfig;
  /** Directory searched for `.migration.yml` (default: cwd) */
  projectRoot?: string;
  /** Explicit config file */
  configPath?: string;
  /** Replaces child-process spawning */
  processRunner?: ProcessRunner;
  logger?: Logger;
  narrator?: Narrator;
  builder?: SyntaxTreeBuilder;
}

export class MigrationPipeline {
  readonly config: MigrationConfig;
  readonly logger: Logger;
  readonly narrator: Narrator;
  readonly tools: ToolRunner;
  readonly builder: SyntaxTreeBuilder;

  constructor(options: MigrationPipelineOptions = {}) {
    this.config = options.config ?? loadMigrationConfig(options.projectRoot ?? process.cwd(), {
      configPath: options.configPath,
    });
    this.logger = options.logger ?? createLogger('migration', {
      logDir: findLogDir({ explicit: this.config.logDir }),
    });
    this.narrator = options.narrator ?? new Narrator();
    this.tools = new ToolRunner({
      processRunner: options.processRunner,
      interpreters: this.config.interpreters,
      outputLimit: this.config.outputLimit,
      logger: this.logger,
    });
    this.builder = options.builder ?? new SyntaxTreeBuilder(
      new GrammarResolver(defaultProviders(), undefined, this.logger),
      this.logger
    );
  }

  get context(): PhaseContext {
    return { config: this.config, tools: this.tools, logger: this.logger, narrator: this.narrator };
  }

  foundation(options: FoundationOptions): PhaseReport {
    return runFoundationPhase(options, this.context);
  }

  mechanical(options: MechanicalOptions): PhaseReport {
    return runMechanicalPhase(options, this.context);
  }

  semantic(options: SemanticOptions): SemanticReport {
    return runSemanticPhase(options, this.context);
  }

  /**
   * Parse one source file. The language is taken from the extension when
   * not given.
   *
   * @throws UnsupportedLanguageError when no language is given or detected
   */
  parse(filePath: string, language?: string): Promise<ParseResult> {
    const lang = language ?? detectLanguage(filePath);
    if (!lang) {
      return Promise.reject(new UnsupportedLanguageError(`(unknown extension of ${filePath})`));
    }
    return this.builder.parse(filePath, lang);
  }

  /** Review brief for `items` under this pipeline's tier configuration. */
  classify(items: readonly WorkItem[]): ReviewBrief {
    return classify(items, {
      sampleSize: this.config.sampleSize,
      tierLabels: this.config.tierLabels,
      effortWeights: this.config.effortWeights,
    });
  }
}
