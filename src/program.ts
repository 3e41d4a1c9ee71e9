/**
 * tiered-migrate command definitions
 * Runs one migration phase per command; the exit code is the phase status.
 */

import { writeFileSync } from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { serializeParseResult } from './parser/tree-parser/index.js';
import { MigrationPipeline } from './sdk.js';
import type { PhaseReport } from './types/phase.js';
import { errorMessage } from './utils/errors.js';

const DEFAULT_OUTPUT_DIR = './migration_output';

interface PhaseCommandOptions {
  rawScan?: string;
  output: string;
}

interface SemanticCommandOptions {
  workItems?: string;
  output: string;
}

interface ParseCommandOptions {
  output?: string;
}

/** The `tiered-migrate` command tree; sets `process.exitCode` and never exits. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('tiered-migrate')
    .description('Tiered codebase migration: foundation, mechanical fixes, semantic review prep')
    .version('0.1.0')
    .option('-c, --config <path>', 'Config file (default: <projectRoot>/.migration.yml)');

  function configPath(): string | undefined {
    const value: unknown = program.opts().config;
    return typeof value === 'string' ? value : undefined;
  }

  function pipelineFor(projectRoot: string): MigrationPipeline {
    return new MigrationPipeline({ projectRoot, configPath: configPath() });
  }

  function finishPhase(report: PhaseReport): void {
    console.log(JSON.stringify(report.summary, null, 2));
    process.exitCode = report.exitStatus;
  }

  function failPhase(error: unknown): void {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exitCode = 2;
  }

  // Foundation command
  program
    .command('foundation')
    .description('Phase 1: compatibility imports, lint baseline, test scaffolds')
    .argument('<projectRoot>', 'Root of the codebase to migrate')
    .option('-s, --raw-scan <path>', 'Discovery scan the run builds on')
    .option('-o, --output <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .action((projectRoot: string, options: PhaseCommandOptions) => {
      try {
        const report = pipelineFor(projectRoot).foundation({
          projectRoot,
          outputDir: options.output,
          priorArtifact: options.rawScan,
        });
        finishPhase(report);
      } catch (error) {
        failPhase(error);
      }
    });

  // Mechanical command
  program
    .command('mechanical')
    .description('Phase 2: work items, automated pattern fixes, library replacement')
    .argument('<projectRoot>', 'Root of the codebase to migrate')
    .option('-s, --raw-scan <path>', 'Discovery scan (default: <projectRoot>/raw-scan.json)')
    .option('-o, --output <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .action((projectRoot: string, options: PhaseCommandOptions) => {
      try {
        const report = pipelineFor(projectRoot).mechanical({
          projectRoot,
          outputDir: options.output,
          priorArtifact: options.rawScan,
        });
        finishPhase(report);
      } catch (error) {
        failPhase(error);
      }
    });

  // Semantic command
  program
    .command('semantic')
    .description('Phase 3: review brief for items that need reasoning')
    .option('-w, --work-items <path>', 'Work items file (default: <output>/work-items.json)')
    .option('-o, --output <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .action((options: SemanticCommandOptions) => {
      try {
        const report = pipelineFor(process.cwd()).semantic({
          outputDir: options.output,
          workItemsPath: options.workItems,
        });
        console.log(JSON.stringify(report.summary, null, 2));
        process.exitCode = 0;
      } catch (error) {
        failPhase(error);
      }
    });

  // Parse command
  program
    .command('parse')
    .description('Parse a source file into a syntax tree and report syntax errors')
    .argument('<file>', 'Source file')
    .argument('[language]', 'Language name (detected from the extension when omitted)')
    .option('--output <file>', 'Write the parse result JSON to a file instead of stdout')
    .action(async (file: string, language: string | undefined, options: ParseCommandOptions) => {
      try {
        const result = await pipelineFor(process.cwd()).parse(file, language);
        const json = serializeParseResult(result);
        if (options.output) {
          writeFileSync(options.output, json + '\n', 'utf-8');
          console.error(chalk.green(`Wrote ${options.output}`));
        } else {
          console.log(json);
        }

        if (result.success) {
          console.error(chalk.green(`✓ ${file} parsed without syntax errors`));
        } else if (result.tree === null) {
          console.error(chalk.red(`✗ ${file}: ${result.error ?? 'parse failed'}`));
        } else {
          console.error(chalk.yellow(`✗ ${file}: ${result.errors.length} syntax error(s)`));
          for (const location of result.errors) {
            const { row, column } = location.startPosition;
            console.error(chalk.yellow(`  line ${row + 1}, column ${column + 1}`));
          }
        }
        process.exitCode = result.success ? 0 : 1;
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  return program;
}
