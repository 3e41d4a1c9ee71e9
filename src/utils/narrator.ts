/**
 * Human-readable phase narration on stderr.
 * stdout is reserved for the machine-readable summary document.
 */

import chalk from 'chalk';
import type { TextSink } from './logger.js';

export class Narrator {
  constructor(private readonly sink: TextSink = process.stderr) {}

  heading(text: string): void {
    this.sink.write('\n' + chalk.blue.bold(text) + '\n');
  }

  detail(label: string, value: string | number): void {
    this.sink.write(`  ${label}: ${value}\n`);
  }

  step(description: string): void {
    this.sink.write(chalk.cyan(`  → ${description}...`) + '\n');
  }

  success(text: string): void {
    this.sink.write('\n' + chalk.green(text) + '\n');
  }

  warn(text: string): void {
    this.sink.write(chalk.yellow(`  Warning: ${text}`) + '\n');
  }

  blocked(text: string): void {
    this.sink.write('\n' + chalk.red(text) + '\n');
  }
}

/** Narrator that writes nowhere, for tests and library callers. */
export function silentNarrator(): Narrator {
  return new Narrator({ write: () => true });
}
