import chalk from 'chalk';
import { ILogger } from '@loosedb/core';

/**
 * Writes diagnostics to stderr, keeping stdout for command output. Nothing is printed unless verbose.
 */
export class ConsoleLogger implements ILogger {
  private readonly _verbose: boolean;

  constructor(verbose: boolean) {
    this._verbose = verbose;
  }

  debug(message: string): void {
    if (this._verbose) {
      console.error(chalk.gray(message));
    }
  }

  error(message: string): void {
    if (this._verbose) {
      console.error(chalk.yellow(message));
    }
  }
}
