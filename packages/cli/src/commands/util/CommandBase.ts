import chalk from 'chalk';
import { ArgumentsCamelCase, Argv, CommandModule } from 'yargs';
import { Result } from 'neverthrow';
import { NodeFS } from '@loosedb/fs';
import { errorToString, IReadOnlyObjectStore, ObjectStore, ObjectStoreError } from '@loosedb/core';

import { ConsoleLogger } from './ConsoleLogger';

/**
 * Options every command receives from the root parser.
 */
export interface GlobalOptions {
  objects: string;
  verbose: boolean;
}

export abstract class CommandBase<TOptions extends GlobalOptions> implements CommandModule<GlobalOptions, TOptions> {
  abstract readonly command: string;
  abstract readonly describe: string;

  constructor() {
    this.handler = this.handler.bind(this);
    this.builder = this.builder.bind(this);
  }

  async handler(args: ArgumentsCamelCase<TOptions>) {
    try {
      await this.handlerCore(args);
    } catch (error) {
      console.error(chalk.red(error instanceof ObjectStoreError ? error.message : errorToString(error)));
      process.exit(1);
    }
  }

  protected openStore(args: GlobalOptions): ObjectStore {
    return new ObjectStore(new NodeFS(args.objects), { logger: new ConsoleLogger(args.verbose) });
  }

  protected openReadOnlyStore(args: GlobalOptions): IReadOnlyObjectStore {
    return this.openStore(args);
  }

  protected unwrap<T>(result: Result<T, ObjectStoreError>): T {
    if (result.isErr()) {
      throw result.error;
    }

    return result.value;
  }

  abstract builder(args: Argv<GlobalOptions>): Argv<TOptions>;
  abstract handlerCore(args: ArgumentsCamelCase<TOptions>): Promise<void>;
}
