#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { InitCommand } from './commands/init';
import { HashObjectCommand } from './commands/hash-object';
import { CatFileCommand } from './commands/cat-file';
import { LsTreeCommand } from './commands/ls-tree';
import { WriteTreeCommand } from './commands/write-tree';
import * as pkg from '../package.json';

const parser = yargs(hideBin(process.argv))
  .scriptName('loosedb')
  .version(pkg.version)
  .env('LOOSEDB')
  .option('objects', { type: 'string', default: '.loosedb/objects', describe: 'Object directory' })
  .option('verbose', { alias: 'v', type: 'boolean', default: false, describe: 'Print diagnostics to stderr' })
  .showHelpOnFail(true)
  .demandCommand()
  .recommendCommands()
  .help()
  .strict()
  .command(new InitCommand())
  .command(new HashObjectCommand())
  .command(new CatFileCommand())
  .command(new LsTreeCommand())
  .command(new WriteTreeCommand());

// Commands already report their own failures and set the exit code.
parser.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
