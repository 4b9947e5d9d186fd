import { ArgumentsCamelCase, Argv } from 'yargs';
import { ResultAsync } from 'neverthrow';
import { IReadOnlyObjectStore, ObjectStoreError, TreeEntry } from '@loosedb/core';

import { CommandBase, GlobalOptions } from './util/CommandBase';

interface LsTreeOptions extends GlobalOptions {
  hash: string;
  nameOnly: boolean;
}

export class LsTreeCommand extends CommandBase<LsTreeOptions> {
  readonly command = 'ls-tree <hash>';
  readonly describe = 'Lists the entries of a tree';

  override builder(args: Argv<GlobalOptions>): Argv<LsTreeOptions> {
    return args
      .positional('hash', { type: 'string', demandOption: true, describe: 'Tree hash' })
      .option('nameOnly', { alias: 'name-only', type: 'boolean', default: false, describe: 'Only print entry paths' });
  }

  override async handlerCore(args: ArgumentsCamelCase<LsTreeOptions>) {
    const lines = this.unwrap(await listTree(this.openReadOnlyStore(args), args.hash, args.nameOnly));
    for (const line of lines) {
      console.log(line);
    }
  }
}

export function formatTreeEntry(entry: TreeEntry): string {
  return `${entry.mode} ${entry.type} ${entry.sha}\t${entry.path}`;
}

export function listTree(store: IReadOnlyObjectStore, hash: string, nameOnly: boolean): ResultAsync<string[], ObjectStoreError> {
  return store.getTree(hash).map(tree => tree.entries.map(entry => (nameOnly ? entry.path : formatTreeEntry(entry))));
}
