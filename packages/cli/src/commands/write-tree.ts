import path from 'path';
import { ArgumentsCamelCase, Argv } from 'yargs';
import { NodeFS } from '@loosedb/fs';

import { CommandBase, GlobalOptions } from './util/CommandBase';
import { writeTree } from './util/writeTree';

interface WriteTreeOptions extends GlobalOptions {
  dir: string;
}

export class WriteTreeCommand extends CommandBase<WriteTreeOptions> {
  readonly command = 'write-tree [dir]';
  readonly describe = 'Stores a directory recursively and prints the hash of its tree';

  override builder(args: Argv<GlobalOptions>): Argv<WriteTreeOptions> {
    return args.positional('dir', { type: 'string', default: '.', describe: 'Directory to snapshot' });
  }

  override async handlerCore(args: ArgumentsCamelCase<WriteTreeOptions>) {
    const store = this.openStore(args);
    const worktree = new NodeFS(args.dir);
    const hash = this.unwrap(await writeTree(store, worktree, {
      ignore: ignoredNames(worktree.physicalRoot, path.resolve(args.objects)),
    }));

    console.log(hash);
  }
}

/**
 * `.loosedb` plus, when the object directory lives inside the snapshot, its top-level directory.
 */
export function ignoredNames(worktreeRoot: string, objectsRoot: string): string[] {
  const relative = path.relative(worktreeRoot, objectsRoot);
  const ignore = ['.loosedb'];
  if (relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative)) {
    const first = relative.split(path.sep)[0];
    if (!ignore.includes(first)) {
      ignore.push(first);
    }
  }

  return ignore;
}
