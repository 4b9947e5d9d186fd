import { ArgumentsCamelCase, Argv } from 'yargs';
import { NodeFS, Path } from '@loosedb/fs';

import { CommandBase, GlobalOptions } from './util/CommandBase';

export class InitCommand extends CommandBase<GlobalOptions> {
  readonly command = 'init';
  readonly describe = 'Creates the object directory';

  override builder(args: Argv<GlobalOptions>): Argv<GlobalOptions> {
    return args;
  }

  override async handlerCore(args: ArgumentsCamelCase<GlobalOptions>) {
    const fs = new NodeFS(args.objects);
    const root = new Path('');
    const existed = await fs.directoryExists(root);
    await fs.createDirectory(root);

    if (existed) {
      console.log(`Reinitialized existing object store in ${fs.physicalRoot}`);
    } else {
      console.log(`Initialized empty object store in ${fs.physicalRoot}`);
    }
  }
}
