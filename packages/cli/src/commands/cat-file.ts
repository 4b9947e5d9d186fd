import { ArgumentsCamelCase, Argv } from 'yargs';

import { CommandBase, GlobalOptions } from './util/CommandBase';

interface CatFileOptions extends GlobalOptions {
  hash: string;
}

export class CatFileCommand extends CommandBase<CatFileOptions> {
  readonly command = 'cat-file <hash>';
  readonly describe = 'Prints the content of a blob';

  override builder(args: Argv<GlobalOptions>): Argv<CatFileOptions> {
    return args.positional('hash', { type: 'string', demandOption: true, describe: 'Blob hash' });
  }

  override async handlerCore(args: ArgumentsCamelCase<CatFileOptions>) {
    const blob = this.unwrap(await this.openReadOnlyStore(args).getBlob(args.hash));
    process.stdout.write(blob.content);
  }
}
