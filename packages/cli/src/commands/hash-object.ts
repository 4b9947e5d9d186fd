import path from 'path';
import { ArgumentsCamelCase, Argv } from 'yargs';
import { NodeFS, Path } from '@loosedb/fs';

import { CommandBase, GlobalOptions } from './util/CommandBase';

interface HashObjectOptions extends GlobalOptions {
  file: string;
  write: boolean;
}

export class HashObjectCommand extends CommandBase<HashObjectOptions> {
  readonly command = 'hash-object <file>';
  readonly describe = 'Computes the blob hash of a file, optionally storing it';

  override builder(args: Argv<GlobalOptions>): Argv<HashObjectOptions> {
    return args
      .positional('file', { type: 'string', demandOption: true, describe: 'File to hash' })
      .option('write', { alias: 'w', type: 'boolean', default: false, describe: 'Also store the blob' });
  }

  override async handlerCore(args: ArgumentsCamelCase<HashObjectOptions>) {
    const store = this.openStore(args);
    const physicalPath = path.resolve(args.file);
    const source = new NodeFS(path.dirname(physicalPath));

    const blob = this.unwrap(await store.generateBlob(source, new Path(path.basename(physicalPath))));
    if (args.write) {
      this.unwrap(await store.storeBlob(blob.content));
    }

    console.log(blob.sha);
  }
}
