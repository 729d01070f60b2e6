import path from 'path';
import { ArgumentsCamelCase, Argv } from 'yargs';

import { NodeFS, Path } from '@cairn/simplefs';
import { Kind } from '@cairn/cairn';

import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface HashObjectOptions extends GlobalOptions {
  file: string;
  write: boolean;
}

export class HashObjectCommand extends CommandBase<HashObjectOptions> {
  readonly command = 'hash-object <file>';
  readonly describe = 'Computes the blob digest of a file, optionally storing it';

  override builder(args: Argv): Argv<HashObjectOptions> {
    args.positional('file', { type: 'string', demandOption: true });
    args.option('write', { type: 'boolean', alias: 'w', default: false, describe: 'Store the blob' });
    return args as unknown as Argv<HashObjectOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<HashObjectOptions>) {
    const store = await openStore(args.store);
    const physicalPath = path.resolve(args.file);
    const body = await new NodeFS(path.dirname(physicalPath)).read(new Path(path.basename(physicalPath)));

    const hash = args.write ? await store.put(Kind.blob, body) : store.hasher.digest(Kind.blob, body);
    console.log(hash);
  }
}
