import { ArgumentsCamelCase, Argv } from 'yargs';

import { decodeBody, Kind } from '@cairn/cairn';

import { formatCommitBody, formatTreeEntry } from '../format';
import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface CatFileOptions extends GlobalOptions {
  hash: string;
  type: boolean;
}

export class CatFileCommand extends CommandBase<CatFileOptions> {
  readonly command = 'cat-file <hash>';
  readonly describe = 'Prints the contents (or with -t the kind) of an object';

  override builder(args: Argv): Argv<CatFileOptions> {
    args.positional('hash', { type: 'string', demandOption: true });
    args.option('type', { type: 'boolean', alias: 't', default: false, describe: 'Only print the object kind' });
    return args as unknown as Argv<CatFileOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<CatFileOptions>) {
    const store = await openStore(args.store, { verifyOnRead: true });
    const raw = await store.get(args.hash);
    if (args.type) {
      console.log(raw.kind);
      return;
    }

    const object = decodeBody(raw, store.hasher);
    switch (object.kind) {
      case Kind.blob:
        process.stdout.write(object.body);
        break;
      case Kind.tree:
        for (const entry of object.body) {
          console.log(formatTreeEntry(entry, entry.name));
        }
        break;
      case Kind.commit:
        process.stdout.write(formatCommitBody(object.body));
        break;
    }
  }
}
