import { ArgumentsCamelCase, Argv } from 'yargs';

import { NodeFS } from '@cairn/simplefs';
import { InitMode, isCompressionLevel, ObjectFormat, ObjectStore } from '@cairn/cairn';

import { CommandBase, GlobalOptions } from './util/CommandBase';

interface InitOptions extends GlobalOptions {
  objectFormat: ObjectFormat;
  compression: number;
}

export class InitCommand extends CommandBase<InitOptions> {
  readonly command = 'init';
  readonly describe = 'Creates an empty object store, or reopens an existing one';

  override builder(args: Argv): Argv<InitOptions> {
    args.option('object-format', { type: 'string', choices: ['sha1', 'sha256'], default: 'sha1' });
    args.option('compression', { type: 'number', default: 6, describe: 'zlib level (0-9) for new objects' });
    return args as unknown as Argv<InitOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<InitOptions>) {
    const compressionLevel = args.compression;
    if (!isCompressionLevel(compressionLevel)) {
      throw new Error(`Compression level must be an integer between 0 and 9, found ${compressionLevel}`);
    }

    const fs = new NodeFS(args.store);
    const store = new ObjectStore(fs, { objectFormat: args.objectFormat, compressionLevel });
    const result = await store.init(InitMode.CreateIfNotExists);

    if (result === 'init') {
      console.log(`Initialized empty cairn store in ${fs.physicalRoot}`);
    } else {
      console.log(`Reinitialized existing cairn store in ${fs.physicalRoot}`);
    }
  }
}
