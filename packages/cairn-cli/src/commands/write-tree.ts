import { ArgumentsCamelCase, Argv } from 'yargs';

import { NodeFS } from '@cairn/simplefs';
import { buildTree, SimpleFSSource } from '@cairn/cairn';

import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface WriteTreeOptions extends GlobalOptions {
  dir: string;
  jobs: number;
  ignore: string[];
}

export class WriteTreeCommand extends CommandBase<WriteTreeOptions> {
  readonly command = 'write-tree <dir>';
  readonly describe = 'Snapshots a directory into the store and prints the root tree digest';

  override builder(args: Argv): Argv<WriteTreeOptions> {
    args.positional('dir', { type: 'string', demandOption: true });
    args.option('jobs', { type: 'number', alias: 'j', default: 8, describe: 'Reads and writes in flight' });
    args.option('ignore', { type: 'string', array: true, default: ['.cairn', '.git'], describe: 'Entry names to leave out' });
    return args as unknown as Argv<WriteTreeOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<WriteTreeOptions>) {
    const store = await openStore(args.store);
    const ignored = new Set(args.ignore);
    const source = new SimpleFSSource(new NodeFS(args.dir), { ignore: path => ignored.has(path.leafName) });

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    console.log(await buildTree(store, source, { concurrency: args.jobs, signal: controller.signal }));
  }
}
