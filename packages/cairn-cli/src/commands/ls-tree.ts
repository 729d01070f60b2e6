import { ArgumentsCamelCase, Argv } from 'yargs';

import { Kind, walkTree } from '@cairn/cairn';

import { formatTreeEntry } from '../format';
import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface LsTreeOptions extends GlobalOptions {
  tree: string;
  recursive: boolean;
}

export class LsTreeCommand extends CommandBase<LsTreeOptions> {
  readonly command = 'ls-tree <tree>';
  readonly describe = 'Lists the entries of a tree';

  override builder(args: Argv): Argv<LsTreeOptions> {
    args.positional('tree', { type: 'string', demandOption: true });
    args.option('recursive', { type: 'boolean', alias: 'r', default: false, describe: 'Recurse into sub-trees' });
    return args as unknown as Argv<LsTreeOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<LsTreeOptions>) {
    const store = await openStore(args.store);
    const walker = walkTree(store, args.tree);
    let result = await walker.next();
    while (!result.done) {
      const entry = result.value;
      if (!args.recursive || entry.kind !== Kind.tree) {
        console.log(formatTreeEntry(entry, entry.path.join('/')));
      }

      result = await walker.next(args.recursive);
    }
  }
}
