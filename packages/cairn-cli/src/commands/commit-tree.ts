import os from 'os';
import { ArgumentsCamelCase, Argv } from 'yargs';

import { createCommit, now, Person } from '@cairn/cairn';

import { parseIdentity } from '../format';
import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface CommitTreeOptions extends GlobalOptions {
  tree: string;
  message: string;
  parent: string[];
  author?: string;
}

export class CommitTreeCommand extends CommandBase<CommitTreeOptions> {
  readonly command = 'commit-tree <tree>';
  readonly describe = 'Creates a commit for an existing tree and prints its digest';

  override builder(args: Argv): Argv<CommitTreeOptions> {
    args.positional('tree', { type: 'string', demandOption: true });
    args.option('message', { type: 'string', alias: 'm', demandOption: true });
    args.option('parent', { type: 'string', alias: 'p', array: true, default: [] });
    args.option('author', { type: 'string', describe: '"Name <email>", defaults to the current user' });
    return args as unknown as Argv<CommitTreeOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<CommitTreeOptions>) {
    const store = await openStore(args.store);
    const identity = args.author !== undefined
      ? parseIdentity(args.author)
      : { name: os.userInfo().username, email: '' };
    const author: Person = { ...identity, date: now() };

    console.log(await createCommit(store, args.tree, args.parent, args.message, author));
  }
}
