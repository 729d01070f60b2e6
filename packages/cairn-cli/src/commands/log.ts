import { ArgumentsCamelCase, Argv } from 'yargs';

import { loadCommitObject, walkCommits } from '@cairn/cairn';

import { formatLogEntry } from '../format';
import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface LogOptions extends GlobalOptions {
  commit: string;
  firstParent: boolean;
}

export class LogCommand extends CommandBase<LogOptions> {
  readonly command = 'log <commit>';
  readonly describe = 'Prints the history reachable from a commit';

  override builder(args: Argv): Argv<LogOptions> {
    args.positional('commit', { type: 'string', demandOption: true });
    args.option('first-parent', { type: 'boolean', default: false, describe: 'Only follow the first parent of merges' });
    return args as unknown as Argv<LogOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<LogOptions>) {
    const store = await openStore(args.store);

    if (!args.firstParent) {
      for await (const { hash, commit } of walkCommits(store, args.commit)) {
        console.log(formatLogEntry(hash, commit));
      }
      return;
    }

    let commitId: string | undefined = args.commit;
    while (commitId !== undefined) {
      const commit = await loadCommitObject(store, commitId);
      console.log(formatLogEntry(commitId, commit.body));
      commitId = commit.body.parents[0];
    }
  }
}
