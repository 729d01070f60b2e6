import { ArgumentsCamelCase, Argv } from 'yargs';

import { diffCommits, diffTrees, Kind, RenamePairing } from '@cairn/cairn';

import { formatChangeSet } from '../format';
import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface DiffOptions extends GlobalOptions {
  a: string;
  b: string;
  renames: boolean;
  ignoreMode: boolean;
  pairing: RenamePairing;
}

export class DiffCommand extends CommandBase<DiffOptions> {
  readonly command = 'diff <a> <b>';
  readonly describe = 'Lists the changes between two trees or two commits';

  override builder(args: Argv): Argv<DiffOptions> {
    args.positional('a', { type: 'string', demandOption: true });
    args.positional('b', { type: 'string', demandOption: true });
    args.option('renames', { type: 'boolean', default: true, describe: 'Detect renames (--no-renames to disable)' });
    args.option('ignore-mode', { type: 'boolean', default: false, describe: 'Do not report mode-only changes' });
    args.option('pairing', { type: 'string', choices: ['path-distance', 'unique'], default: 'path-distance' });
    return args as unknown as Argv<DiffOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<DiffOptions>) {
    const store = await openStore(args.store);
    const options = {
      detectRenames: args.renames,
      renamePairing: args.pairing,
      modeChanges: args.ignoreMode ? 'ignore' as const : 'modified' as const,
    };

    const kindA = (await store.get(args.a)).kind;
    const kindB = (await store.get(args.b)).kind;
    if (kindA !== kindB || kindA === Kind.blob) {
      throw new Error(`Expected two trees or two commits, found ${kindA} and ${kindB}`);
    }

    const changes = kindA === Kind.commit
      ? await diffCommits(store, args.a, args.b, options)
      : await diffTrees(store, args.a, args.b, options);

    for (const line of formatChangeSet(changes)) {
      console.log(line);
    }
    if (changes.problems.length > 0) {
      process.exitCode = 1;
    }
  }
}
