import chalk from 'chalk';
import { ArgumentsCamelCase, Argv } from 'yargs';

import { verify } from '@cairn/cairn';

import { formatReport } from '../format';
import { CommandBase, GlobalOptions } from './util/CommandBase';
import { openStore } from './util/openStore';

interface FsckOptions extends GlobalOptions {
  root: string;
  jobs: number;
  verbose: boolean;
}

export class FsckCommand extends CommandBase<FsckOptions> {
  readonly command = 'fsck <root>';
  readonly describe = 'Checks every object reachable from a commit, tree or blob';

  override builder(args: Argv): Argv<FsckOptions> {
    args.positional('root', { type: 'string', demandOption: true });
    args.option('jobs', { type: 'number', alias: 'j', default: 8, describe: 'Objects read at once' });
    args.option('verbose', { type: 'boolean', alias: 'v', default: false, describe: 'Print every object as it is checked' });
    return args as unknown as Argv<FsckOptions>;
  }

  override async handlerCore(args: ArgumentsCamelCase<FsckOptions>) {
    const store = await openStore(args.store);
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const report = await verify(store, args.root, {
      concurrency: args.jobs,
      signal: controller.signal,
      onObject: args.verbose
        ? (hash, kind, path) => console.log(chalk.gray(`${kind ?? '?'} ${hash} ${path.join('/')}`))
        : undefined,
    });

    for (const line of formatReport(report)) {
      console.log(line);
    }
    if (!report.ok) {
      throw new Error(`Store is not intact below ${args.root}`);
    }
  }
}
