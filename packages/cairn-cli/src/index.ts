#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { InitCommand } from './commands/init';
import { HashObjectCommand } from './commands/hash-object';
import { CatFileCommand } from './commands/cat-file';
import { WriteTreeCommand } from './commands/write-tree';
import { CommitTreeCommand } from './commands/commit-tree';
import { LsTreeCommand } from './commands/ls-tree';
import { LogCommand } from './commands/log';
import { DiffCommand } from './commands/diff';
import { FsckCommand } from './commands/fsck';
import * as pkg from '../package.json';

const parser = yargs(hideBin(process.argv))
  .scriptName('cairn')
  .version(pkg.version)
  .option('store', { type: 'string', default: '.cairn', global: true, describe: 'Directory of the object store' })
  .showHelpOnFail(true)
  .demandCommand()
  .recommendCommands()
  .help()
  .strict()
  .command(new InitCommand())
  .command(new HashObjectCommand())
  .command(new CatFileCommand())
  .command(new WriteTreeCommand())
  .command(new CommitTreeCommand())
  .command(new LsTreeCommand())
  .command(new LogCommand())
  .command(new DiffCommand())
  .command(new FsckCommand());

parser.parseAsync().catch(error => {
  console.error(error);
  process.exit(1);
});
