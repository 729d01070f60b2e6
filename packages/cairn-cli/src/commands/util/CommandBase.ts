import chalk from 'chalk';
import { ArgumentsCamelCase, Argv, CommandModule } from 'yargs';

import { errorToString } from '../../format';

/**
 * Options every command receives from the top-level parser.
 */
export interface GlobalOptions {
  store: string;
}

export abstract class CommandBase<TOptions extends GlobalOptions> implements CommandModule<{}, TOptions> {
  abstract readonly command: string;
  abstract readonly describe: string;

  constructor() {
    this.handler = this.handler.bind(this);
    this.builder = this.builder.bind(this);
  }

  async handler(args: ArgumentsCamelCase<TOptions>): Promise<void> {
    try {
      await this.handlerCore(args);
    } catch (error) {
      console.error(chalk.red(errorToString(error)));
      process.exit(1);
    }
  }

  abstract builder(args: Argv): Argv<TOptions>;
  abstract handlerCore(args: ArgumentsCamelCase<TOptions>): Promise<void>;
}
