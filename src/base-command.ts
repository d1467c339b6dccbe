import { Command, Config } from '@oclif/core';
import chalk from 'chalk';
import AppService from './app-config/service';
import { prettyValidationErrors } from './common/utils/validation';
import { ValidationErrors } from './harness/utils/errors';

export default abstract class BaseCommand extends Command {
  app: AppService;

  constructor(argv: string[], config: Config) {
    super(argv, config);
    this.app = AppService.create(this.config.configDir, this.config.version);
  }

  logDebug(message: string): void {
    if (this.app.config.log_level === 'debug') {
      this.log(chalk.gray(message));
    }
  }

  async catch(error: Error & { exitCode?: number; oclif?: { exit?: number } }): Promise<unknown> {
    if (error.oclif && error.oclif.exit === 0) return;

    try {
      if (error.stack) {
        error.stack = [...new Set(error.stack.split('\n'))].join('\n');
      }

      if (error instanceof ValidationErrors) {
        prettyValidationErrors(error);
        return super.catch({ ...error, message: '' });
      }

      console.error(chalk.red(error.message));
    } catch {
      this.debug('Unable to add more context to error message');
    }
    // Oclif supers go as the return
    return super.catch(error);
  }
}
