import { Command } from 'commander';
import { CliDependencies, defaultDependencies } from './commands/dependencies';
import { registerExportCommand } from './commands/export.command';
import { registerImportCommand } from './commands/import.command';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name('qss')
    .description('Copy QuickSight analyses, dashboards and their dependencies between accounts and regions')
    .version('1.0.0')
    .option('--region <region>', 'AWS region of the QuickSight assets')
    .option('--account-id <id>', 'AWS account id, skips the STS lookup')
    .option('-v, --verbose', 'debug logging')
    .hook('preAction', command => {
      if (command.opts<{ verbose?: boolean }>().verbose) {
        logger.setLevel('DEBUG');
      }
    });

  // Failures set the exit code instead of throwing out of commander
  const handle = async (action: () => Promise<void>): Promise<void> => {
    try {
      await action();
    } catch (error) {
      logger.error('Command failed', error);
      deps.print(`Error: ${describeError(error)}`);
      process.exitCode = 1;
    }
  };

  registerExportCommand(program, deps, handle);
  registerImportCommand(program, deps, handle);

  return program;
}
