import { Command } from 'commander';

import { diagnoseCommandHandler } from '@/bundle/diagnose.command';
import {
  listDependentsCommandHandler,
  registerCommandHandler,
  unregisterCommandHandler,
  updateAllCommandHandler,
} from '@/bundle/dependents.command';
import { initDbCommandHandler } from '@/bundle/init-db.command';
import { installCommandHandler, syncWorkflowsCommandHandler } from '@/bundle/install.command';
import type {
  BundleCliOptionsInput,
  DiagnoseCliOptionsInput,
  InitDbCliOptionsInput,
  InstallCliOptionsInput,
  RegisterCliOptionsInput,
  TargetCliOptionsInput,
} from '@/bundle/options';

export type Package = {
  name: string;
  description: string;
  version: string;
};

const TARGET_FLAGS = '-t, --target <path>';

export const parse = ({ argv, pkg }: { argv: string[]; pkg: Package }): (() => Promise<void>) => {
  const program = new Command();

  program
    .name('bundle-sync')
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'output the current version')
    .option('--source <path>', 'bundle source root (defaults to $BUNDLE_SYNC_SOURCE or the package root)')
    .option('--registry <file>', 'dependents registry file (defaults to <source>/dependents.json)')
    .showSuggestionAfterError()
    .showHelpAfterError();

  program
    .command('install')
    .description('Install the bundle into a target project (symlinks locally, copies in CI)')
    .requiredOption(TARGET_FLAGS, 'target project directory')
    .option('--ci', 'force CI mode (copy instead of symlink)')
    .option('--init-db', 'initialize an empty bundle database')
    .option('--yes', 'overwrite an existing database without asking')
    .action(async (_options: InstallCliOptionsInput, command: Command) => {
      await installCommandHandler(command.optsWithGlobals<InstallCliOptionsInput>());
    });

  program
    .command('sync-workflows')
    .description('Copy workflows and actions into a target project after bundle updates')
    .requiredOption(TARGET_FLAGS, 'target project directory')
    .action(async (_options: TargetCliOptionsInput, command: Command) => {
      await syncWorkflowsCommandHandler(command.optsWithGlobals<TargetCliOptionsInput>());
    });

  program
    .command('init-db')
    .description('Initialize the bundle database in a target project')
    .requiredOption(TARGET_FLAGS, 'target project directory')
    .option('--yes', 'overwrite an existing database without asking')
    .action(async (_options: InitDbCliOptionsInput, command: Command) => {
      await initDbCommandHandler(command.optsWithGlobals<InitDbCliOptionsInput>());
    });

  program
    .command('diagnose')
    .description('Report the health of installed items, git settings and the bundle source')
    .requiredOption(TARGET_FLAGS, 'target project directory')
    .option('--ci', 'diagnose against a copy-mode install')
    .option('--fix', 'set core.symlinks and submodule.recurse before reporting')
    .action(async (_options: DiagnoseCliOptionsInput, command: Command) => {
      await diagnoseCommandHandler(command.optsWithGlobals<DiagnoseCliOptionsInput>());
    });

  program
    .command('register')
    .description('Register a project as a bundle dependent')
    .requiredOption(TARGET_FLAGS, 'project directory to register')
    .option('-n, --name <name>', 'friendly name (defaults to the directory name)')
    .action(async (_options: RegisterCliOptionsInput, command: Command) => {
      await registerCommandHandler(command.optsWithGlobals<RegisterCliOptionsInput>());
    });

  program
    .command('unregister')
    .description('Remove a project from the bundle dependents')
    .requiredOption(TARGET_FLAGS, 'project directory to unregister')
    .action(async (_options: TargetCliOptionsInput, command: Command) => {
      await unregisterCommandHandler(command.optsWithGlobals<TargetCliOptionsInput>());
    });

  program
    .command('list-dependents')
    .description('List registered dependent projects')
    .action(async (_options: BundleCliOptionsInput, command: Command) => {
      await listDependentsCommandHandler(command.optsWithGlobals<BundleCliOptionsInput>());
    });

  program
    .command('update-all')
    .description('Sync workflows and actions to every registered dependent')
    .action(async (_options: BundleCliOptionsInput, command: Command) => {
      await updateAllCommandHandler(command.optsWithGlobals<BundleCliOptionsInput>());
    });

  return async () => {
    if (argv.length <= 2) {
      program.outputHelp();
      process.exitCode = 1;
      return;
    }

    await program.parseAsync(argv);
  };
};
