import { resolveDatabasePath } from '@/bundle/database';
import { installBundle, syncAlwaysCopied } from '@/bundle/install';
import { type CommandRuntime, resolveRuntime, runCommand } from '@/bundle/lib/command';
import { pathExists } from '@/bundle/lib/fs';
import { detectProvisioningMode } from '@/bundle/mode';
import {
  type InstallCliOptionsInput,
  normalizeTargetCliOptions,
  type TargetCliOptionsInput,
  toTargetContext,
} from '@/bundle/options';
import { assertTargetExists } from '@/bundle/preflight';
import { askConfirmation, renderReport } from '@/bundle/ui';
import { InstallReportView, SyncReportView } from '@/bundle/ui/install.report';

export const confirmDatabaseOverwrite = async (target: string, yes: boolean): Promise<boolean> => {
  const databasePath = resolveDatabasePath(target);
  if (yes || !(await pathExists(databasePath))) {
    return true;
  }
  return askConfirmation(`Database already exists: ${databasePath}. Overwrite?`);
};

export const installCommandHandler = async (
  rawOptions: InstallCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('install', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toTargetContext(normalizeTargetCliOptions(rawOptions), cwd, env, platform);
    const mode = detectProvisioningMode({ ci: Boolean(rawOptions.ci), env, platform });

    const database = rawOptions.initDb
      ? { overwrite: await confirmDatabaseOverwrite(context.target, Boolean(rawOptions.yes)) }
      : undefined;

    const report = await installBundle({
      sourceRoot: context.sourceRoot,
      target: context.target,
      mode,
      platform,
      database,
    });

    await renderReport(<InstallReportView report={report} />);
    return report.results.some((result) => result.status === 'failed') ? 1 : 0;
  });

export const syncWorkflowsCommandHandler = async (
  rawOptions: TargetCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('sync-workflows', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toTargetContext(normalizeTargetCliOptions(rawOptions), cwd, env, platform);
    await assertTargetExists(context.target);

    const results = await syncAlwaysCopied(context.sourceRoot, context.target);
    await renderReport(<SyncReportView target={context.target} results={results} />);
    return results.some((result) => result.status === 'failed') ? 1 : 0;
  });
