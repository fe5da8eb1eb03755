import { initDatabase } from '@/bundle/database';
import { confirmDatabaseOverwrite } from '@/bundle/install.command';
import { type CommandRuntime, resolveRuntime, runCommand } from '@/bundle/lib/command';
import { type InitDbCliOptionsInput, normalizeTargetCliOptions, toTargetContext } from '@/bundle/options';
import { assertTargetExists } from '@/bundle/preflight';
import { renderReport } from '@/bundle/ui';
import { DatabaseLine } from '@/bundle/ui/install.report';

export const initDbCommandHandler = async (
  rawOptions: InitDbCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('init-db', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toTargetContext(normalizeTargetCliOptions(rawOptions), cwd, env, platform);
    await assertTargetExists(context.target);

    const overwrite = await confirmDatabaseOverwrite(context.target, Boolean(rawOptions.yes));
    const result = await initDatabase({ sourceRoot: context.sourceRoot, target: context.target, overwrite });

    await renderReport(<DatabaseLine database={result} />);
    return 0;
  });
