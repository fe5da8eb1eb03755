import path from 'node:path';

import {
  listDependents,
  registerDependent,
  unregisterDependent,
  updateAllDependents,
} from '@/bundle/dependents';
import { type CommandRuntime, resolveRuntime, runCommand } from '@/bundle/lib/command';
import {
  type BundleCliOptionsInput,
  normalizeBundleCliOptions,
  normalizeTargetCliOptions,
  type RegisterCliOptionsInput,
  type TargetCliOptionsInput,
  toBundleContext,
  toTargetContext,
} from '@/bundle/options';
import { renderReport } from '@/bundle/ui';
import {
  DependentListView,
  FanOutReportView,
  RegisterResultView,
  UnregisterResultView,
} from '@/bundle/ui/dependents.report';

export const registerCommandHandler = async (
  rawOptions: RegisterCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('register', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toTargetContext(normalizeTargetCliOptions(rawOptions), cwd, env, platform);

    const result = await registerDependent({
      registryPath: context.registryPath,
      target: context.target,
      sourceRoot: context.sourceRoot,
      name: rawOptions.name,
    });

    await renderReport(
      <RegisterResultView
        result={result}
        registryPath={context.registryPath}
        checkoutName={path.basename(context.sourceRoot)}
      />,
    );
    return 0;
  });

export const unregisterCommandHandler = async (
  rawOptions: TargetCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('unregister', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toTargetContext(normalizeTargetCliOptions(rawOptions), cwd, env, platform);

    const result = await unregisterDependent({ registryPath: context.registryPath, target: context.target });
    await renderReport(
      <UnregisterResultView status={result.status} target={result.path} registryPath={context.registryPath} />,
    );
    return 0;
  });

export const listDependentsCommandHandler = async (
  rawOptions: BundleCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('list-dependents', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toBundleContext(normalizeBundleCliOptions(rawOptions), cwd, env, platform);

    const listing = await listDependents(context.registryPath);
    await renderReport(<DependentListView listing={listing} />);
    return 0;
  });

export const updateAllCommandHandler = async (
  rawOptions: BundleCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('update-all', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toBundleContext(normalizeBundleCliOptions(rawOptions), cwd, env, platform);

    const report = await updateAllDependents({
      registryPath: context.registryPath,
      sourceRoot: context.sourceRoot,
    });
    // Per-dependent failures are reported, not fatal.
    await renderReport(<FanOutReportView report={report} />);
    return 0;
  });
