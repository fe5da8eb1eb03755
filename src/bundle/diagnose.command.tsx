import { diagnoseTarget } from '@/bundle/health';
import { type CommandRuntime, resolveRuntime, runCommand } from '@/bundle/lib/command';
import { detectProvisioningMode } from '@/bundle/mode';
import { type DiagnoseCliOptionsInput, normalizeTargetCliOptions, toTargetContext } from '@/bundle/options';
import { assertTargetExists } from '@/bundle/preflight';
import { renderReport } from '@/bundle/ui';
import { DiagnosisReportView } from '@/bundle/ui/diagnose.report';

// Exits 0 whatever the report finds; only a missing target is fatal.
export const diagnoseCommandHandler = async (
  rawOptions: DiagnoseCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> =>
  runCommand('diagnose', async () => {
    const { cwd, env, platform } = resolveRuntime(runtime);
    const context = toTargetContext(normalizeTargetCliOptions(rawOptions), cwd, env, platform);
    await assertTargetExists(context.target);

    const report = await diagnoseTarget({
      target: context.target,
      sourceRoot: context.sourceRoot,
      mode: detectProvisioningMode({ ci: Boolean(rawOptions.ci), env, platform }),
      fix: Boolean(rawOptions.fix),
    });

    await renderReport(<DiagnosisReportView report={report} />);
    return 0;
  });
