import { Box, Text } from 'ink';

import { categories } from '@/bundle/categories';
import { countHealthIssues } from '@/bundle/health';
import { describeMode } from '@/bundle/mode';
import type {
  CategoryHealth,
  CategoryName,
  DiagnosisReport,
  GitConfigSetting,
  GitSkipReason,
  ItemState,
} from '@/bundle/types';
import { COLORS, RULE } from '@/bundle/ui/theme';

const STATE_LABELS: Record<ItemState, { label: string; color: string }> = {
  valid: { label: 'valid', color: COLORS.success },
  broken: { label: 'broken', color: COLORS.danger },
  textPlaceholder: { label: 'text placeholder', color: COLORS.amber },
  missing: { label: 'missing', color: COLORS.amber },
  extra: { label: 'local override', color: COLORS.amber },
};

const PROBLEM_STATES: ItemState[] = ['broken', 'textPlaceholder', 'missing', 'extra'];

const SKIP_LABELS: Record<GitSkipReason, string> = {
  'not-a-repository': 'target is not a git repository',
  'git-not-found': 'git not found in PATH',
};

const CategorySection = ({ name, health }: { name: CategoryName; health: CategoryHealth }) => {
  const issues = countHealthIssues(health);

  return (
    <Box flexDirection="column">
      <Text color={issues > 0 ? COLORS.amber : COLORS.steel}>
        {name}: {health.valid.length} valid
        {issues > 0 ? `, ${issues} issue(s)` : ''}
      </Text>
      {PROBLEM_STATES.flatMap((state) =>
        health[state].map((item) => (
          <Text key={`${state}-${item}`} color={STATE_LABELS[state].color}>
            {'  '}
            {STATE_LABELS[state].label}: {item}
          </Text>
        )),
      )}
    </Box>
  );
};

const GitLine = ({ setting }: { setting: GitConfigSetting }) => {
  const color =
    setting.status === 'ok' ? COLORS.success : setting.status === 'warning' ? COLORS.amber : COLORS.danger;

  return (
    <Text color={color}>
      {'  '}
      {setting.key} = {setting.value ?? '(unset)'} [{setting.status}]
    </Text>
  );
};

export const DiagnosisReportView = ({ report }: { report: DiagnosisReport }) => (
  <Box flexDirection="column">
    <Text bold color={COLORS.amber}>Bundle Diagnosis</Text>
    <Text color={COLORS.amber}>{RULE}</Text>
    <Text color={COLORS.steel}>Source: {report.sourceRoot}</Text>
    <Text color={COLORS.steel}>Target: {report.target}</Text>
    <Text color={COLORS.steel}>Mode: {describeMode(report.mode)}</Text>

    <Box flexDirection="column" marginTop={1}>
      <Text color={COLORS.cyan}>Installed items</Text>
      {categories().map(({ name }) => (
        <CategorySection key={name} name={name} health={report.health[name]} />
      ))}
    </Box>

    <Box flexDirection="column" marginTop={1}>
      <Text color={COLORS.cyan}>Git configuration</Text>
      {report.gitReconciled?.symlinksChanged && <Text color={COLORS.success}>  Set core.symlinks = true</Text>}
      {report.gitReconciled?.recurseChanged && <Text color={COLORS.success}>  Set submodule.recurse = true</Text>}
      {report.gitSkipped ? (
        <Text color={COLORS.amber}>  Skipped: {SKIP_LABELS[report.gitSkipped]}</Text>
      ) : (
        report.git.map((setting) => <GitLine key={setting.key} setting={setting} />)
      )}
    </Box>

    <Box flexDirection="column" marginTop={1}>
      <Text color={COLORS.cyan}>Content store</Text>
      {report.reachability.map((check) => (
        <Text key={check.label} color={check.reachable ? COLORS.steel : COLORS.amber}>
          {'  '}
          {check.label}: {check.reachable ? 'ok' : 'not found'}
          <Text color={COLORS.muted}> {check.path}</Text>
        </Text>
      ))}
    </Box>

    <Box flexDirection="column" marginTop={1}>
      <Text color={COLORS.amber}>{RULE}</Text>
      {report.issues === 0 ? (
        <Text color={COLORS.success}>No issues found.</Text>
      ) : (
        <Text color={COLORS.amber}>{report.issues} issue(s) found.</Text>
      )}
      {report.hints.map((hint) => (
        <Text key={hint} color={COLORS.muted}>
          - {hint}
        </Text>
      ))}
    </Box>
  </Box>
);
