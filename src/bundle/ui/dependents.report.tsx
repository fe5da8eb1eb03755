import { Box, Text } from 'ink';

import type { RegisterResult } from '@/bundle/dependents';
import type { DependentListing, DependentOutcome, FanOutReport } from '@/bundle/types';
import { COLORS } from '@/bundle/ui/theme';

const LIST_RULE = '-'.repeat(50);
const FAN_OUT_RULE = '='.repeat(50);

const RegisterHint = () => (
  <Box flexDirection="column">
    <Text color={COLORS.steel}>No dependent projects registered.</Text>
    <Text color={COLORS.muted}>Register a project with: bundle-sync register --target /path/to/project</Text>
  </Box>
);

export const RegisterResultView = ({
  result,
  registryPath,
  checkoutName,
}: {
  result: RegisterResult;
  registryPath: string;
  checkoutName: string;
}) => (
  <Box flexDirection="column">
    {!result.bundleCheckoutFound && (
      <Text color={COLORS.amber}>
        Warning: no {checkoutName} checkout found in {result.entry.path}; add the bundle as a submodule first.
      </Text>
    )}
    {result.status === 'already-registered' ? (
      <Text color={COLORS.steel}>Already registered: {result.entry.path}</Text>
    ) : (
      <>
        <Text color={COLORS.muted}>Saved to: {registryPath}</Text>
        <Text color={COLORS.success}>
          Registered: {result.entry.name} ({result.entry.path})
        </Text>
      </>
    )}
  </Box>
);

export const UnregisterResultView = ({
  status,
  target,
  registryPath,
}: {
  status: 'unregistered' | 'not-found';
  target: string;
  registryPath: string;
}) =>
  status === 'not-found' ? (
    <Text color={COLORS.amber}>Not found in registry: {target}</Text>
  ) : (
    <Box flexDirection="column">
      <Text color={COLORS.muted}>Saved to: {registryPath}</Text>
      <Text color={COLORS.success}>Unregistered: {target}</Text>
    </Box>
  );

export const DependentListView = ({ listing }: { listing: DependentListing[] }) => {
  if (listing.length === 0) {
    return <RegisterHint />;
  }

  return (
    <Box flexDirection="column">
      <Text bold color={COLORS.cyan}>Registered dependents ({listing.length}):</Text>
      <Text color={COLORS.muted}>{LIST_RULE}</Text>
      {listing.map((entry) => (
        <Text key={entry.path} color={entry.exists ? COLORS.steel : COLORS.amber}>
          {'  '}
          {entry.name}: {entry.path}
          {entry.exists ? '' : ' [NOT FOUND]'}
        </Text>
      ))}
    </Box>
  );
};

const OutcomeLines = ({ outcome }: { outcome: DependentOutcome }) => {
  switch (outcome.status) {
    case 'ok':
      return <Text color={COLORS.success}>  OK: workflows synced</Text>;
    case 'skipped-not-found':
      return <Text color={COLORS.amber}>  SKIPPED: directory not found</Text>;
    case 'error':
      return <Text color={COLORS.danger}>  ERROR: {outcome.error}</Text>;
  }
};

export const FanOutReportView = ({ report }: { report: FanOutReport }) => {
  if (report.total === 0) {
    return <RegisterHint />;
  }

  return (
    <Box flexDirection="column">
      <Text bold color={COLORS.cyan}>Updating workflows for {report.total} project(s)...</Text>
      <Text color={COLORS.muted}>{FAN_OUT_RULE}</Text>
      {report.outcomes.map((outcome) => (
        <Box key={outcome.entry.path} flexDirection="column" marginTop={1}>
          <Text color={COLORS.steel}>
            [{outcome.entry.name}] {outcome.entry.path}
          </Text>
          <OutcomeLines outcome={outcome} />
        </Box>
      ))}
      <Box flexDirection="column" marginTop={1}>
        <Text color={COLORS.muted}>{FAN_OUT_RULE}</Text>
        <Text color={report.succeeded === report.total ? COLORS.success : COLORS.amber}>
          Updated {report.succeeded}/{report.total} projects
        </Text>
        {report.succeeded > 0 && (
          <>
            <Text color={COLORS.muted}>Next steps:</Text>
            <Text color={COLORS.muted}>  1. Review changes in each project: git diff .github/</Text>
            <Text color={COLORS.muted}>
              {'  '}2. Commit and push: git add .github/ {'&&'} git commit -m 'chore: sync bundle workflows'
            </Text>
          </>
        )}
      </Box>
    </Box>
  );
};
