import { Box, Text } from 'ink';

import { describeMode } from '@/bundle/mode';
import type {
  CategoryInstallResult,
  DatabaseInitResult,
  GitReconcileResult,
  InstallEntry,
  InstallReport,
} from '@/bundle/types';
import { COLORS, RULE } from '@/bundle/ui/theme';

const entryLabel = (entry: InstallEntry): string =>
  entry.method === 'symlink'
    ? `Symlinked: ${entry.name} -> ${entry.sourcePath}`
    : `Copied: ${entry.name}`;

export const CategoryResults = ({ results }: { results: CategoryInstallResult[] }) => (
  <Box flexDirection="column">
    {results.map((result) => (
      <Box key={result.category} flexDirection="column" marginTop={1}>
        <Text color={COLORS.cyan}>
          Installing {result.category}...
          <Text color={COLORS.muted}> {result.destinationDir}</Text>
        </Text>
        {result.entries.map((entry) => (
          <Text key={entry.name} color={COLORS.steel}>
            {'  '}
            {entryLabel(entry)}
          </Text>
        ))}
        {result.status === 'failed' && (
          <Text color={COLORS.danger}>
            {'  '}FAILED :: {result.error}
          </Text>
        )}
      </Box>
    ))}
  </Box>
);

const GitSection = ({ git }: { git: GitReconcileResult }) => {
  const unchanged = !git.skipped && !git.symlinksChanged && !git.recurseChanged && git.warnings.length === 0;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={COLORS.cyan}>Configuring git...</Text>
      {git.symlinksChanged && <Text color={COLORS.success}>  Set core.symlinks = true</Text>}
      {git.recurseChanged && (
        <Text color={COLORS.success}>  Set submodule.recurse = true (git pull will update submodules)</Text>
      )}
      {git.warnings.map((warning) => (
        <Text key={warning} color={COLORS.amber}>
          {'  '}Warning: {warning}
        </Text>
      ))}
      {unchanged && <Text color={COLORS.steel}>  Git already configured correctly</Text>}
    </Box>
  );
};

export const DatabaseLine = ({ database }: { database: DatabaseInitResult }) => {
  if (database.status === 'skipped-existing') {
    return <Text color={COLORS.muted}>Database already exists, skipped: {database.databasePath}</Text>;
  }

  const origin = database.status === 'created-from-template' ? 'template' : 'schema';
  return (
    <Text color={COLORS.success}>
      Initialized database from {origin}: {database.databasePath}
    </Text>
  );
};

export const InstallHeader = ({ report }: { report: Pick<InstallReport, 'sourceRoot' | 'target' | 'mode'> }) => (
  <Box flexDirection="column">
    <Text bold color={COLORS.amber}>Bundle Installation</Text>
    <Text color={COLORS.amber}>{RULE}</Text>
    <Text color={COLORS.steel}>Source: {report.sourceRoot}</Text>
    <Text color={COLORS.steel}>Target: {report.target}</Text>
    <Text color={COLORS.steel}>Mode: {describeMode(report.mode)}</Text>
  </Box>
);

export const InstallReportView = ({ report }: { report: InstallReport }) => {
  const failed = report.results.filter((result) => result.status === 'failed');

  return (
    <Box flexDirection="column">
      <InstallHeader report={report} />
      {report.git && <GitSection git={report.git} />}
      {report.cleanedPlaceholders.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          {report.cleanedPlaceholders.map((item) => (
            <Text key={item} color={COLORS.amber}>
              {'  '}Removing text placeholder: {item}
            </Text>
          ))}
          <Text color={COLORS.steel}>
            Cleaned {report.cleanedPlaceholders.length} text placeholder(s) from a previous checkout
          </Text>
        </Box>
      )}
      <CategoryResults results={report.results} />
      {report.database && (
        <Box marginTop={1}>
          <DatabaseLine database={report.database} />
        </Box>
      )}
      {report.verification && (
        <Box flexDirection="column" marginTop={1}>
          <Text color={COLORS.cyan}>Verifying installation...</Text>
          {report.verification.broken > 0 ? (
            <Text color={COLORS.amber}>  Warning: {report.verification.broken} broken symlink(s) detected</Text>
          ) : (
            <Text color={COLORS.success}>  All {report.verification.valid} symlink(s) verified successfully</Text>
          )}
        </Box>
      )}
      <Box flexDirection="column" marginTop={1}>
        <Text color={COLORS.amber}>{RULE}</Text>
        {failed.length > 0 ? (
          <Text color={COLORS.danger}>
            Installation finished with {failed.length} failed categor{failed.length === 1 ? 'y' : 'ies'}.
          </Text>
        ) : (
          <Text color={COLORS.success}>Installation complete!</Text>
        )}
        <Text color={COLORS.muted}>
          {report.mode === 'symlink'
            ? 'Symlinks created. Changes to the bundle will reflect immediately.'
            : "Files copied. Run 'bundle-sync sync-workflows' after bundle updates."}
        </Text>
      </Box>
    </Box>
  );
};

export const SyncReportView = ({ target, results }: { target: string; results: CategoryInstallResult[] }) => {
  const failed = results.some((result) => result.status === 'failed');

  return (
    <Box flexDirection="column">
      <Text bold color={COLORS.amber}>Syncing workflows to {target}</Text>
      <CategoryResults results={results} />
      <Box marginTop={1}>
        {failed ? (
          <Text color={COLORS.danger}>Workflow sync failed.</Text>
        ) : (
          <Text color={COLORS.success}>Workflow sync complete!</Text>
        )}
      </Box>
    </Box>
  );
};
