import { lstat, readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import {
  categories,
  findCategory,
  installMethodFor,
  resolveCategoryDestination,
  resolveCategorySource,
} from '@/bundle/categories';
import { listCategoryItems } from '@/bundle/discovery';
import { type GitConfigPort, inspectGitConfig, reconcileGitConfig } from '@/bundle/git';
import { compareNames, pathExists } from '@/bundle/lib/fs';
import { isTextPlaceholder } from '@/bundle/placeholder';
import type {
  Category,
  CategoryHealth,
  CategoryItem,
  DiagnosisReport,
  ItemState,
  ProvisioningMode,
  ReachabilityCheck,
  TargetHealth,
  VerificationCounts,
} from '@/bundle/types';

export type AnalyzeOptions = {
  target: string;
  sourceRoot: string;
  mode: ProvisioningMode;
};

const expectedNames = async (category: Category, sourceRoot: string): Promise<Set<string>> => {
  const items = await listCategoryItems(category, sourceRoot).catch((): CategoryItem[] => []);
  return new Set(items.map((item) => item.name));
};

const classifyItem = async (
  itemPath: string,
  expected: boolean,
  copyExpected: boolean,
  sourceRoot: string,
): Promise<Exclude<ItemState, 'missing'> | null> => {
  const stats = await lstat(itemPath).catch(() => null);
  if (!stats) {
    return null;
  }

  if (stats.isSymbolicLink()) {
    const resolved = await stat(itemPath).catch(() => null);
    return resolved ? 'valid' : 'broken';
  }

  if (copyExpected && expected) {
    return 'valid';
  }

  // Placeholder wins over extra when a placeholder-looking file carries a bundle name.
  if (await isTextPlaceholder(itemPath, sourceRoot)) {
    return 'textPlaceholder';
  }

  return expected ? 'extra' : null;
};

export const analyzeCategory = async (
  category: Category,
  options: AnalyzeOptions,
): Promise<CategoryHealth> => {
  const health: CategoryHealth = { valid: [], broken: [], textPlaceholder: [], missing: [], extra: [] };
  const expected = await expectedNames(category, options.sourceRoot);
  const destinationDir = resolveCategoryDestination(category, options.target);

  const present = await readdir(destinationDir).catch(() => null);
  if (present === null) {
    health.missing = [...expected].sort(compareNames);
    return health;
  }

  const copyExpected = installMethodFor(category, options.mode) === 'copy';
  const accounted = new Set<string>();

  for (const name of [...present].sort(compareNames)) {
    const state = await classifyItem(
      path.join(destinationDir, name),
      expected.has(name),
      copyExpected,
      options.sourceRoot,
    );
    if (state) {
      health[state].push(name);
      accounted.add(name);
    }
  }

  health.missing = [...expected].filter((name) => !accounted.has(name)).sort(compareNames);
  return health;
};

export const analyzeTarget = async (options: AnalyzeOptions): Promise<TargetHealth> => ({
  skills: await analyzeCategory(findCategory('skills'), options),
  commands: await analyzeCategory(findCategory('commands'), options),
  scripts: await analyzeCategory(findCategory('scripts'), options),
  data: await analyzeCategory(findCategory('data'), options),
  workflows: await analyzeCategory(findCategory('workflows'), options),
  actions: await analyzeCategory(findCategory('actions'), options),
});

/** Counts of resolving and dangling links across the symlink-eligible categories. */
export const verifyInstallation = async (options: AnalyzeOptions): Promise<VerificationCounts> => {
  const counts: VerificationCounts = { valid: 0, broken: 0 };

  for (const category of categories()) {
    if (!category.symlinkEligible) {
      continue;
    }
    const health = await analyzeCategory(category, options);
    counts.valid += health.valid.length;
    counts.broken += health.broken.length;
  }

  return counts;
};

export const countHealthIssues = (health: CategoryHealth): number =>
  health.broken.length + health.textPlaceholder.length + health.missing.length + health.extra.length;

export const BUNDLE_CHECKOUT_LABEL = 'bundle checkout in target';

const checkReachability = async (target: string, sourceRoot: string): Promise<ReachabilityCheck[]> => {
  const checks: ReachabilityCheck[] = [
    { label: 'source root', path: sourceRoot, reachable: await pathExists(sourceRoot) },
  ];

  for (const category of categories()) {
    const dir = resolveCategorySource(category, sourceRoot);
    checks.push({ label: `source ${category.name}`, path: dir, reachable: await pathExists(dir) });
  }

  const checkout = path.join(target, path.basename(sourceRoot));
  checks.push({ label: BUNDLE_CHECKOUT_LABEL, path: checkout, reachable: await pathExists(checkout) });

  return checks;
};

/**
 * Full report for `diagnose`. Problems are counted and explained, never
 * thrown; with `fix` the git settings are reconciled before being read.
 */
export const diagnoseTarget = async (
  options: AnalyzeOptions & { fix?: boolean; gitPort?: GitConfigPort },
): Promise<DiagnosisReport> => {
  const { target, sourceRoot, mode } = options;
  const health = await analyzeTarget({ target, sourceRoot, mode });

  const gitReconciled = options.fix ? await reconcileGitConfig(target, options.gitPort) : undefined;
  const git = await inspectGitConfig(target, options.gitPort);
  const reachability = await checkReachability(target, sourceRoot);

  const hints: string[] = [];
  const entries = Object.values(health);

  const itemIssues = entries.reduce((total, entry) => total + countHealthIssues(entry), 0);
  if (itemIssues > 0) {
    hints.push("Re-run 'bundle-sync install' to recreate missing, broken and placeholder items.");
  }

  if (entries.some((entry) => entry.textPlaceholder.length > 0)) {
    hints.push('Text placeholders mean git checked symlinks out as files; set core.symlinks=true before reinstalling.');
  }

  // Copy-mode installs do not need either setting.
  const gitIssues = mode === 'symlink'
    ? git.settings.filter((setting) => setting.status !== 'ok').length
    : 0;
  if (gitIssues > 0) {
    hints.push("Run 'bundle-sync diagnose --fix' to set core.symlinks and submodule.recurse.");
  }

  const unreachable = reachability.filter(
    (check) => !check.reachable && check.label !== BUNDLE_CHECKOUT_LABEL,
  ).length;
  if (unreachable > 0) {
    hints.push('Initialize the bundle source: git submodule update --init --recursive');
  }

  return {
    mode,
    sourceRoot,
    target,
    health,
    git: git.settings,
    gitSkipped: git.skipped,
    gitReconciled,
    reachability,
    issues: itemIssues + gitIssues + unreachable,
    hints,
  };
};
