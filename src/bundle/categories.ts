import path from 'node:path';

import type { Category, CategoryName, InstallMethod, ProvisioningMode } from '@/bundle/types';

// CI hosts read workflows and actions from literal files, so those two are never linked.
const CATEGORIES: readonly Category[] = [
  {
    name: 'skills',
    group: 'agent',
    sourceDir: 'claude/skills',
    destinationDir: '.claude/skills',
    membership: { kind: 'directory' },
    symlinkEligible: true,
  },
  {
    name: 'commands',
    group: 'agent',
    sourceDir: 'claude/commands',
    destinationDir: '.claude/commands',
    membership: { kind: 'file', extensions: ['.md'] },
    symlinkEligible: true,
  },
  {
    name: 'scripts',
    group: 'agent',
    sourceDir: 'claude/scripts',
    destinationDir: '.claude/scripts',
    membership: { kind: 'file', extensions: ['.py'] },
    symlinkEligible: true,
  },
  {
    name: 'data',
    group: 'agent',
    sourceDir: 'claude/data',
    destinationDir: '.claude/data',
    membership: { kind: 'file', extensions: ['.py'] },
    symlinkEligible: true,
  },
  {
    name: 'workflows',
    group: 'ci',
    sourceDir: 'github/workflows',
    destinationDir: '.github/workflows',
    membership: { kind: 'file', extensions: ['.yml', '.yaml'] },
    symlinkEligible: false,
  },
  {
    name: 'actions',
    group: 'ci',
    sourceDir: 'github/actions',
    destinationDir: '.github/actions',
    membership: { kind: 'directory' },
    symlinkEligible: false,
  },
];

export const categories = (): readonly Category[] => CATEGORIES;

export const symlinkEligibleCategories = (): Category[] =>
  CATEGORIES.filter((category) => category.symlinkEligible);

export const alwaysCopyCategories = (): Category[] =>
  CATEGORIES.filter((category) => !category.symlinkEligible);

export const findCategory = (name: CategoryName): Category => {
  const category = CATEGORIES.find((entry) => entry.name === name);
  if (!category) {
    throw new Error(`Unknown category: ${name}`);
  }
  return category;
};

export const resolveCategorySource = (category: Category, sourceRoot: string): string =>
  path.join(sourceRoot, category.sourceDir);

export const resolveCategoryDestination = (category: Category, target: string): string =>
  path.join(target, category.destinationDir);

export const matchesCategory = (
  category: Category,
  entry: { name: string; isDirectory: boolean; isFile: boolean },
): boolean => {
  switch (category.membership.kind) {
    case 'directory':
      return entry.isDirectory;
    case 'file':
      return entry.isFile && category.membership.extensions.includes(path.extname(entry.name));
  }
};

export const installMethodFor = (category: Category, mode: ProvisioningMode): InstallMethod =>
  mode === 'symlink' && category.symlinkEligible ? 'symlink' : 'copy';
