import { cp, mkdir, readdir, rm, symlink } from 'node:fs/promises';
import path from 'node:path';

import {
  alwaysCopyCategories,
  categories,
  installMethodFor,
  resolveCategoryDestination,
  symlinkEligibleCategories,
} from '@/bundle/categories';
import { initDatabase } from '@/bundle/database';
import { listCategoryItems } from '@/bundle/discovery';
import { errorMessage } from '@/bundle/errors';
import { type GitConfigPort, reconcileGitConfig } from '@/bundle/git';
import { verifyInstallation } from '@/bundle/health';
import { sortByName } from '@/bundle/lib/fs';
import { isTextPlaceholder } from '@/bundle/placeholder';
import { runPreflight } from '@/bundle/preflight';
import type {
  Category,
  CategoryInstallResult,
  CategoryItem,
  InstallEntry,
  InstallMethod,
  InstallOptions,
  InstallReport,
} from '@/bundle/types';

const installItem = async (
  item: CategoryItem,
  destinationPath: string,
  method: InstallMethod,
): Promise<void> => {
  // rm never follows links, so an old symlink is dropped without touching its target.
  await rm(destinationPath, { recursive: true, force: true });

  if (method === 'symlink') {
    await symlink(item.sourcePath, destinationPath, item.isDirectory ? 'dir' : 'file');
    return;
  }

  await cp(item.sourcePath, destinationPath, {
    recursive: true,
    force: true,
    errorOnExist: false,
    dereference: true,
    preserveTimestamps: true,
  });
};

export const installCategory = async (
  category: Category,
  options: InstallOptions,
): Promise<CategoryInstallResult> => {
  // Link targets must not depend on the link's own directory.
  const sourceRoot = path.resolve(options.sourceRoot);
  const destinationDir = resolveCategoryDestination(category, options.target);
  const method = installMethodFor(category, options.mode);
  const entries: InstallEntry[] = [];

  try {
    const items = await listCategoryItems(category, sourceRoot);
    await mkdir(destinationDir, { recursive: true });

    for (const item of items) {
      const destinationPath = path.join(destinationDir, item.name);
      await installItem(item, destinationPath, method);
      entries.push({ name: item.name, method, sourcePath: item.sourcePath, destinationPath });
    }

    return { category: category.name, status: 'installed', destinationDir, entries };
  } catch (error) {
    return {
      category: category.name,
      status: 'failed',
      destinationDir,
      entries,
      error: errorMessage(error),
    };
  }
};

export const installCategories = async (
  selected: readonly Category[],
  options: InstallOptions,
): Promise<CategoryInstallResult[]> => {
  const results: CategoryInstallResult[] = [];
  for (const category of selected) {
    results.push(await installCategory(category, options));
  }
  return results;
};

/**
 * Removes text files that git left in place of symlinks, so the install that
 * follows can lay down real links.
 */
export const cleanTextPlaceholders = async (target: string, sourceRoot: string): Promise<string[]> => {
  const removed: string[] = [];

  for (const category of symlinkEligibleCategories()) {
    const destinationDir = resolveCategoryDestination(category, target);
    const names = await readdir(destinationDir).catch((): string[] => []);

    for (const { name } of sortByName(names.map((entry) => ({ name: entry })))) {
      const itemPath = path.join(destinationDir, name);
      if (await isTextPlaceholder(itemPath, sourceRoot)) {
        await rm(itemPath, { force: true });
        removed.push(itemPath);
      }
    }
  }

  return removed;
};

export const syncAlwaysCopied = async (
  sourceRoot: string,
  target: string,
): Promise<CategoryInstallResult[]> =>
  installCategories(alwaysCopyCategories(), { sourceRoot, target, mode: 'copy' });

export type InstallBundleOptions = InstallOptions & {
  platform: NodeJS.Platform;
  database?: { overwrite: boolean };
  gitPort?: GitConfigPort;
};

export const installBundle = async (options: InstallBundleOptions): Promise<InstallReport> => {
  const { sourceRoot, target, mode } = options;

  await runPreflight({ target, sourceRoot, mode, platform: options.platform });

  const report: InstallReport = { mode, sourceRoot, target, cleanedPlaceholders: [], results: [] };

  if (mode === 'symlink') {
    report.git = await reconcileGitConfig(target, options.gitPort);
    report.cleanedPlaceholders = await cleanTextPlaceholders(target, sourceRoot);
  }

  report.results = await installCategories(categories(), { sourceRoot, target, mode });

  if (options.database) {
    report.database = await initDatabase({
      sourceRoot,
      target,
      overwrite: options.database.overwrite,
    });
  }

  if (mode === 'symlink') {
    report.verification = await verifyInstallation({ target, sourceRoot, mode });
  }

  return report;
};
