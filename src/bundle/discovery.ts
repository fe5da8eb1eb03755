import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { matchesCategory, resolveCategorySource } from '@/bundle/categories';
import { sortByName } from '@/bundle/lib/fs';
import type { Category, CategoryItem } from '@/bundle/types';

/**
 * Source entries of a category, sorted by name. Links inside the source tree
 * are followed, so a linked skill directory still counts as a directory.
 */
export const listCategoryItems = async (
  category: Category,
  sourceRoot: string,
): Promise<CategoryItem[]> => {
  const sourceDir = resolveCategorySource(category, sourceRoot);
  const names = await readdir(sourceDir);
  const items: CategoryItem[] = [];

  for (const name of names) {
    const sourcePath = path.join(sourceDir, name);
    const stats = await stat(sourcePath).catch(() => null);
    if (!stats) {
      continue;
    }

    const isDirectory = stats.isDirectory();
    if (matchesCategory(category, { name, isDirectory, isFile: stats.isFile() })) {
      items.push({ name, sourcePath, isDirectory });
    }
  }

  return sortByName(items);
};
