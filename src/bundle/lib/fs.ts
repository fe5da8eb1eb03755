import { access, lstat } from 'node:fs/promises';

export const pathExists = async (value: string): Promise<boolean> => {
  try {
    await access(value);
    return true;
  } catch {
    return false;
  }
};

// Unlike pathExists, true for a dangling symlink.
export const entryExists = async (value: string): Promise<boolean> => {
  const stats = await lstat(value).catch(() => null);
  return stats !== null;
};

// Code-unit order, independent of the host locale.
export const compareNames = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

export const sortByName = <T extends { name: string }>(items: T[]): T[] =>
  [...items].sort((left, right) => compareNames(left.name, right.name));
