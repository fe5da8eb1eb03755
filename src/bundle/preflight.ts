import { mkdir, mkdtemp, rm, stat, symlink } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { categories, resolveCategorySource } from '@/bundle/categories';
import {
  MissingSourceError,
  SymlinkUnsupportedError,
  TargetNotFoundError,
} from '@/bundle/errors';
import type { Category, ProvisioningMode } from '@/bundle/types';

const isDirectory = async (value: string): Promise<boolean> => {
  const stats = await stat(value).catch(() => null);
  return Boolean(stats?.isDirectory());
};

/**
 * Only Windows can refuse symlinks (Developer Mode off), so the probe is
 * skipped on every other platform.
 */
export const checkSymlinkSupport = async (platform: NodeJS.Platform): Promise<boolean> => {
  if (platform !== 'win32') {
    return true;
  }

  const tempDir = await mkdtemp(path.join(os.tmpdir(), 'bundle-sync-probe-'));
  try {
    const probeTarget = path.join(tempDir, 'target');
    await mkdir(probeTarget);
    await symlink(probeTarget, path.join(tempDir, 'link'), 'dir');
    return true;
  } catch {
    return false;
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
};

export const findMissingSources = async (
  sourceRoot: string,
  required: readonly Category[] = categories(),
): Promise<string[]> => {
  const missing: string[] = [];
  for (const category of required) {
    const dir = resolveCategorySource(category, sourceRoot);
    if (!(await isDirectory(dir))) {
      missing.push(dir);
    }
  }
  return missing;
};

export const assertTargetExists = async (target: string): Promise<void> => {
  if (!(await isDirectory(target))) {
    throw new TargetNotFoundError(target);
  }
};

export const runPreflight = async (args: {
  target: string;
  sourceRoot: string;
  mode: ProvisioningMode;
  platform: NodeJS.Platform;
  required?: readonly Category[];
}): Promise<void> => {
  await assertTargetExists(args.target);

  const missing = await findMissingSources(args.sourceRoot, args.required);
  if (missing.length > 0) {
    throw new MissingSourceError(missing);
  }

  if (args.mode === 'symlink' && !(await checkSymlinkSupport(args.platform))) {
    throw new SymlinkUnsupportedError();
  }
};
