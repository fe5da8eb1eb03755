import { execFile } from 'node:child_process';
import path from 'node:path';
import { promisify } from 'node:util';

import { GitNotFoundError, errorMessage } from '@/bundle/errors';
import { entryExists } from '@/bundle/lib/fs';
import type {
  GitConfigKey,
  GitConfigSetting,
  GitReconcileResult,
  GitSkipReason,
} from '@/bundle/types';

const execFileAsync = promisify(execFile);

export const SYMLINKS_KEY: GitConfigKey = 'core.symlinks';
export const SUBMODULE_RECURSE_KEY: GitConfigKey = 'submodule.recurse';

const RECONCILED_KEYS: readonly GitConfigKey[] = [SYMLINKS_KEY, SUBMODULE_RECURSE_KEY];

/**
 * Repository-scoped git configuration. Implementations raise
 * {@link GitNotFoundError} when no git executable is available.
 */
export interface GitConfigPort {
  getLocal(key: string): Promise<string | undefined>;
  setLocal(key: string, value: string): Promise<void>;
}

const errorField = (error: unknown, field: 'code' | 'stderr'): unknown => {
  if (!error || typeof error !== 'object' || !(field in error)) {
    return undefined;
  }
  return Reflect.get(error, field);
};

const summarizeGitError = (error: unknown): string => {
  const stderr = errorField(error, 'stderr');
  if (typeof stderr === 'string' && stderr.trim()) {
    const lines = stderr.trim().split(/\r?\n/).slice(0, 6);
    return lines.join('\n');
  }

  return errorMessage(error) || 'unknown git error';
};

export const createGitCliConfigPort = (repo: string): GitConfigPort => {
  const run = async (args: string[]): Promise<string> => {
    try {
      const { stdout } = await execFileAsync('git', ['-C', repo, 'config', '--local', ...args]);
      return stdout;
    } catch (error) {
      if (errorField(error, 'code') === 'ENOENT') {
        throw new GitNotFoundError();
      }
      throw error;
    }
  };

  return {
    getLocal: async (key) => {
      try {
        const value = (await run(['--get', key])).trim();
        return value || undefined;
      } catch (error) {
        // `git config --get` exits with 1 when the key is unset.
        if (errorField(error, 'code') === 1) {
          return undefined;
        }
        if (error instanceof GitNotFoundError) {
          throw error;
        }
        throw new Error(`Unable to read ${key}: ${summarizeGitError(error)}`);
      }
    },
    setLocal: async (key, value) => {
      try {
        await run([key, value]);
      } catch (error) {
        if (error instanceof GitNotFoundError) {
          throw error;
        }
        throw new Error(`Unable to set ${key}: ${summarizeGitError(error)}`);
      }
    },
  };
};

// `.git` is a file inside worktrees and submodules.
export const isGitRepository = async (target: string): Promise<boolean> =>
  entryExists(path.join(target, '.git'));

const isTrue = (value: string | undefined): boolean => value?.trim().toLowerCase() === 'true';

export const reconcileGitConfig = async (
  targetRepo: string,
  port: GitConfigPort = createGitCliConfigPort(targetRepo),
): Promise<GitReconcileResult> => {
  const result: GitReconcileResult = { symlinksChanged: false, recurseChanged: false, warnings: [] };

  if (!(await isGitRepository(targetRepo))) {
    return {
      ...result,
      skipped: 'not-a-repository',
      warnings: ['Target is not a git repository, skipping git configuration.'],
    };
  }

  for (const key of RECONCILED_KEYS) {
    try {
      if (isTrue(await port.getLocal(key))) {
        continue;
      }

      await port.setLocal(key, 'true');
      if (key === SYMLINKS_KEY) {
        result.symlinksChanged = true;
      } else {
        result.recurseChanged = true;
      }
    } catch (error) {
      if (error instanceof GitNotFoundError) {
        return {
          symlinksChanged: false,
          recurseChanged: false,
          skipped: 'git-not-found',
          warnings: ['git not found in PATH, skipping git configuration.'],
        };
      }
      result.warnings.push(`Failed to configure ${key}: ${errorMessage(error)}`);
    }
  }

  return result;
};

export const inspectGitConfig = async (
  targetRepo: string,
  port: GitConfigPort = createGitCliConfigPort(targetRepo),
): Promise<{ settings: GitConfigSetting[]; skipped?: GitSkipReason }> => {
  if (!(await isGitRepository(targetRepo))) {
    return { settings: [], skipped: 'not-a-repository' };
  }

  const settings: GitConfigSetting[] = [];
  for (const key of RECONCILED_KEYS) {
    try {
      const value = await port.getLocal(key);
      settings.push({ key, status: isTrue(value) ? 'ok' : 'warning', value });
    } catch (error) {
      if (error instanceof GitNotFoundError) {
        return { settings: [], skipped: 'git-not-found' };
      }
      settings.push({ key, status: 'error' });
    }
  }

  return { settings };
};
