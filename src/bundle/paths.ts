import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { DEPENDENTS_FILE } from '@/bundle/dependents';

export const resolvePackageRoot = (): string =>
  fileURLToPath(new URL('../..', import.meta.url));

export const resolveSourceRoot = (
  source: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv,
): string => {
  if (source) {
    return path.resolve(cwd, source);
  }

  const fromEnv = env.BUNDLE_SYNC_SOURCE?.trim();
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }

  return path.resolve(resolvePackageRoot());
};

export const resolveRegistryPath = (
  registry: string | undefined,
  sourceRoot: string,
  cwd: string,
  env: NodeJS.ProcessEnv,
): string => {
  if (registry) {
    return path.resolve(cwd, registry);
  }

  const fromEnv = env.BUNDLE_SYNC_REGISTRY?.trim();
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }

  return path.join(sourceRoot, DEPENDENTS_FILE);
};

export const resolveTarget = (target: string, cwd: string): string => path.resolve(cwd, target);
