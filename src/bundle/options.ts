import { resolveRegistryPath, resolveSourceRoot, resolveTarget } from '@/bundle/paths';
import type { BundleContext, TargetContext } from '@/bundle/types';

export type BundleCliOptionsInput = {
  source?: string;
  registry?: string;
};

export type TargetCliOptionsInput = BundleCliOptionsInput & {
  target?: string;
};

export type InstallCliOptionsInput = TargetCliOptionsInput & {
  ci?: boolean;
  initDb?: boolean;
  yes?: boolean;
};

export type InitDbCliOptionsInput = TargetCliOptionsInput & {
  yes?: boolean;
};

export type DiagnoseCliOptionsInput = TargetCliOptionsInput & {
  ci?: boolean;
  fix?: boolean;
};

export type RegisterCliOptionsInput = TargetCliOptionsInput & {
  name?: string;
};

export type BundleCliOptions = {
  source?: string;
  registry?: string;
};

export type TargetCliOptions = BundleCliOptions & {
  target: string;
};

export const normalizeBundleCliOptions = (options: BundleCliOptionsInput): BundleCliOptions => ({
  source: options.source?.trim() || undefined,
  registry: options.registry?.trim() || undefined,
});

export const normalizeTargetCliOptions = (options: TargetCliOptionsInput): TargetCliOptions => {
  const target = options.target?.trim();
  if (!target) {
    throw new Error('Missing required option: --target <path>');
  }

  return { ...normalizeBundleCliOptions(options), target };
};

export const toBundleContext = (
  options: BundleCliOptions,
  cwd: string,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform,
): BundleContext => {
  const sourceRoot = resolveSourceRoot(options.source, cwd, env);

  return {
    sourceRoot,
    registryPath: resolveRegistryPath(options.registry, sourceRoot, cwd, env),
    cwd,
    env,
    platform,
  };
};

export const toTargetContext = (
  options: TargetCliOptions,
  cwd: string,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform,
): TargetContext => ({
  ...toBundleContext(options, cwd, env, platform),
  target: resolveTarget(options.target, cwd),
});
