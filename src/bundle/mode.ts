import type { ProvisioningMode } from '@/bundle/types';

export type ModeSignals = {
  ci: boolean;
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
};

/**
 * Picks symlinks for interactive workstations and copies everywhere else.
 * Linux is treated as a CI host unless FORCE_SYMLINKS is set.
 */
export const detectProvisioningMode = ({ ci, env, platform }: ModeSignals): ProvisioningMode => {
  if (ci) {
    return 'copy';
  }

  if (env.CI?.trim().toLowerCase() === 'true') {
    return 'copy';
  }

  if (platform === 'linux' && !env.FORCE_SYMLINKS?.trim()) {
    return 'copy';
  }

  return 'symlink';
};

export const describeMode = (mode: ProvisioningMode): string =>
  mode === 'symlink' ? 'Symlink (local dev)' : 'Copy (CI)';
