export type BundleSyncErrorCode =
  | 'target-not-found'
  | 'missing-source'
  | 'symlink-unsupported'
  | 'git-not-found'
  | 'registry-format'
  | 'database-init';

export class BundleSyncError extends Error {
  readonly code: BundleSyncErrorCode;

  constructor(code: BundleSyncErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TargetNotFoundError extends BundleSyncError {
  constructor(readonly target: string) {
    super('target-not-found', `Target directory does not exist: ${target}`);
  }
}

export class MissingSourceError extends BundleSyncError {
  constructor(readonly missing: string[]) {
    super(
      'missing-source',
      [
        'Bundle source directories not found:',
        ...missing.map((dir) => `  - ${dir}`),
        'This usually means the submodule is not initialized.',
        'Run: git submodule update --init --recursive',
      ].join('\n'),
    );
  }
}

export class SymlinkUnsupportedError extends BundleSyncError {
  constructor() {
    super(
      'symlink-unsupported',
      'Cannot create symlinks on this host. Enable Developer Mode ' +
        '(Settings > Privacy & Security > For developers) or re-run with --ci to copy files instead.',
    );
  }
}

export class GitNotFoundError extends BundleSyncError {
  constructor() {
    super('git-not-found', 'git not found in PATH');
  }
}

export class RegistryFormatError extends BundleSyncError {
  constructor(file: string, details: string) {
    super('registry-format', `Invalid dependents registry ${file}: ${details}`);
  }
}

export class DatabaseInitError extends BundleSyncError {
  constructor(message: string) {
    super('database-init', message);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
