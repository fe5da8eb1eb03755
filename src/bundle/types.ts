export type ProvisioningMode = 'symlink' | 'copy';

export type CategoryName = 'skills' | 'commands' | 'scripts' | 'data' | 'workflows' | 'actions';

export type CategoryGroup = 'agent' | 'ci';

export type CategoryMembership =
  | { kind: 'directory' }
  | { kind: 'file'; extensions: readonly string[] };

export type Category = {
  name: CategoryName;
  group: CategoryGroup;
  sourceDir: string;
  destinationDir: string;
  membership: CategoryMembership;
  symlinkEligible: boolean;
};

export type CategoryItem = {
  name: string;
  sourcePath: string;
  isDirectory: boolean;
};

export type InstallMethod = 'symlink' | 'copy';

export type InstallEntry = {
  name: string;
  method: InstallMethod;
  sourcePath: string;
  destinationPath: string;
};

export type CategoryInstallStatus = 'installed' | 'failed';

export type CategoryInstallResult = {
  category: CategoryName;
  status: CategoryInstallStatus;
  destinationDir: string;
  entries: InstallEntry[];
  error?: string;
};

export type InstallOptions = {
  sourceRoot: string;
  target: string;
  mode: ProvisioningMode;
};

export type ItemState = 'valid' | 'broken' | 'textPlaceholder' | 'missing' | 'extra';

export type CategoryHealth = Record<ItemState, string[]>;

export type TargetHealth = Record<CategoryName, CategoryHealth>;

export type GitConfigKey = 'core.symlinks' | 'submodule.recurse';

export type GitConfigStatus = 'ok' | 'warning' | 'error';

export type GitConfigSetting = {
  key: GitConfigKey;
  status: GitConfigStatus;
  value?: string;
};

export type GitSkipReason = 'not-a-repository' | 'git-not-found';

export type GitReconcileResult = {
  symlinksChanged: boolean;
  recurseChanged: boolean;
  skipped?: GitSkipReason;
  warnings: string[];
};

export type DependentEntry = {
  name: string;
  path: string;
};

export type DependentListing = DependentEntry & { exists: boolean };

export type DependentOutcome =
  | { entry: DependentEntry; status: 'ok'; results: CategoryInstallResult[] }
  | { entry: DependentEntry; status: 'skipped-not-found' }
  | { entry: DependentEntry; status: 'error'; error: string };

export type FanOutReport = {
  outcomes: DependentOutcome[];
  succeeded: number;
  total: number;
};

export type DatabaseInitStatus = 'created-from-template' | 'created-from-schema' | 'skipped-existing';

export type DatabaseInitResult = {
  status: DatabaseInitStatus;
  databasePath: string;
};

export type VerificationCounts = {
  valid: number;
  broken: number;
};

export type InstallReport = {
  mode: ProvisioningMode;
  sourceRoot: string;
  target: string;
  git?: GitReconcileResult;
  cleanedPlaceholders: string[];
  results: CategoryInstallResult[];
  database?: DatabaseInitResult;
  verification?: VerificationCounts;
};

export type ReachabilityCheck = {
  label: string;
  path: string;
  reachable: boolean;
};

export type DiagnosisReport = {
  mode: ProvisioningMode;
  sourceRoot: string;
  target: string;
  health: TargetHealth;
  git: GitConfigSetting[];
  gitSkipped?: GitSkipReason;
  gitReconciled?: GitReconcileResult;
  reachability: ReachabilityCheck[];
  issues: number;
  hints: string[];
};

export type BundleContext = {
  sourceRoot: string;
  registryPath: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
};

export type TargetContext = BundleContext & { target: string };
