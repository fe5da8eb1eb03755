import { errorMessage } from '@/bundle/errors';

export type CommandRuntime = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
};

export type ResolvedRuntime = Required<CommandRuntime>;

export const resolveRuntime = (runtime?: CommandRuntime): ResolvedRuntime => ({
  cwd: runtime?.cwd ?? process.cwd(),
  env: runtime?.env ?? process.env,
  platform: runtime?.platform ?? process.platform,
});

export const runCommand = async (command: string, action: () => Promise<number>): Promise<number> => {
  try {
    const code = await action();
    if (code !== 0) {
      process.exitCode = code;
    }
    return code;
  } catch (error) {
    console.error(`bundle-sync ${command} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
    return 1;
  }
};
