import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { GitConfigPort } from '@/bundle/git';

const tempRoots: string[] = [];

export const createTempRoot = async (prefix: string): Promise<string> => {
  const root = await mkdtemp(path.join(os.tmpdir(), prefix));
  tempRoots.push(root);
  return root;
};

export const cleanupTempRoots = async (): Promise<void> => {
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
};

export const writeFixture = async (root: string, relativePath: string, content: string): Promise<string> => {
  const file = path.join(root, relativePath);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content, 'utf8');
  return file;
};

/**
 * Bundle source with two skills, one command, one script, one data script,
 * one workflow and one action, plus a non-member file in commands and
 * workflows. The source root is named `.bundle`.
 */
export const createBundleSource = async (root: string): Promise<string> => {
  const sourceRoot = path.join(root, '.bundle');

  await writeFixture(sourceRoot, 'claude/skills/alpha/SKILL.md', '---\nname: alpha\n---\n');
  await writeFixture(sourceRoot, 'claude/skills/beta/SKILL.md', '---\nname: beta\n---\n');
  await writeFixture(sourceRoot, 'claude/commands/plan.md', '# Plan\n');
  await writeFixture(sourceRoot, 'claude/commands/notes.txt', 'not a command');
  await writeFixture(sourceRoot, 'claude/scripts/tool.py', 'print("tool")\n');
  await writeFixture(sourceRoot, 'claude/data/seed.py', 'print("seed")\n');
  await writeFixture(sourceRoot, 'github/workflows/ci.yml', 'name: ci\n');
  await writeFixture(sourceRoot, 'github/workflows/README.md', 'workflows\n');
  await writeFixture(sourceRoot, 'github/actions/setup/action.yml', 'name: setup\n');

  return sourceRoot;
};

export const createTarget = async (root: string, name = 'project'): Promise<string> => {
  const target = path.join(root, name);
  await mkdir(target, { recursive: true });
  return target;
};

export type FakeGitConfigPort = GitConfigPort & {
  values: Map<string, string>;
  writes: string[];
};

export const createFakeGitConfigPort = (
  initial: Record<string, string> = {},
  failures: { set?: string[] } = {},
): FakeGitConfigPort => {
  const values = new Map(Object.entries(initial));
  const writes: string[] = [];

  return {
    values,
    writes,
    getLocal: async (key) => values.get(key),
    setLocal: async (key, value) => {
      if (failures.set?.includes(key)) {
        throw new Error(`could not lock config file for ${key}`);
      }
      writes.push(`${key}=${value}`);
      values.set(key, value);
    },
  };
};
