import { mkdir, symlink } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import { categories, findCategory } from '@/bundle/categories';
import { analyzeCategory, analyzeTarget, diagnoseTarget, verifyInstallation } from '@/bundle/health';
import { installCategories } from '@/bundle/install';
import type { CategoryHealth } from '@/bundle/types';

import {
  cleanupTempRoots,
  createBundleSource,
  createFakeGitConfigPort,
  createTarget,
  createTempRoot,
  writeFixture,
} from './fixtures';

afterEach(cleanupTempRoots);

const empty: CategoryHealth = { valid: [], broken: [], textPlaceholder: [], missing: [], extra: [] };

it('separates resolving links from dangling ones', async () => {
  const root = await createTempRoot('bundle-health-links-');
  const sourceRoot = path.join(root, '.bundle');
  await writeFixture(sourceRoot, 'claude/skills/A/SKILL.md', 'a');
  await writeFixture(sourceRoot, 'claude/skills/B/SKILL.md', 'b');
  const target = await createTarget(root);
  const skillsDir = path.join(target, '.claude', 'skills');
  await mkdir(skillsDir, { recursive: true });
  await symlink(path.join(sourceRoot, 'claude', 'skills', 'A'), path.join(skillsDir, 'A'), 'dir');
  await symlink(path.join(root, 'gone', 'B'), path.join(skillsDir, 'B'), 'dir');

  const health = await analyzeCategory(findCategory('skills'), { target, sourceRoot, mode: 'symlink' });

  expect(health).toEqual({ ...empty, valid: ['A'], broken: ['B'] });
});

it('classifies a small file holding a link target as a text placeholder', async () => {
  const root = await createTempRoot('bundle-health-placeholder-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await writeFixture(target, '.claude/commands/C', '../../.source/commands/C.md');

  const health = await analyzeCategory(findCategory('commands'), { target, sourceRoot, mode: 'symlink' });

  expect(health).toEqual({ ...empty, textPlaceholder: ['C'], missing: ['plan.md'] });
});

it('prefers text placeholder over extra for a bundle name', async () => {
  const root = await createTempRoot('bundle-health-precedence-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await writeFixture(target, '.claude/commands/plan.md', '../../.bundle/claude/commands/plan.md');

  const health = await analyzeCategory(findCategory('commands'), { target, sourceRoot, mode: 'symlink' });

  expect(health).toEqual({ ...empty, textPlaceholder: ['plan.md'] });
});

it('marks real files standing in for expected links as extra and ignores unrelated files', async () => {
  const root = await createTempRoot('bundle-health-extra-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await writeFixture(target, '.claude/skills/alpha/SKILL.md', 'local override');
  await writeFixture(target, '.claude/skills/mine/SKILL.md', 'project-only skill');

  const health = await analyzeCategory(findCategory('skills'), { target, sourceRoot, mode: 'symlink' });

  expect(health).toEqual({ ...empty, extra: ['alpha'], missing: ['beta'] });
});

it('reports every expected name as missing when the destination directory is absent', async () => {
  const root = await createTempRoot('bundle-health-missing-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);

  const health = await analyzeTarget({ target, sourceRoot, mode: 'symlink' });

  expect(health).toEqual({
    skills: { ...empty, missing: ['alpha', 'beta'] },
    commands: { ...empty, missing: ['plan.md'] },
    scripts: { ...empty, missing: ['tool.py'] },
    data: { ...empty, missing: ['seed.py'] },
    workflows: { ...empty, missing: ['ci.yml'] },
    actions: { ...empty, missing: ['setup'] },
  });
});

it('accepts copies as valid after a copy-mode install', async () => {
  const root = await createTempRoot('bundle-health-copy-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await installCategories(categories(), { sourceRoot, target, mode: 'copy' });

  const health = await analyzeTarget({ target, sourceRoot, mode: 'copy' });

  expect(health.skills).toEqual({ ...empty, valid: ['alpha', 'beta'] });
  expect(health.commands).toEqual({ ...empty, valid: ['plan.md'] });
  expect(health.actions).toEqual({ ...empty, valid: ['setup'] });
});

it('puts every name into exactly one state', async () => {
  const root = await createTempRoot('bundle-health-partition-');
  const sourceRoot = await createBundleSource(root);
  await writeFixture(sourceRoot, 'claude/commands/review.md', '# Review\n');
  await writeFixture(sourceRoot, 'claude/commands/ship.md', '# Ship\n');
  const target = await createTarget(root);
  const commandsDir = path.join(target, '.claude', 'commands');
  await mkdir(commandsDir, { recursive: true });
  await symlink(path.join(sourceRoot, 'claude', 'commands', 'plan.md'), path.join(commandsDir, 'plan.md'));
  await symlink(path.join(root, 'gone.md'), path.join(commandsDir, 'review.md'));
  await writeFixture(target, '.claude/commands/stray', '../elsewhere');

  const health = await analyzeCategory(findCategory('commands'), { target, sourceRoot, mode: 'symlink' });
  const all = [...health.valid, ...health.broken, ...health.textPlaceholder, ...health.missing, ...health.extra];

  expect(health).toEqual({
    valid: ['plan.md'],
    broken: ['review.md'],
    textPlaceholder: ['stray'],
    missing: ['ship.md'],
    extra: [],
  });
  expect(new Set(all).size).toBe(all.length);
});

it('counts valid and broken links across eligible categories', async () => {
  const root = await createTempRoot('bundle-health-verify-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await installCategories(categories(), { sourceRoot, target, mode: 'symlink' });
  await symlink(path.join(root, 'gone.py'), path.join(target, '.claude', 'data', 'old.py'));

  expect(await verifyInstallation({ target, sourceRoot, mode: 'symlink' })).toEqual({ valid: 5, broken: 1 });
});

it('diagnoses missing items and unset git settings without throwing', async () => {
  const root = await createTempRoot('bundle-health-diagnose-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await mkdir(path.join(target, '.git'));
  const gitPort = createFakeGitConfigPort({ 'core.symlinks': 'false' });

  const report = await diagnoseTarget({ target, sourceRoot, mode: 'symlink', gitPort });

  expect(report.git).toEqual([
    { key: 'core.symlinks', status: 'warning', value: 'false' },
    { key: 'submodule.recurse', status: 'warning', value: undefined },
  ]);
  expect(report.gitReconciled).toBeUndefined();
  expect(report.issues).toBe(9);
  expect(report.reachability.filter((check) => !check.reachable).map((check) => check.label)).toEqual([
    'bundle checkout in target',
  ]);
  expect(report.hints).toHaveLength(2);
  expect(gitPort.writes).toEqual([]);
});

it('reconciles git settings before reporting when asked to fix', async () => {
  const root = await createTempRoot('bundle-health-fix-');
  const sourceRoot = await createBundleSource(root);
  const target = await createTarget(root);
  await mkdir(path.join(target, '.git'));
  await installCategories(categories(), { sourceRoot, target, mode: 'symlink' });
  const gitPort = createFakeGitConfigPort();

  const report = await diagnoseTarget({ target, sourceRoot, mode: 'symlink', fix: true, gitPort });

  expect(report.gitReconciled).toEqual({ symlinksChanged: true, recurseChanged: true, warnings: [] });
  expect(report.git.map((setting) => setting.status)).toEqual(['ok', 'ok']);
  expect(report.issues).toBe(0);
  expect(report.hints).toEqual([]);
});

it('counts unreachable source directories and skips git outside a repository', async () => {
  const root = await createTempRoot('bundle-health-unreachable-');
  const target = await createTarget(root);
  const sourceRoot = path.join(root, '.bundle');

  const report = await diagnoseTarget({ target, sourceRoot, mode: 'copy' });

  expect(report.gitSkipped).toBe('not-a-repository');
  expect(report.git).toEqual([]);
  expect(report.issues).toBe(7);
  expect(report.hints).toEqual(['Initialize the bundle source: git submodule update --init --recursive']);
});
