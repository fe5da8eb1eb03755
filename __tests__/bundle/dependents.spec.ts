import { readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import {
  listDependents,
  loadDependents,
  registerDependent,
  unregisterDependent,
  updateAllDependents,
} from '@/bundle/dependents';
import { RegistryFormatError, TargetNotFoundError } from '@/bundle/errors';

import { cleanupTempRoots, createBundleSource, createTarget, createTempRoot } from './fixtures';

afterEach(cleanupTempRoots);

const setup = async (prefix: string) => {
  const root = await createTempRoot(prefix);
  const sourceRoot = await createBundleSource(root);
  return { root, sourceRoot, registryPath: path.join(root, 'dependents.json') };
};

it('registers, lists and unregisters a dependent', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-roundtrip-');
  const target = await createTarget(root, 'web-app');

  const registered = await registerDependent({ registryPath, target, sourceRoot, name: 'Web' });
  expect(registered).toEqual({
    status: 'registered',
    entry: { name: 'Web', path: target },
    bundleCheckoutFound: false,
  });
  expect(await listDependents(registryPath)).toEqual([{ name: 'Web', path: target, exists: true }]);

  const removed = await unregisterDependent({ registryPath, target });
  expect(removed).toEqual({ status: 'unregistered', path: target });
  expect(await listDependents(registryPath)).toEqual([]);
});

it('does not duplicate an already registered path', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-dup-');
  const target = await createTarget(root, 'api');

  await registerDependent({ registryPath, target, sourceRoot });
  const again = await registerDependent({ registryPath, target: `${target}/`, sourceRoot, name: 'Other' });

  expect(again.status).toBe('already-registered');
  expect(again.entry).toEqual({ name: 'api', path: target });
  expect(await loadDependents(registryPath)).toEqual([{ name: 'api', path: target }]);
});

it('writes the registry as pretty-printed JSON', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-file-');
  const target = await createTarget(root, 'docs');

  await registerDependent({ registryPath, target, sourceRoot });

  expect(await readFile(registryPath, 'utf8')).toBe(
    `[\n  {\n    "name": "docs",\n    "path": ${JSON.stringify(target)}\n  }\n]\n`,
  );
});

it('notes whether the target carries a bundle checkout', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-checkout-');
  const target = await createTarget(root, 'app');
  await createTarget(target, '.bundle');

  const result = await registerDependent({ registryPath, target, sourceRoot });

  expect(result.bundleCheckoutFound).toBe(true);
});

it('refuses to register a directory that does not exist', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-absent-');

  await expect(
    registerDependent({ registryPath, target: path.join(root, 'absent'), sourceRoot }),
  ).rejects.toBeInstanceOf(TargetNotFoundError);
});

it('reports unknown paths on unregister without rewriting the file', async () => {
  const { root, registryPath } = await setup('bundle-dependents-unknown-');

  const result = await unregisterDependent({ registryPath, target: path.join(root, 'unknown') });

  expect(result).toEqual({ status: 'not-found', path: path.join(root, 'unknown') });
  await expect(readFile(registryPath, 'utf8')).rejects.toThrow(/ENOENT/);
});

it('flags registered paths that no longer exist', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-stale-');
  const target = await createTarget(root, 'old');
  await registerDependent({ registryPath, target, sourceRoot });
  await rm(target, { recursive: true });

  expect(await listDependents(registryPath)).toEqual([{ name: 'old', path: target, exists: false }]);
});

it('rejects a registry that is not an array of name and path pairs', async () => {
  const { registryPath } = await setup('bundle-dependents-invalid-');

  await writeFile(registryPath, '{"name": "x"}', 'utf8');
  await expect(loadDependents(registryPath)).rejects.toBeInstanceOf(RegistryFormatError);

  await writeFile(registryPath, '[{"name": "x", "path": 3}]', 'utf8');
  await expect(loadDependents(registryPath)).rejects.toThrow('entry 0 must have string "name" and "path"');

  await writeFile(registryPath, 'not json', 'utf8');
  await expect(loadDependents(registryPath)).rejects.toBeInstanceOf(RegistryFormatError);
});

it('updates every dependent and skips the ones that disappeared', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-fanout-');
  const first = await createTarget(root, 'first');
  const second = path.join(root, 'second');
  const third = await createTarget(root, 'third');
  await writeFile(
    registryPath,
    JSON.stringify([
      { name: 'first', path: first },
      { name: 'second', path: second },
      { name: 'third', path: third },
    ]),
    'utf8',
  );

  const report = await updateAllDependents({ registryPath, sourceRoot });

  expect(report.outcomes.map((outcome) => [outcome.entry.name, outcome.status])).toEqual([
    ['first', 'ok'],
    ['second', 'skipped-not-found'],
    ['third', 'ok'],
  ]);
  expect(report.succeeded).toBe(2);
  expect(report.total).toBe(3);
  expect(await readFile(path.join(third, '.github', 'workflows', 'ci.yml'), 'utf8')).toBe('name: ci\n');
});

it('attributes a failure to its dependent and carries on', async () => {
  const { root, sourceRoot, registryPath } = await setup('bundle-dependents-error-');
  const notADirectory = path.join(root, 'file-target');
  await writeFile(notADirectory, 'plain file', 'utf8');
  const healthy = await createTarget(root, 'healthy');
  await writeFile(
    registryPath,
    JSON.stringify([
      { name: 'broken', path: notADirectory },
      { name: 'healthy', path: healthy },
    ]),
    'utf8',
  );

  const report = await updateAllDependents({ registryPath, sourceRoot });

  expect(report.outcomes[0]?.status).toBe('error');
  expect(report.outcomes[1]?.status).toBe('ok');
  expect(report.succeeded).toBe(1);
});

it('returns an empty report when nothing is registered', async () => {
  const { sourceRoot, registryPath } = await setup('bundle-dependents-empty-');

  expect(await updateAllDependents({ registryPath, sourceRoot })).toEqual({
    outcomes: [],
    succeeded: 0,
    total: 0,
  });
});
