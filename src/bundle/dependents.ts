import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { RegistryFormatError, errorMessage } from '@/bundle/errors';
import { syncAlwaysCopied } from '@/bundle/install';
import { pathExists } from '@/bundle/lib/fs';
import { assertTargetExists } from '@/bundle/preflight';
import type {
  DependentEntry,
  DependentListing,
  DependentOutcome,
  FanOutReport,
} from '@/bundle/types';

export const DEPENDENTS_FILE = 'dependents.json';

const isDependentEntry = (value: unknown): value is DependentEntry => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const name: unknown = Reflect.get(value, 'name');
  const entryPath: unknown = Reflect.get(value, 'path');
  return typeof name === 'string' && typeof entryPath === 'string';
};

export const loadDependents = async (file: string): Promise<DependentEntry[]> => {
  if (!(await pathExists(file))) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    throw new RegistryFormatError(file, errorMessage(error));
  }

  if (!Array.isArray(parsed)) {
    throw new RegistryFormatError(file, 'expected a JSON array');
  }

  const entries: DependentEntry[] = [];
  for (const [index, value] of parsed.entries()) {
    if (!isDependentEntry(value)) {
      throw new RegistryFormatError(file, `entry ${index} must have string "name" and "path"`);
    }
    entries.push({ name: value.name, path: value.path });
  }
  return entries;
};

// Rewritten in full on every mutation; concurrent writers are not supported.
export const saveDependents = async (file: string, entries: DependentEntry[]): Promise<void> => {
  await writeFile(file, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
};

export type RegisterResult = {
  status: 'registered' | 'already-registered';
  entry: DependentEntry;
  bundleCheckoutFound: boolean;
};

export const registerDependent = async (args: {
  registryPath: string;
  target: string;
  sourceRoot: string;
  name?: string;
}): Promise<RegisterResult> => {
  const target = path.resolve(args.target);
  await assertTargetExists(target);

  const bundleCheckoutFound = await pathExists(path.join(target, path.basename(args.sourceRoot)));
  const dependents = await loadDependents(args.registryPath);

  const existing = dependents.find((entry) => entry.path === target);
  if (existing) {
    return { status: 'already-registered', entry: existing, bundleCheckoutFound };
  }

  const entry: DependentEntry = { name: args.name?.trim() || path.basename(target), path: target };
  await saveDependents(args.registryPath, [...dependents, entry]);

  return { status: 'registered', entry, bundleCheckoutFound };
};

export const unregisterDependent = async (args: {
  registryPath: string;
  target: string;
}): Promise<{ status: 'unregistered' | 'not-found'; path: string }> => {
  const target = path.resolve(args.target);
  const dependents = await loadDependents(args.registryPath);
  const remaining = dependents.filter((entry) => entry.path !== target);

  if (remaining.length === dependents.length) {
    return { status: 'not-found', path: target };
  }

  await saveDependents(args.registryPath, remaining);
  return { status: 'unregistered', path: target };
};

export const listDependents = async (registryPath: string): Promise<DependentListing[]> => {
  const dependents = await loadDependents(registryPath);
  const listing: DependentListing[] = [];
  for (const entry of dependents) {
    listing.push({ ...entry, exists: await pathExists(entry.path) });
  }
  return listing;
};

const updateDependent = async (entry: DependentEntry, sourceRoot: string): Promise<DependentOutcome> => {
  if (!(await pathExists(entry.path))) {
    return { entry, status: 'skipped-not-found' };
  }

  try {
    const results = await syncAlwaysCopied(sourceRoot, entry.path);
    const failures = results.filter((result) => result.status === 'failed');
    if (failures.length > 0) {
      return {
        entry,
        status: 'error',
        error: failures.map((result) => `${result.category}: ${result.error ?? 'failed'}`).join('; '),
      };
    }
    return { entry, status: 'ok', results };
  } catch (error) {
    return { entry, status: 'error', error: errorMessage(error) };
  }
};

/**
 * Copies the always-copied categories into every registered dependent, one
 * at a time. A dependent that fails leaves the others untouched; dependents
 * already updated stay updated.
 */
export const updateAllDependents = async (args: {
  registryPath: string;
  sourceRoot: string;
}): Promise<FanOutReport> => {
  const dependents = await loadDependents(args.registryPath);
  const outcomes: DependentOutcome[] = [];

  for (const entry of dependents) {
    outcomes.push(await updateDependent(entry, args.sourceRoot));
  }

  return {
    outcomes,
    succeeded: outcomes.filter((outcome) => outcome.status === 'ok').length,
    total: dependents.length,
  };
};
