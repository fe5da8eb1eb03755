#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';

import { type Package, parse } from '@/parser';

const readPackage = async (): Promise<Package> => {
  const raw: unknown = JSON.parse(await readFile(new URL('../package.json', import.meta.url), 'utf8'));
  const field = (key: keyof Package): string => {
    const value: unknown = raw && typeof raw === 'object' ? Reflect.get(raw, key) : undefined;
    return typeof value === 'string' ? value : '';
  };

  return { name: field('name'), description: field('description'), version: field('version') };
};

const run = parse({ argv: process.argv, pkg: await readPackage() });
await run();
