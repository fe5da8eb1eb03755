import { copyFile, mkdir, readFile, rm } from 'node:fs/promises';
import path from 'node:path';

import Database from 'better-sqlite3';

import { DatabaseInitError } from '@/bundle/errors';
import { pathExists } from '@/bundle/lib/fs';
import type { DatabaseInitResult } from '@/bundle/types';

export const DATABASE_FILE = 'bundle.db';
export const DATABASE_TEMPLATE = 'templates/bundle.db.empty';
export const DATABASE_SCHEMA = 'templates/schema.sql';

export const resolveDatabasePath = (target: string): string =>
  path.join(target, '.claude', 'data', DATABASE_FILE);

export const initDatabase = async (args: {
  sourceRoot: string;
  target: string;
  overwrite: boolean;
}): Promise<DatabaseInitResult> => {
  const databasePath = resolveDatabasePath(args.target);
  await mkdir(path.dirname(databasePath), { recursive: true });

  if (!args.overwrite && (await pathExists(databasePath))) {
    return { status: 'skipped-existing', databasePath };
  }

  const template = path.join(args.sourceRoot, DATABASE_TEMPLATE);
  if (await pathExists(template)) {
    await copyFile(template, databasePath);
    return { status: 'created-from-template', databasePath };
  }

  const schemaPath = path.join(args.sourceRoot, DATABASE_SCHEMA);
  if (!(await pathExists(schemaPath))) {
    throw new DatabaseInitError(`No template or schema found to initialize ${databasePath}`);
  }

  const schema = await readFile(schemaPath, 'utf8');
  await rm(databasePath, { force: true });
  const db = new Database(databasePath);
  try {
    db.exec(schema);
  } finally {
    db.close();
  }

  return { status: 'created-from-schema', databasePath };
};
