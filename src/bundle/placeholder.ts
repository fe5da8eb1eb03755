import { lstat, readFile } from 'node:fs/promises';
import path from 'node:path';
import { TextDecoder } from 'node:util';

export const PLACEHOLDER_MAX_BYTES = 200;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const decodeUtf8 = (buffer: Buffer): string | null => {
  try {
    return utf8Decoder.decode(buffer);
  } catch {
    return null;
  }
};

export const placeholderMarkers = (sourceRoot: string): string[] => [
  `${path.basename(sourceRoot)}/`,
  '../',
];

/**
 * Heuristic for a symlink that git checked out as a text file holding the
 * link target (happens when `core.symlinks` was false at clone time).
 *
 * Approximate: a small unrelated file that mentions `../` also matches.
 */
export const isTextPlaceholder = async (itemPath: string, sourceRoot: string): Promise<boolean> => {
  const stats = await lstat(itemPath).catch(() => null);
  if (!stats || stats.isSymbolicLink() || !stats.isFile()) {
    return false;
  }

  if (stats.size > PLACEHOLDER_MAX_BYTES) {
    return false;
  }

  const buffer = await readFile(itemPath).catch(() => null);
  const content = buffer ? decodeUtf8(buffer)?.trim() : null;
  if (!content) {
    return false;
  }

  return placeholderMarkers(sourceRoot).some((marker) => content.includes(marker));
};
