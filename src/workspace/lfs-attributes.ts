import fs from 'node:fs/promises';
import path from 'node:path';
import { readTextOrNull } from '../utils/fs.js';

export const LFS_ATTRIBUTES_FILE = '.gitattributes';

export const LFS_PATTERNS = [
  '*.mp4 filter=lfs diff=lfs merge=lfs -text',
  '*.mkv filter=lfs diff=lfs merge=lfs -text',
  '*.mov filter=lfs diff=lfs merge=lfs -text',
] as const;

/**
 * Appends whichever LFS pattern lines are missing from `.gitattributes`.
 * Returns the lines that were added.
 */
export async function ensureLfsAttributes(root: string): Promise<string[]> {
  const filePath = path.join(root, LFS_ATTRIBUTES_FILE);
  const existing = (await readTextOrNull(filePath)) ?? '';
  const present = new Set(existing.split(/\r?\n/).map((line) => line.trim()));
  const missing = LFS_PATTERNS.filter((pattern) => !present.has(pattern));

  if (missing.length === 0) return [];

  const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
  await fs.appendFile(filePath, `${separator}${missing.join('\n')}\n`, 'utf-8');
  return missing;
}
