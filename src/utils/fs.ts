import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { isNotFound } from './errors.js';

/** `fs.stat`, with null for a path that does not exist. */
export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export async function readTextOrNull(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}
