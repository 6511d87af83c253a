import { access, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { constants } from 'node:fs';

/**
 * Check if a file or directory exists.
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * List the regular files directly inside a directory, sorted by name.
 * A missing directory yields an empty list.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  if (!(await exists(dirPath))) return [];

  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dirPath, name));
}
