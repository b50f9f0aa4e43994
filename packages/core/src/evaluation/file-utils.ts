import { constants } from 'node:fs';
import { access, readFile } from 'node:fs/promises';
import path from 'node:path';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a text file and normalize line endings to LF (\n).
 */
export async function readTextFile(filePath: string): Promise<string> {
  const content = await readFile(filePath, 'utf8');
  return content.replace(/\r\n/g, '\n');
}

/**
 * Return the first candidate (resolved against `baseDir`) that exists.
 */
export async function findFirstExisting(
  candidates: readonly string[],
  baseDir: string,
): Promise<string | undefined> {
  for (const candidate of candidates) {
    const absolute = path.resolve(baseDir, candidate);
    if (await fileExists(absolute)) {
      return absolute;
    }
  }
  return undefined;
}
