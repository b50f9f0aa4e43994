import { stat } from 'node:fs/promises';
import path from 'node:path';
import { fileExists } from '@patchbench/core';

export const TARGET_FILE_CANDIDATES = [
  'targets.yaml',
  'targets.yml',
  path.join('.patchbench', 'targets.yaml'),
  path.join('.patchbench', 'targets.yml'),
] as const;

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate targets.yaml. An explicit path may name the file or a directory
 * holding one of the candidates; without it `cwd` is searched. Returns
 * undefined when nothing is found and no explicit path was given.
 */
export async function discoverTargetsFile(options: {
  readonly explicitPath?: string;
  readonly cwd: string;
}): Promise<string | undefined> {
  const { explicitPath, cwd } = options;

  if (explicitPath) {
    const resolvedExplicit = path.resolve(cwd, explicitPath);
    if (await isFile(resolvedExplicit)) {
      return resolvedExplicit;
    }

    for (const candidate of TARGET_FILE_CANDIDATES) {
      const nested = path.join(resolvedExplicit, candidate);
      if (await fileExists(nested)) {
        return nested;
      }
    }

    throw new Error(`targets.yaml not found at provided path: ${resolvedExplicit}`);
  }

  for (const candidate of TARGET_FILE_CANDIDATES) {
    const fullPath = path.join(path.resolve(cwd), candidate);
    if (await fileExists(fullPath)) {
      return fullPath;
    }
  }

  return undefined;
}
