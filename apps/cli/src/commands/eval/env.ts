import path from 'node:path';
import { fileExists } from '@patchbench/core';
import { config as loadDotenv } from 'dotenv';

interface LoadEnvOptions {
  readonly cwd: string;
  readonly verbose: boolean;
}

function collectAncestorDirectories(start: string): readonly string[] {
  const directories: string[] = [];
  let current = path.resolve(start);

  while (true) {
    directories.push(current);
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return directories;
}

/**
 * Load the nearest `.env` walking up from `cwd`. Variables already set in the
 * process environment win.
 */
export async function loadEnvFromHierarchy(options: LoadEnvOptions): Promise<string | undefined> {
  const { cwd, verbose } = options;

  for (const dir of collectAncestorDirectories(cwd)) {
    const candidate = path.join(dir, '.env');
    if (await fileExists(candidate)) {
      loadDotenv({ path: candidate, override: false });
      if (verbose) {
        console.log(`Loaded environment from: ${candidate}`);
      }
      return candidate;
    }
  }

  if (verbose) {
    console.log('No .env file found in hierarchy');
  }

  return undefined;
}
