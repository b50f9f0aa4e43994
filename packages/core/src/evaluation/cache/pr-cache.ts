import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { type Logger, describeError, silentLogger } from '../logger.js';

export const DEFAULT_PR_CACHE_DIR = '.patchbench/pr-cache';

export interface PrCacheOptions {
  readonly cacheDir?: string;
  /** Skip reads so every lookup goes to the network; writes still happen */
  readonly forceFetch?: boolean;
  readonly logger?: Logger;
}

/**
 * Flat file cache for pull request metadata and raw file contents.
 *
 * JSON entries are stored as `<cacheDir>/<name>.json`, text entries as
 * `<cacheDir>/<name>.txt`. A write failure is logged and swallowed so the
 * caller still gets its freshly fetched data.
 */
export class PrCache {
  readonly cacheDir: string;
  private readonly forceFetch: boolean;
  private readonly logger: Logger;

  constructor(options: PrCacheOptions = {}) {
    this.cacheDir = options.cacheDir ?? DEFAULT_PR_CACHE_DIR;
    this.forceFetch = options.forceFetch ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /** Cached JSON value, or undefined when missing, unreadable or bypassed. */
  async getJson(name: string): Promise<unknown> {
    if (this.forceFetch) {
      return undefined;
    }
    return this.readJson(name);
  }

  /** Cached JSON value even when `forceFetch` is set. Used as a rate-limit fallback. */
  async readJson(name: string): Promise<unknown> {
    const text = await this.readFileOrUndefined(this.pathFor(name, 'json'));
    if (text === undefined) {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return undefined;
    }
  }

  async setJson(name: string, value: unknown): Promise<void> {
    await this.write(this.pathFor(name, 'json'), JSON.stringify(value), name);
  }

  async getText(name: string): Promise<string | undefined> {
    if (this.forceFetch) {
      return undefined;
    }
    return this.readText(name);
  }

  async readText(name: string): Promise<string | undefined> {
    return this.readFileOrUndefined(this.pathFor(name, 'txt'));
  }

  async setText(name: string, value: string): Promise<void> {
    await this.write(this.pathFor(name, 'txt'), value, name);
  }

  private pathFor(name: string, extension: 'json' | 'txt'): string {
    return path.join(this.cacheDir, `${name}.${extension}`);
  }

  private async readFileOrUndefined(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf8');
    } catch {
      return undefined;
    }
  }

  private async write(filePath: string, data: string, name: string): Promise<void> {
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, data, 'utf8');
    } catch (error) {
      this.logger.warn(`Failed to write cache entry ${name}: ${describeError(error)}`);
    }
  }
}

/**
 * Cache entry name for a raw file URL.
 */
export function rawContentKey(rawUrl: string): string {
  return `raw_${createHash('sha256').update(rawUrl).digest('hex')}`;
}
