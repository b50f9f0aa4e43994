import { Mutex } from 'async-mutex';
import { z } from 'zod';

import { PrCache, rawContentKey } from '../cache/pr-cache.js';
import { type Logger, describeError, silentLogger } from '../logger.js';
import type { ChangeRequestCase, ChangedFile } from '../types.js';
import {
  type CaseSource,
  GitHubRequestError,
  RateLimitError,
  type RepositoryBrowser,
  type RepositoryTree,
} from './types.js';

export const DEFAULT_GITHUB_API = 'https://api.github.com';
export const DEFAULT_REQUEST_DELAY_MS = 500;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GitHubCaseSourceOptions {
  /** `owner/name` */
  readonly repo: string;
  readonly apiBaseUrl?: string;
  readonly token?: string;
  /** Pause before every API request */
  readonly requestDelayMs?: number;
  readonly timeoutMs?: number;
  readonly cache?: PrCache;
  readonly fetchFn?: FetchLike;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
}

const PULL_FILE_SCHEMA = z
  .object({
    filename: z.string(),
    status: z.string().optional(),
    additions: z.number().optional(),
    deletions: z.number().optional(),
    patch: z.string().nullish(),
    raw_url: z.string().nullish(),
  })
  .passthrough();

type PullFile = z.infer<typeof PULL_FILE_SCHEMA>;

const PULL_FILES_SCHEMA = z.array(PULL_FILE_SCHEMA);

const PULL_LIST_SCHEMA = z.array(
  z
    .object({
      number: z.number().int().optional(),
      merged_at: z.string().nullish(),
    })
    .passthrough(),
);

const PULL_DETAIL_SCHEMA = z
  .object({
    body: z.string().nullish(),
    merged_at: z.string().nullish(),
    diff_url: z.string().nullish(),
  })
  .passthrough();

const REPO_META_SCHEMA = z.object({ default_branch: z.string().optional() }).passthrough();

const TREE_SCHEMA = z
  .object({
    tree: z
      .array(z.object({ path: z.string(), type: z.string() }).passthrough())
      .default([]),
  })
  .passthrough();

const CONTENTS_SCHEMA = z
  .object({
    encoding: z.string().nullish(),
    content: z.string().nullish(),
  })
  .passthrough();

const CACHED_PR_LIST_SCHEMA = z.object({ pr_numbers: z.array(z.number().int()) });

const CACHED_PR_SCHEMA = z.object({
  body: z.string().nullish(),
  files: PULL_FILES_SCHEMA.default([]),
  diff_text: z.string().nullish(),
});

const CACHED_TREE_SCHEMA = z.object({
  paths: z.array(z.string()),
  default_branch: z.string().default('main'),
});

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toChangedFile(file: PullFile): ChangedFile {
  return {
    filename: file.filename,
    status: file.status,
    additions: file.additions,
    deletions: file.deletions,
    patch: file.patch ?? undefined,
    rawUrl: file.raw_url ?? undefined,
  };
}

function fetchedAt(): number {
  return Date.now() / 1000;
}

/**
 * Case source backed by the GitHub REST API.
 *
 * Responses are cached on disk by {@link PrCache}. A 403 on pull request
 * details or the repository tree falls back to the cache (even when
 * `forceFetch` is set) and otherwise surfaces as {@link RateLimitError}.
 *
 * Requests from one source go out one at a time, each after the configured
 * delay, however many workers share it.
 */
export class GitHubCaseSource implements CaseSource, RepositoryBrowser {
  readonly repo: string;

  private readonly apiBaseUrl: string;
  private readonly token?: string;
  private readonly requestDelayMs: number;
  private readonly timeoutMs: number;
  private readonly cache: PrCache;
  private readonly fetchFn: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly requestLock = new Mutex();

  constructor(options: GitHubCaseSourceOptions) {
    this.repo = options.repo;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_GITHUB_API).replace(/\/+$/, '');
    this.token = options.token;
    this.requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.cache = options.cache ?? new PrCache({ logger: this.logger });
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  async listCaseIds(limit: number): Promise<number[]> {
    const cacheName = `closed_prs_filtered_${limit}`;
    const cached = CACHED_PR_LIST_SCHEMA.safeParse(await this.cache.getJson(cacheName));
    if (cached.success && cached.data.pr_numbers.length > 0) {
      return cached.data.pr_numbers.slice(0, limit);
    }

    const perPage = Math.max(30, limit * 3);
    const pulls = await this.getJson(
      `${this.repoUrl()}/pulls?state=closed&per_page=${perPage}`,
      PULL_LIST_SCHEMA,
    );

    const ids: number[] = [];
    for (const pull of pulls) {
      if (ids.length >= limit) {
        break;
      }
      const id = pull.number;
      if (id === undefined) {
        continue;
      }

      try {
        let mergedAt = pull.merged_at;
        if (mergedAt === undefined || mergedAt === null) {
          const detail = await this.getJson(`${this.repoUrl()}/pulls/${id}`, PULL_DETAIL_SCHEMA);
          mergedAt = detail.merged_at;
        }
        if (!mergedAt) {
          continue;
        }

        const files = await this.getJson(`${this.repoUrl()}/pulls/${id}/files`, PULL_FILES_SCHEMA);
        if (files.some((file) => (file.patch ?? '').trim().length > 0)) {
          ids.push(id);
        }
      } catch (error) {
        this.logger.debug(`Skipping PR ${id} while listing: ${describeError(error)}`);
      }
    }

    await this.cache.setJson(cacheName, { fetched_at: fetchedAt(), pr_numbers: ids });
    return ids.slice(0, limit);
  }

  async fetchCase(id: number): Promise<ChangeRequestCase> {
    const cacheName = `pr_${id}`;
    const cached = this.parseCachedCase(id, await this.cache.getJson(cacheName));
    if (cached) {
      return cached;
    }

    let body: string;
    let files: PullFile[];
    let diffText = '';
    try {
      const detail = await this.getJson(`${this.repoUrl()}/pulls/${id}`, PULL_DETAIL_SCHEMA);
      body = detail.body ?? '';
      files = await this.getJson(`${this.repoUrl()}/pulls/${id}/files`, PULL_FILES_SCHEMA);
      if (detail.diff_url) {
        diffText = await this.request(detail.diff_url, (response) => response.text());
      }
    } catch (error) {
      if (error instanceof GitHubRequestError && error.status === 403) {
        const fallback = this.parseCachedCase(id, await this.cache.readJson(cacheName));
        if (fallback) {
          this.logger.warn(`GitHub 403 for PR ${id}; using cached PR data`);
          return fallback;
        }
        throw new RateLimitError(`pull request ${id}`);
      }
      throw error;
    }

    await this.cache.setJson(cacheName, {
      fetched_at: fetchedAt(),
      body,
      files,
      diff_text: diffText,
    });

    return { id, body, files: files.map(toChangedFile), diffText };
  }

  async fetchFileContents(files: readonly ChangedFile[]): Promise<string[]> {
    const contents: string[] = [];
    for (const file of files) {
      const rawUrl = file.rawUrl;
      if (!rawUrl) {
        continue;
      }

      const key = rawContentKey(rawUrl);
      const cached = await this.cache.getText(key);
      if (cached !== undefined) {
        contents.push(cached);
        continue;
      }

      try {
        const text = await this.requestLock.runExclusive(async () => {
          const response = await this.fetchFn(rawUrl, {
            headers: this.headers(),
            signal: AbortSignal.timeout(this.timeoutMs),
          });
          return response.status === 200 ? response.text() : undefined;
        });
        if (text !== undefined) {
          contents.push(text);
          await this.cache.setText(key, text);
        }
      } catch (error) {
        this.logger.warn(`Failed to fetch raw file ${rawUrl}: ${describeError(error)}`);
        const fallback = await this.cache.readText(key);
        if (fallback !== undefined) {
          contents.push(fallback);
        }
      }
    }
    return contents;
  }

  async fetchRepoTree(): Promise<RepositoryTree> {
    const cacheName = `repo_tree_${this.repo.replace(/\//g, '_')}`;
    const cached = CACHED_TREE_SCHEMA.safeParse(await this.cache.getJson(cacheName));
    if (cached.success) {
      return { paths: cached.data.paths, defaultBranch: cached.data.default_branch };
    }

    let paths: string[];
    let defaultBranch: string;
    try {
      const meta = await this.getJson(this.repoUrl(), REPO_META_SCHEMA);
      defaultBranch = meta.default_branch ?? 'main';
      const tree = await this.getJson(
        `${this.repoUrl()}/git/trees/${encodeURIComponent(defaultBranch)}?recursive=1`,
        TREE_SCHEMA,
      );
      paths = tree.tree.filter((entry) => entry.type === 'blob').map((entry) => entry.path);
    } catch (error) {
      if (error instanceof GitHubRequestError && error.status === 403) {
        const fallback = CACHED_TREE_SCHEMA.safeParse(await this.cache.readJson(cacheName));
        if (fallback.success) {
          this.logger.warn(`GitHub 403 for repo ${this.repo}; using cached tree`);
          return { paths: fallback.data.paths, defaultBranch: fallback.data.default_branch };
        }
        throw new RateLimitError(`repository ${this.repo}`);
      }
      throw error;
    }

    await this.cache.setJson(cacheName, {
      fetched_at: fetchedAt(),
      paths,
      default_branch: defaultBranch,
    });
    return { paths, defaultBranch };
  }

  async fetchFileAtRef(filePath: string, ref: string): Promise<string> {
    const encodedPath = filePath.split('/').map(encodeURIComponent).join('/');
    const data = await this.getJson(
      `${this.repoUrl()}/contents/${encodedPath}?ref=${encodeURIComponent(ref)}`,
      CONTENTS_SCHEMA,
    );
    const content = data.content ?? '';
    if (data.encoding === 'base64' && content) {
      return Buffer.from(content, 'base64').toString('utf8');
    }
    return content;
  }

  private repoUrl(): string {
    return `${this.apiBaseUrl}/repos/${this.repo}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private request<T>(url: string, read: (response: Response) => Promise<T>): Promise<T> {
    return this.requestLock.runExclusive(async () => {
      if (this.requestDelayMs > 0) {
        await this.sleep(this.requestDelayMs);
      }
      const response = await this.fetchFn(url, {
        headers: this.headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new GitHubRequestError(response.status, url, response.statusText);
      }
      return read(response);
    });
  }

  private async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const payload: unknown = await this.request(url, (response): Promise<unknown> => response.json());
    return schema.parse(payload);
  }

  private parseCachedCase(id: number, value: unknown): ChangeRequestCase | undefined {
    const parsed = CACHED_PR_SCHEMA.safeParse(value);
    if (!parsed.success) {
      return undefined;
    }
    return {
      id,
      body: parsed.data.body ?? '',
      files: parsed.data.files.map(toChangedFile),
      diffText: parsed.data.diff_text ?? '',
    };
  }
}
