import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { PrCache } from '../../../src/evaluation/cache/pr-cache.js';
import { defineEvaluationConfig } from '../../../src/evaluation/config.js';
import type { Logger } from '../../../src/evaluation/logger.js';
import { runPatchEvaluation } from '../../../src/evaluation/orchestrator.js';
import { type FetchLike, GitHubCaseSource } from '../../../src/evaluation/sources/github.js';
import { GitHubRequestError, RateLimitError } from '../../../src/evaluation/sources/types.js';

const API = 'https://api.test';
const REPO_URL = `${API}/repos/acme/widgets`;

type Route = () => Response;

interface RecordedCall {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

function json(data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

function forbidden(): Response {
  return new Response('rate limited', { status: 403, statusText: 'Forbidden' });
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((entry) => typeof entry === 'string')
  );
}

function fakeFetch(routes: Readonly<Record<string, Route>>): {
  fetchFn: FetchLike;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchLike = async (url, init) => {
    const headers = init?.headers;
    calls.push({ url, headers: isStringRecord(headers) ? headers : {} });
    const route = routes[url];
    if (!route) {
      return new Response('missing', { status: 404, statusText: 'Not Found' });
    }
    return route();
  };
  return { fetchFn, calls };
}

const failingFetch: FetchLike = async (url) => {
  throw new Error(`unexpected request to ${url}`);
};

function recordingLogger(): Logger & { readonly warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: () => {},
    warn: (message) => warnings.push(message),
    debug: () => {},
  };
}

function createCache(options: { forceFetch?: boolean; cacheDir?: string } = {}): PrCache {
  return new PrCache({
    cacheDir: options.cacheDir ?? mkdtempSync(path.join(tmpdir(), 'patchbench-github-test-')),
    forceFetch: options.forceFetch,
  });
}

function createSource(
  fetchFn: FetchLike,
  cache: PrCache,
  extra: { logger?: Logger; sleep?: (ms: number) => Promise<void>; requestDelayMs?: number } = {},
): GitHubCaseSource {
  return new GitHubCaseSource({
    repo: 'acme/widgets',
    apiBaseUrl: `${API}/`,
    token: 'test-secret',
    requestDelayMs: extra.requestDelayMs ?? 0,
    cache,
    fetchFn,
    sleep: extra.sleep,
    logger: extra.logger,
  });
}

const PR_7_DETAIL = {
  body: 'Fix crash on empty input',
  merged_at: '2026-01-02T00:00:00Z',
  diff_url: 'https://github.test/acme/widgets/pull/7.diff',
};

const PR_7_FILES = [
  {
    filename: 'app.py',
    status: 'modified',
    additions: 1,
    deletions: 1,
    patch: '@@ -1 +1 @@\n-x = 1\n+x = 2',
    raw_url: 'https://raw.test/app.py',
  },
];

const PR_7_ROUTES: Record<string, Route> = {
  [`${REPO_URL}/pulls/7`]: () => json(PR_7_DETAIL),
  [`${REPO_URL}/pulls/7/files`]: () => json(PR_7_FILES),
  'https://github.test/acme/widgets/pull/7.diff': () => new Response('DIFF TEXT', { status: 200 }),
};

describe('GitHubCaseSource.listCaseIds', () => {
  const routes: Record<string, Route> = {
    [`${REPO_URL}/pulls?state=closed&per_page=30`]: () =>
      json([
        { number: 1, merged_at: '2026-01-01T00:00:00Z' },
        { number: 2, merged_at: null },
        { number: 3, merged_at: '2026-01-01T00:00:00Z' },
        { number: 4, merged_at: '2026-01-01T00:00:00Z' },
        { number: 5, merged_at: '2026-01-01T00:00:00Z' },
      ]),
    [`${REPO_URL}/pulls/1/files`]: () => json([{ filename: 'a.py', patch: '@@ -1 +1 @@\n+x = 1' }]),
    [`${REPO_URL}/pulls/2`]: () => json({ merged_at: null }),
    [`${REPO_URL}/pulls/3/files`]: () => json([{ filename: 'b.bin', patch: '' }]),
    [`${REPO_URL}/pulls/4/files`]: () => json([{ filename: 'c.py', patch: '@@ -2 +2 @@\n+y = 2' }]),
  };

  it('keeps merged pull requests that carry a patch', async () => {
    const { fetchFn, calls } = fakeFetch(routes);
    const source = createSource(fetchFn, createCache());

    const ids = await source.listCaseIds(2);

    expect(ids).toEqual([1, 4]);
    expect(calls.map((call) => call.url)).toEqual([
      `${REPO_URL}/pulls?state=closed&per_page=30`,
      `${REPO_URL}/pulls/1/files`,
      `${REPO_URL}/pulls/2`,
      `${REPO_URL}/pulls/3/files`,
      `${REPO_URL}/pulls/4/files`,
    ]);
    expect(calls[0]?.headers).toEqual({
      Accept: 'application/vnd.github+json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('answers from the cache on the next call', async () => {
    const cache = createCache();
    const { fetchFn } = fakeFetch(routes);
    await createSource(fetchFn, cache).listCaseIds(2);

    const ids = await createSource(failingFetch, cache).listCaseIds(2);

    expect(ids).toEqual([1, 4]);
  });
});

describe('GitHubCaseSource.fetchCase', () => {
  it('combines detail, files and diff text', async () => {
    const { fetchFn } = fakeFetch(PR_7_ROUTES);
    const source = createSource(fetchFn, createCache());

    const change = await source.fetchCase(7);

    expect(change).toEqual({
      id: 7,
      body: 'Fix crash on empty input',
      diffText: 'DIFF TEXT',
      files: [
        {
          filename: 'app.py',
          status: 'modified',
          additions: 1,
          deletions: 1,
          patch: '@@ -1 +1 @@\n-x = 1\n+x = 2',
          rawUrl: 'https://raw.test/app.py',
        },
      ],
    });
  });

  it('pauses before each API request', async () => {
    const pauses: number[] = [];
    const { fetchFn } = fakeFetch(PR_7_ROUTES);
    const source = createSource(fetchFn, createCache(), {
      requestDelayMs: 250,
      sleep: async (ms) => {
        pauses.push(ms);
      },
    });

    await source.fetchCase(7);

    expect(pauses).toEqual([250, 250, 250]);
  });

  it('falls back to cached data on 403 even when forcing a fetch', async () => {
    const cacheDir = mkdtempSync(path.join(tmpdir(), 'patchbench-github-test-'));
    await createSource(fakeFetch(PR_7_ROUTES).fetchFn, createCache({ cacheDir })).fetchCase(7);
    const logger = recordingLogger();
    const { fetchFn } = fakeFetch({ [`${REPO_URL}/pulls/7`]: forbidden });

    const change = await createSource(fetchFn, createCache({ cacheDir, forceFetch: true }), {
      logger,
    }).fetchCase(7);

    expect(change.diffText).toBe('DIFF TEXT');
    expect(logger.warnings).toEqual(['GitHub 403 for PR 7; using cached PR data']);
  });

  it('raises a rate-limit error on 403 without a cached entry', async () => {
    const { fetchFn } = fakeFetch({ [`${REPO_URL}/pulls/8`]: forbidden });
    const source = createSource(fetchFn, createCache());

    const error = await source.fetchCase(8).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toHaveProperty('message', 'GitHub returned 403 for pull request 8');
  });

  it('propagates other HTTP failures', async () => {
    const { fetchFn } = fakeFetch({
      [`${REPO_URL}/pulls/9`]: () =>
        new Response('boom', { status: 500, statusText: 'Internal Server Error' }),
    });
    const source = createSource(fetchFn, createCache());

    const error = await source.fetchCase(9).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GitHubRequestError);
    expect(error).toHaveProperty(
      'message',
      `GitHub request failed with HTTP 500 Internal Server Error: ${REPO_URL}/pulls/9`,
    );
  });
});

describe('GitHubCaseSource.fetchFileContents', () => {
  it('downloads raw files, skipping missing ones, and caches them', async () => {
    const cache = createCache();
    const pauses: number[] = [];
    const { fetchFn } = fakeFetch({
      'https://raw.test/a.py': () => new Response('print(1)\n', { status: 200 }),
    });
    const files = [
      { filename: 'a.py', rawUrl: 'https://raw.test/a.py' },
      { filename: 'b.py' },
      { filename: 'c.py', rawUrl: 'https://raw.test/c.py' },
    ];

    const contents = await createSource(fetchFn, cache, {
      requestDelayMs: 250,
      sleep: async (ms) => {
        pauses.push(ms);
      },
    }).fetchFileContents(files);

    expect(contents).toEqual(['print(1)\n']);
    expect(pauses).toEqual([]);

    const logger = recordingLogger();
    const cached = await createSource(failingFetch, cache, { logger }).fetchFileContents(files);
    expect(cached).toEqual(['print(1)\n']);
    expect(logger.warnings).toEqual([
      'Failed to fetch raw file https://raw.test/c.py: unexpected request to https://raw.test/c.py',
    ]);
  });
});

describe('GitHubCaseSource repository access', () => {
  it('lists blob paths on the default branch', async () => {
    const { fetchFn } = fakeFetch({
      [REPO_URL]: () => json({ default_branch: 'develop' }),
      [`${REPO_URL}/git/trees/develop?recursive=1`]: () =>
        json({
          tree: [
            { path: 'src', type: 'tree' },
            { path: 'src/app.py', type: 'blob' },
            { path: 'README.md', type: 'blob' },
          ],
        }),
    });

    const tree = await createSource(fetchFn, createCache()).fetchRepoTree();

    expect(tree).toEqual({ paths: ['src/app.py', 'README.md'], defaultBranch: 'develop' });
  });

  it('raises a rate-limit error when the tree is refused and not cached', async () => {
    const { fetchFn } = fakeFetch({ [REPO_URL]: forbidden });

    await expect(createSource(fetchFn, createCache()).fetchRepoTree()).rejects.toThrow(
      'GitHub returned 403 for repository acme/widgets',
    );
  });

  it('decodes base64 file contents', async () => {
    const { fetchFn } = fakeFetch({
      [`${REPO_URL}/contents/src/my%20app.py?ref=develop`]: () =>
        json({ encoding: 'base64', content: Buffer.from('hello').toString('base64') }),
    });

    const content = await createSource(fetchFn, createCache()).fetchFileAtRef(
      'src/my app.py',
      'develop',
    );

    expect(content).toBe('hello');
  });
});

describe('GitHubCaseSource request pacing', () => {
  function pullRoutes(ids: readonly number[]): Record<string, Route> {
    const routes: Record<string, Route> = {};
    for (const id of ids) {
      routes[`${REPO_URL}/pulls/${id}`] = () =>
        json({ body: `Problem ${id}`, diff_url: `https://github.test/pull/${id}.diff` });
      routes[`${REPO_URL}/pulls/${id}/files`] = () => json([]);
      routes[`https://github.test/pull/${id}.diff`] = () =>
        new Response('--- a/a.py\n+++ b/a.py\n@@ -1 +1 @@\n-x = 1\n+x = 2', { status: 200 });
    }
    return routes;
  }

  function trackingFetch(routes: Readonly<Record<string, Route>>): {
    fetchFn: FetchLike;
    peak: () => number;
  } {
    const { fetchFn: inner } = fakeFetch(routes);
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchFn: FetchLike = async (url, init) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      try {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return await inner(url, init);
      } finally {
        inFlight -= 1;
      }
    };
    return { fetchFn, peak: () => maxInFlight };
  }

  it('keeps one request in flight while several workers share the source', async () => {
    const tracking = trackingFetch(pullRoutes([1, 2, 3, 4]));
    const source = createSource(tracking.fetchFn, createCache());

    const summary = await runPatchEvaluation({
      config: defineEvaluationConfig({
        cases: { prIds: [1, 2, 3, 4], numPrs: 4 },
        execution: { workers: 4, casePauseMs: 0 },
      }),
      caseSource: source,
      patchGenerator: { generate: async () => '' },
      documentation: { generate: async () => '' },
    });

    expect(summary.errors).toEqual([]);
    expect(summary.scores).toEqual([0, 0, 0, 0]);
    expect(tracking.peak()).toBe(1);
  });

  it('waits out the delay before each request in turn', async () => {
    const events: string[] = [];
    const { fetchFn: inner } = fakeFetch(pullRoutes([1, 2]));
    const fetchFn: FetchLike = async (url, init) => {
      events.push(`fetch ${url.replace(`${REPO_URL}/`, '')}`);
      return inner(url, init);
    };
    const source = createSource(fetchFn, createCache(), {
      requestDelayMs: 250,
      sleep: async () => {
        events.push('sleep');
      },
    });

    await Promise.all([source.fetchCase(1), source.fetchCase(2)]);

    expect(events).toHaveLength(12);
    for (let index = 0; index < events.length; index += 2) {
      expect(events[index]).toBe('sleep');
      expect(events[index + 1]).toMatch(/^fetch /);
    }
  });
});
