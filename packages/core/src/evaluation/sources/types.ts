import type { ChangeRequestCase, ChangedFile } from '../types.js';

/**
 * Where evaluation cases come from.
 */
export interface CaseSource {
  /** Ids of recent merged change requests that carry at least one non-empty patch. */
  listCaseIds(limit: number): Promise<number[]>;
  fetchCase(id: number): Promise<ChangeRequestCase>;
  /** Raw contents of the changed files; files that cannot be fetched are left out. */
  fetchFileContents(files: readonly ChangedFile[]): Promise<string[]>;
}

export interface RepositoryTree {
  readonly paths: readonly string[];
  readonly defaultBranch: string;
}

/**
 * Read access to the repository snapshot used for documentation.
 */
export interface RepositoryBrowser {
  fetchRepoTree(): Promise<RepositoryTree>;
  fetchFileAtRef(filePath: string, ref: string): Promise<string>;
}

/**
 * Thrown when the host refuses a request with 403 and nothing is cached.
 */
export class RateLimitError extends Error {
  readonly resource: string;

  constructor(resource: string, message?: string) {
    super(message ?? `GitHub returned 403 for ${resource}`);
    this.name = 'RateLimitError';
    this.resource = resource;
  }
}

export class GitHubRequestError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, statusText = '') {
    super(`GitHub request failed with HTTP ${status}${statusText ? ` ${statusText}` : ''}: ${url}`);
    this.name = 'GitHubRequestError';
    this.status = status;
    this.url = url;
  }
}
