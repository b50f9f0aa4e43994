/**
 * Run configuration.
 *
 * A single {@link EvaluationConfig} is built once, from an optional
 * `patchbench.yaml`, the environment and explicit overrides (later layers
 * win), and passed to the orchestrator. Nothing below reads ambient state.
 *
 * @example
 * ```yaml
 * # patchbench.yaml
 * repo: pallets/click
 * cases:
 *   pr_ids: [2972, 2933]
 * scoring:
 *   weights: { file: 0.5, function: 0.35, variable: 0.15 }
 * ```
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

import { DEFAULT_PR_CACHE_DIR } from './cache/pr-cache.js';
import { toCamelCaseDeep } from './case-conversion.js';
import { DEFAULT_PATCH_SIMILARITY_WEIGHTS } from './evaluators/patch-similarity.js';
import { fileExists, findFirstExisting } from './file-utils.js';
import type { EnvLookup } from './providers/types.js';
import {
  DEFAULT_GITHUB_API,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './sources/github.js';

export const CONFIG_FILE_NAMES = ['patchbench.yaml', 'patchbench.yml'] as const;

const WEIGHTS_SCHEMA = z.object({
  file: z.number().min(0),
  function: z.number().min(0),
  variable: z.number().min(0),
});

export const EvaluationConfigSchema = z.object({
  /** Repository in `owner/name` form */
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "repo must look like 'owner/name'")
    .default('pallets/click'),

  github: z
    .object({
      apiBaseUrl: z.string().url().default(DEFAULT_GITHUB_API),
      token: z.string().min(1).optional(),
      /** Pause before every API request */
      requestDelayMs: z.number().min(0).default(DEFAULT_REQUEST_DELAY_MS),
      timeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
      cacheDir: z.string().min(1).default(DEFAULT_PR_CACHE_DIR),
      /** Ignore cached entries on read */
      forceFetch: z.boolean().default(false),
    })
    .default({}),

  cases: z
    .object({
      /** Explicit case ids; when unset the most recent merged PRs are listed */
      prIds: z.array(z.number().int().positive()).optional(),
      numPrs: z.number().int().positive().default(3),
    })
    .default({}),

  scoring: z
    .object({
      weights: WEIGHTS_SCHEMA.default(DEFAULT_PATCH_SIMILARITY_WEIGHTS),
      /** Symbol extractor name */
      syntax: z.string().min(1).default('python'),
    })
    .default({}),

  generation: z
    .object({
      /** Target name in targets.yaml */
      target: z.string().min(1).default('default'),
      maxOutputTokens: z.number().int().positive().default(2048),
    })
    .default({}),

  docs: z
    .object({
      /** Defaults to the generation target */
      target: z.string().min(1).optional(),
      /** YAML prompt set for documentation generation; the built-in prompts when unset */
      prompts: z.string().min(1).optional(),
      maxFileChars: z.number().int().positive().default(8000),
      maxOutputTokens: z.number().int().positive().default(4096),
    })
    .default({}),

  execution: z
    .object({
      workers: z.number().int().min(1).max(50).default(1),
      /** Pause after each successful case fetch */
      casePauseMs: z.number().min(0).default(1000),
    })
    .default({}),

  resultsDir: z.string().min(1).default('results'),
});

export type EvaluationConfig = z.output<typeof EvaluationConfigSchema>;
export type EvaluationConfigInput = z.input<typeof EvaluationConfigSchema>;

export type EvaluationConfigOverrides = {
  readonly [K in keyof EvaluationConfig]?: EvaluationConfig[K] extends string
    ? string
    : Partial<EvaluationConfig[K]>;
};

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a configuration object and fill in defaults.
 */
export function defineEvaluationConfig(input: unknown = {}): EvaluationConfig {
  const result = EvaluationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeLayers(layers: readonly object[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) {
        continue;
      }
      const existing = merged[key];
      merged[key] =
        isPlainRecord(value) && isPlainRecord(existing) ? mergeLayers([existing, value]) : value;
    }
  }
  return merged;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Configuration layer taken from environment variables.
 */
export function configFromEnv(env: EnvLookup): Record<string, unknown> {
  const github: Record<string, unknown> = {
    apiBaseUrl: nonEmpty(env.GITHUB_API),
    token: nonEmpty(env.GITHUB_TOKEN),
    cacheDir: nonEmpty(env.PR_CACHE_DIR),
  };

  const force = env.FORCE_PR_FETCH;
  if (force !== undefined) {
    github.forceFetch = force === '1' || force === 'true' || force === 'True';
  }

  const delay = nonEmpty(env.GH_REQUEST_DELAY);
  if (delay !== undefined) {
    const seconds = Number(delay);
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new ConfigurationError(
        `GH_REQUEST_DELAY must be a non-negative number of seconds, got '${delay}'`,
      );
    }
    github.requestDelayMs = Math.round(seconds * 1000);
  }

  return { repo: nonEmpty(env.GITHUB_REPO), github };
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const raw = await readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const converted = toCamelCaseDeep(parsed);
  if (!isPlainRecord(converted)) {
    throw new ConfigurationError(`${filePath} must contain a YAML mapping`);
  }
  return converted;
}

export interface LoadEvaluationConfigOptions {
  /** Explicit config file; must exist. Otherwise `patchbench.yaml` is looked up in `cwd`. */
  readonly configPath?: string;
  readonly cwd?: string;
  readonly env?: EnvLookup;
  readonly overrides?: EvaluationConfigOverrides;
}

export interface LoadedEvaluationConfig {
  readonly config: EvaluationConfig;
  /** Absolute path of the file that was read, if any */
  readonly configPath?: string;
}

export async function loadEvaluationConfig(
  options: LoadEvaluationConfigOptions = {},
): Promise<LoadedEvaluationConfig> {
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | undefined;
  if (options.configPath) {
    configPath = path.resolve(cwd, options.configPath);
    if (!(await fileExists(configPath))) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = await findFirstExisting(CONFIG_FILE_NAMES, cwd);
  }

  const fileLayer = configPath ? await readConfigFile(configPath) : {};
  const envLayer = configFromEnv(options.env ?? {});
  const merged = mergeLayers([fileLayer, envLayer, options.overrides ?? {}]);

  return { config: defineEvaluationConfig(merged), configPath };
}
