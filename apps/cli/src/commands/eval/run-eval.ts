import path from 'node:path';
import {
  type DocPromptSet,
  DocsGenerator,
  type DocumentationSource,
  GitHubCaseSource,
  LlmPatchGenerator,
  PrCache,
  type RunSummary,
  createConsoleLogger,
  createProvider,
  describeError,
  loadDocPromptSet,
  loadEvaluationConfig,
  runPatchEvaluation,
} from '@patchbench/core';

import { loadEnvFromHierarchy } from './env.js';
import { createOutputWriter } from './output-writer.js';
import { formatRunSummary } from './statistics.js';
import { selectTargets } from './targets.js';

export const DRY_RUN_DOCUMENTATION = 'Dry run: documentation generation skipped.';

export interface EvalCommandOptions {
  readonly config?: string;
  readonly repo?: string;
  /** Comma-separated PR numbers, e.g. `2972,2933` */
  readonly prIds?: string;
  readonly numPrs?: number;
  readonly resultsDir?: string;
  readonly target?: string;
  readonly targets?: string;
  readonly docsTarget?: string;
  /** YAML prompt set used for documentation generation */
  readonly prompts?: string;
  readonly workers?: number;
  readonly forceFetch: boolean;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  readonly cwd?: string;
}

/**
 * Parse a comma-separated list of PR numbers. Blank entries are ignored;
 * returns undefined when nothing is left.
 */
export function parsePrIds(raw: string | undefined): number[] | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const ids: number[] = [];
  for (const part of raw.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) {
      continue;
    }
    if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
      throw new Error(`'${trimmed}' is not a PR number`);
    }
    ids.push(Number(trimmed));
  }
  return ids.length > 0 ? ids : undefined;
}

/**
 * Load the configured documentation prompts, resolved against `cwd`.
 * Returns undefined when none are configured.
 */
export async function resolveDocPrompts(
  promptsPath: string | undefined,
  cwd: string,
): Promise<DocPromptSet | undefined> {
  if (!promptsPath) {
    return undefined;
  }
  return loadDocPromptSet(path.resolve(cwd, promptsPath));
}

export async function runEvalCommand(options: EvalCommandOptions): Promise<RunSummary> {
  const cwd = options.cwd ?? process.cwd();
  const { verbose } = options;
  const logger = createConsoleLogger({ verbose });

  await loadEnvFromHierarchy({ cwd, verbose });

  let prIds: number[] | undefined;
  try {
    prIds = parsePrIds(options.prIds);
  } catch (error) {
    logger.warn(
      `Failed to parse --pr-ids (${describeError(error)}); ensure comma-separated integers. Listing recent PRs instead.`,
    );
  }

  const { config, configPath } = await loadEvaluationConfig({
    configPath: options.config,
    cwd,
    env: process.env,
    overrides: {
      repo: options.repo,
      github: { forceFetch: options.forceFetch ? true : undefined },
      cases: { prIds, numPrs: options.numPrs },
      generation: { target: options.target },
      docs: { target: options.docsTarget, prompts: options.prompts },
      execution: { workers: options.workers },
      resultsDir: options.resultsDir,
    },
  });
  if (configPath) {
    logger.debug(`Loaded configuration from: ${configPath}`);
  }

  const prompts = await resolveDocPrompts(config.docs.prompts, cwd);
  if (config.docs.prompts) {
    logger.debug(`Documentation prompts: ${config.docs.prompts}`);
  }

  const selection = await selectTargets({
    cwd,
    explicitTargetsPath: options.targets,
    generationTarget: config.generation.target,
    docsTarget: config.docs.target,
    dryRun: options.dryRun,
    env: process.env,
  });
  console.log(`Using target: ${selection.generation.name} [provider=${selection.generation.kind}]`);
  if (selection.targetsFilePath) {
    logger.debug(`Targets file: ${selection.targetsFilePath}`);
  }

  const resultsDir = path.resolve(cwd, config.resultsDir);
  const cache = new PrCache({
    cacheDir: path.resolve(cwd, config.github.cacheDir),
    forceFetch: config.github.forceFetch,
    logger,
  });
  const caseSource = new GitHubCaseSource({
    repo: config.repo,
    apiBaseUrl: config.github.apiBaseUrl,
    token: config.github.token,
    requestDelayMs: config.github.requestDelayMs,
    timeoutMs: config.github.timeoutMs,
    cache,
    logger,
  });

  const documentation: DocumentationSource = selection.docs
    ? new DocsGenerator({
        provider: createProvider(selection.docs),
        repository: caseSource,
        prompts,
        maxFileChars: config.docs.maxFileChars,
        maxOutputTokens: config.docs.maxOutputTokens,
        logger,
      })
    : { generate: async () => DRY_RUN_DOCUMENTATION };

  const patchGenerator = new LlmPatchGenerator({
    provider: createProvider(selection.generation),
    maxOutputTokens: config.generation.maxOutputTokens,
  });

  const sink = await createOutputWriter(resultsDir);
  console.log(`Repository: ${config.repo}`);
  console.log(`Results directory: ${resultsDir}`);

  const summary = await runPatchEvaluation({
    config,
    caseSource,
    patchGenerator,
    documentation,
    sink,
    logger,
    onProgress: (event) => {
      if (event.status === 'completed' && event.score !== undefined) {
        console.log(`PR ${event.caseId}: similarity ${event.score.toFixed(3)}`);
      } else if (event.status === 'failed' && event.error) {
        logger.warn(event.error);
      } else {
        logger.debug(`PR ${event.caseId}: ${event.status}`);
      }
    },
  });

  if (verbose) {
    for (const result of summary.cases) {
      console.log(`--- PR ${result.caseId} GENERATED PATCH ---`);
      console.log(result.generatedDiff || '<empty>');
      console.log(`--- PR ${result.caseId} ACTUAL PATCH ---`);
      console.log(result.actualDiff || '<empty>');
    }
  }

  console.log(formatRunSummary(summary));
  console.log(`\nResults written to: ${resultsDir}`);
  return summary;
}
