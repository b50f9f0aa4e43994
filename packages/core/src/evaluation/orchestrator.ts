import { Mutex } from 'async-mutex';
import pLimit from 'p-limit';

import { ConfigurationError, type EvaluationConfig, defineEvaluationConfig } from './config.js';
import type { DocumentationSource } from './context/docs-generator.js';
import { type SymbolExtractorRegistry, createBuiltinSymbolRegistry } from './diff/symbol-extractor.js';
import { PatchSimilarityEvaluator } from './evaluators/patch-similarity.js';
import type { PatchGenerator } from './generators/patch-generator.js';
import { type Logger, describeError, silentLogger } from './logger.js';
import { type CaseSource, RateLimitError } from './sources/types.js';
import type { CaseResult, ChangeRequestCase, RunSummary } from './types.js';

type MaybePromise<T> = T | Promise<T>;

/**
 * Receives results as they are produced.
 */
export interface ResultSink {
  writeCase(result: CaseResult): MaybePromise<void>;
  writeSummary(summary: RunSummary): MaybePromise<void>;
}

export interface ProgressEvent {
  readonly caseId: number;
  readonly status: 'running' | 'completed' | 'failed';
  readonly score?: number;
  readonly error?: string;
}

export interface RunPatchEvaluationOptions {
  readonly config: EvaluationConfig;
  readonly caseSource: CaseSource;
  readonly patchGenerator: PatchGenerator;
  readonly documentation: DocumentationSource;
  readonly sink?: ResultSink;
  /** Extractors available to `scoring.syntax` (default: python and typescript) */
  readonly extractors?: SymbolExtractorRegistry;
  readonly now?: () => Date;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
  readonly onProgress?: (event: ProgressEvent) => MaybePromise<void>;
}

export function rateLimitMessage(caseId: number): string {
  return `pr_${caseId}: 403 rate limit exceeded (use GITHUB_TOKEN or rely on cache)`;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function uniqueIds(ids: readonly number[]): number[] {
  return [...new Set(ids)];
}

async function resolveCaseIds(
  config: EvaluationConfig,
  caseSource: CaseSource,
  errors: string[],
): Promise<number[]> {
  const { prIds, numPrs } = config.cases;
  if (prIds && prIds.length > 0) {
    return uniqueIds(prIds).slice(0, numPrs);
  }
  try {
    return uniqueIds(await caseSource.listCaseIds(numPrs)).slice(0, numPrs);
  } catch (error) {
    errors.push(`failed_list_prs: ${describeError(error)}`);
    return [];
  }
}

/**
 * Run the evaluation loop: list or take the configured case ids, build the
 * documentation once, then for each case fetch it, generate a patch and score
 * it against the merged diff.
 *
 * Per-case failures are recorded in `errors` and the case is left out of the
 * mean. Only an invalid configuration aborts the run, before any case starts.
 */
export async function runPatchEvaluation(options: RunPatchEvaluationOptions): Promise<RunSummary> {
  const config = defineEvaluationConfig(options.config);
  const registry = options.extractors ?? createBuiltinSymbolRegistry();
  const extractor = registry.get(config.scoring.syntax);
  if (!extractor) {
    throw new ConfigurationError(
      `Unknown scoring syntax '${config.scoring.syntax}'. Available: ${registry.list().join(', ')}`,
    );
  }
  const evaluator = new PatchSimilarityEvaluator({ weights: config.scoring.weights, extractor });

  const { caseSource, patchGenerator, sink, onProgress } = options;
  const now = options.now ?? (() => new Date());
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? silentLogger;

  const startedAt = now().getTime();
  const errors: string[] = [];

  const caseIds = await resolveCaseIds(config, caseSource, errors);
  logger.debug(`Evaluating ${caseIds.length} case(s) from ${config.repo}`);

  let documentation: string;
  try {
    documentation = await options.documentation.generate();
  } catch (error) {
    logger.warn(`Documentation generation failed: ${describeError(error)}`);
    documentation = '';
  }

  const fail = async (caseId: number, message: string): Promise<undefined> => {
    errors.push(message);
    if (onProgress) {
      await onProgress({ caseId, status: 'failed', error: message });
    }
    return undefined;
  };

  // Workers share one model client; generation requests go out one at a time.
  const generationLock = new Mutex();

  const runCase = async (caseId: number): Promise<CaseResult | undefined> => {
    if (onProgress) {
      await onProgress({ caseId, status: 'running' });
    }

    let changeRequest: ChangeRequestCase;
    try {
      changeRequest = await caseSource.fetchCase(caseId);
    } catch (error) {
      if (error instanceof RateLimitError) {
        return fail(caseId, rateLimitMessage(caseId));
      }
      return fail(caseId, `pr_${caseId}: ${describeError(error)}`);
    }
    if (config.execution.casePauseMs > 0) {
      await sleep(config.execution.casePauseMs);
    }

    let result: CaseResult;
    try {
      const generatedDiff = await generationLock.runExclusive(() =>
        patchGenerator.generate({
          documentation,
          problemStatement: changeRequest.body,
          caseId,
        }),
      );
      const breakdown = evaluator.compare(generatedDiff, changeRequest.diffText);
      const evaluation = evaluator.toScore(breakdown);
      result = {
        caseId,
        score: evaluation.score,
        verdict: evaluation.verdict,
        components: breakdown.components,
        hits: evaluation.hits,
        misses: evaluation.misses,
        documentation,
        generatedDiff,
        actualDiff: changeRequest.diffText,
        timestamp: now().toISOString(),
      };
    } catch (error) {
      return fail(caseId, `pr_${caseId}: ${describeError(error)}`);
    }

    if (sink) {
      try {
        await sink.writeCase(result);
      } catch (error) {
        logger.warn(`Failed to write results for PR ${caseId}: ${describeError(error)}`);
      }
    }
    if (onProgress) {
      await onProgress({ caseId, status: 'completed', score: result.score });
    }
    return result;
  };

  const limit = pLimit(config.execution.workers);
  const settled = await Promise.allSettled(caseIds.map((caseId) => limit(() => runCase(caseId))));

  const cases: CaseResult[] = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      if (outcome.value) {
        cases.push(outcome.value);
      }
    } else {
      errors.push(`pr_${caseIds[index]}: ${describeError(outcome.reason)}`);
    }
  });

  const scores = cases.map((result) => result.score);
  const total = scores.reduce((sum, value) => sum + value, 0);
  const summary: RunSummary = {
    scores,
    meanScore: total / Math.max(scores.length, 1),
    durationMs: now().getTime() - startedAt,
    errors,
    cases,
  };

  if (sink) {
    await sink.writeSummary(summary);
  }
  return summary;
}
