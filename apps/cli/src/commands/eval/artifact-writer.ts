import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CaseResult, ResultSink, RunSummary } from '@patchbench/core';

export interface CaseArtifactSummary {
  readonly pr_number: number;
  readonly similarity: number;
  readonly doc_path: string;
  readonly generated_patch_path: string;
  readonly actual_patch_path: string;
  readonly components: {
    readonly file: number;
    readonly function: number;
    readonly variable: number;
  };
}

export interface RunMetrics {
  readonly public: { readonly per_pr_similarity: readonly number[] };
  readonly private: { readonly errors: readonly string[] };
  readonly combined_score: number;
  /** Seconds */
  readonly runtime: number;
}

export function buildRunMetrics(summary: RunSummary): RunMetrics {
  return {
    public: { per_pr_similarity: summary.scores },
    private: { errors: summary.errors },
    combined_score: summary.meanScore,
    runtime: summary.durationMs / 1000,
  };
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}

/**
 * Writes per-case artifacts under `pr_<id>/` and the run-level
 * `metrics.json` and `correct.json` into the results directory.
 */
export class ArtifactResultSink implements ResultSink {
  constructor(private readonly resultsDir: string) {}

  async writeCase(result: CaseResult): Promise<void> {
    const caseDir = path.join(this.resultsDir, `pr_${result.caseId}`);
    await mkdir(caseDir, { recursive: true });

    const docPath = path.join(caseDir, 'doc.txt');
    const generatedPath = path.join(caseDir, 'gen_patch.diff');
    const actualPath = path.join(caseDir, 'actual_patch.diff');

    await writeFile(docPath, result.documentation, 'utf8');
    await writeFile(generatedPath, result.generatedDiff, 'utf8');
    await writeFile(actualPath, result.actualDiff, 'utf8');

    const summary: CaseArtifactSummary = {
      pr_number: result.caseId,
      similarity: result.score,
      doc_path: docPath,
      generated_patch_path: generatedPath,
      actual_patch_path: actualPath,
      components: {
        file: result.components.file,
        function: result.components.function,
        variable: result.components.variable,
      },
    };
    await writeJson(path.join(caseDir, 'summary.json'), summary);
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    await mkdir(this.resultsDir, { recursive: true });
    await writeJson(path.join(this.resultsDir, 'metrics.json'), buildRunMetrics(summary));
    await writeJson(path.join(this.resultsDir, 'correct.json'), {
      correct: true,
      error: summary.errors.join('; '),
    });
  }
}
