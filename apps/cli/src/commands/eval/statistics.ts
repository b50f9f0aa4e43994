import type { CaseResult, RunSummary } from '@patchbench/core';

export interface HistogramBin {
  readonly range: readonly [number, number];
  count: number;
}

export interface ScoreStatistics {
  readonly total: number;
  readonly mean: number;
  readonly median: number;
  readonly min: number;
  readonly max: number;
  readonly standardDeviation?: number;
  readonly histogram: readonly HistogramBin[];
}

const HISTOGRAM_BREAKPOINTS = [0, 0.2, 0.4, 0.6, 0.8, 1];

function computeMean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
}

function computeMedian(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

function computeStandardDeviation(values: readonly number[]): number | undefined {
  if (values.length < 2) {
    return undefined;
  }
  const mean = computeMean(values);
  const variance =
    values.reduce((acc, value) => acc + (value - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Five bins of width 0.2; the last one is closed so a perfect 1.0 lands in it.
 */
export function buildHistogram(values: readonly number[]): HistogramBin[] {
  const bins: HistogramBin[] = [];
  for (let index = 0; index < HISTOGRAM_BREAKPOINTS.length - 1; index += 1) {
    bins.push({ range: [HISTOGRAM_BREAKPOINTS[index], HISTOGRAM_BREAKPOINTS[index + 1]], count: 0 });
  }

  for (const value of values) {
    const bin = bins.find(({ range: [start, end] }, index) =>
      index === bins.length - 1 ? value >= start && value <= end : value >= start && value < end,
    );
    if (bin) {
      bin.count += 1;
    }
  }

  return bins;
}

export function calculateScoreStatistics(scores: readonly number[]): ScoreStatistics {
  return {
    total: scores.length,
    mean: computeMean(scores),
    median: computeMedian(scores),
    min: scores.length > 0 ? Math.min(...scores) : 0,
    max: scores.length > 0 ? Math.max(...scores) : 0,
    standardDeviation: computeStandardDeviation(scores),
    histogram: buildHistogram(scores),
  };
}

function formatScore(value: number): string {
  return value.toFixed(3);
}

function formatCaseLine(result: CaseResult): string {
  const { file, function: fn, variable } = result.components;
  return `  PR ${result.caseId}: ${formatScore(result.score)} [${result.verdict}] (file ${formatScore(file)}, function ${formatScore(fn)}, variable ${formatScore(variable)})`;
}

export function formatRunSummary(summary: RunSummary): string {
  const stats = calculateScoreStatistics(summary.scores);
  const lines: string[] = [];
  lines.push('');
  lines.push('==================================================');
  lines.push('PATCH SIMILARITY SUMMARY');
  lines.push('==================================================');

  if (stats.total === 0) {
    lines.push('No cases were scored');
  } else {
    lines.push(`Scored cases: ${stats.total}`);
    lines.push(`Mean score: ${formatScore(stats.mean)}`);
    lines.push(`Median score: ${formatScore(stats.median)}`);
    lines.push(`Min score: ${formatScore(stats.min)}`);
    lines.push(`Max score: ${formatScore(stats.max)}`);
    if (typeof stats.standardDeviation === 'number') {
      lines.push(`Std deviation: ${formatScore(stats.standardDeviation)}`);
    }

    lines.push('');
    lines.push('Score distribution:');
    for (const bin of stats.histogram) {
      const [start, end] = bin.range;
      lines.push(`  ${start.toFixed(1)}-${end.toFixed(1)}: ${bin.count}`);
    }

    lines.push('');
    lines.push('Cases:');
    for (const result of summary.cases) {
      lines.push(formatCaseLine(result));
    }
  }

  if (summary.errors.length > 0) {
    lines.push('');
    lines.push(`Errors (${summary.errors.length}):`);
    for (const error of summary.errors) {
      lines.push(`  - ${error}`);
    }
  }

  lines.push(`Duration: ${(summary.durationMs / 1000).toFixed(1)}s`);
  return lines.join('\n');
}
