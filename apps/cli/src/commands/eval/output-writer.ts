import path from 'node:path';
import type { CaseResult, ResultSink, RunSummary } from '@patchbench/core';

import { ArtifactResultSink } from './artifact-writer.js';
import { JsonlWriter } from './jsonl-writer.js';

export const RESULTS_JSONL_FILE = 'results.jsonl';

/**
 * Forwards every call to each sink in order.
 */
export class CompositeResultSink implements ResultSink {
  constructor(private readonly sinks: readonly ResultSink[]) {}

  async writeCase(result: CaseResult): Promise<void> {
    for (const sink of this.sinks) {
      await sink.writeCase(result);
    }
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    for (const sink of this.sinks) {
      await sink.writeSummary(summary);
    }
  }
}

/**
 * Artifact files plus `results.jsonl` under `resultsDir`.
 */
export async function createOutputWriter(resultsDir: string): Promise<ResultSink> {
  const jsonl = await JsonlWriter.open(path.join(resultsDir, RESULTS_JSONL_FILE));
  return new CompositeResultSink([new ArtifactResultSink(resultsDir), jsonl]);
}
