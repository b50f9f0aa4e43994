import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { CaseResult, ResultSink } from '@patchbench/core';
import { Mutex } from 'async-mutex';

export interface JsonlCaseRecord {
  readonly pr_number: number;
  readonly score: number;
  readonly verdict: string;
  readonly components: {
    readonly file: number;
    readonly function: number;
    readonly variable: number;
  };
  readonly hits: readonly string[];
  readonly misses: readonly string[];
  readonly timestamp: string;
}

export function toJsonlRecord(result: CaseResult): JsonlCaseRecord {
  return {
    pr_number: result.caseId,
    score: result.score,
    verdict: result.verdict,
    components: {
      file: result.components.file,
      function: result.components.function,
      variable: result.components.variable,
    },
    hits: result.hits,
    misses: result.misses,
    timestamp: result.timestamp,
  };
}

/**
 * Streams one line per scored case to `results.jsonl`. Cases may finish on
 * several workers at once, so appends go through a mutex. The stream is
 * closed when the run summary arrives.
 */
export class JsonlWriter implements ResultSink {
  private readonly stream: ReturnType<typeof createWriteStream>;
  private readonly mutex = new Mutex();
  private closed = false;
  private failure: Error | undefined;

  private constructor(stream: ReturnType<typeof createWriteStream>) {
    this.stream = stream;
    this.stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  static async open(filePath: string): Promise<JsonlWriter> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const stream = createWriteStream(filePath, { flags: 'w', encoding: 'utf8' });
    // Rejects with the open error (e.g. the path is a directory)
    await once(stream, 'open');
    return new JsonlWriter(stream);
  }

  async writeCase(result: CaseResult): Promise<void> {
    await this.append(toJsonlRecord(result));
  }

  async writeSummary(): Promise<void> {
    await this.close();
  }

  async append(record: JsonlCaseRecord): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.closed) {
        throw new Error('Cannot write to closed JSONL writer');
      }
      if (this.failure) {
        throw this.failure;
      }
      if (!this.stream.write(`${JSON.stringify(record)}\n`)) {
        await once(this.stream, 'drain');
      }
    });
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.closed) {
        return;
      }
      this.closed = true;
      this.stream.end();
      await finished(this.stream);
    });
  }
}
