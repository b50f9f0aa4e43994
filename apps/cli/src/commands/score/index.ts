import path from 'node:path';
import {
  DEFAULT_PATCH_SIMILARITY_WEIGHTS,
  PatchSimilarityEvaluator,
  createBuiltinSymbolRegistry,
  readTextFile,
} from '@patchbench/core';
import { command, flag, number, option, optional, positional, string } from 'cmd-ts';

export interface ScoreCommandOptions {
  readonly generated: string;
  readonly actual: string;
  readonly json: boolean;
  readonly syntax: string;
  readonly fileWeight?: number;
  readonly functionWeight?: number;
  readonly variableWeight?: number;
  readonly cwd?: string;
}

function formatList(title: string, entries: readonly string[]): string[] {
  if (entries.length === 0) {
    return [];
  }
  return [title, ...entries.map((entry) => `  - ${entry}`)];
}

/**
 * Score two diff files and render the result as text or JSON.
 */
export async function runScoreCommand(options: ScoreCommandOptions): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const extractor = createBuiltinSymbolRegistry().resolve(options.syntax);
  const evaluator = new PatchSimilarityEvaluator({
    extractor,
    weights: {
      file: options.fileWeight ?? DEFAULT_PATCH_SIMILARITY_WEIGHTS.file,
      function: options.functionWeight ?? DEFAULT_PATCH_SIMILARITY_WEIGHTS.function,
      variable: options.variableWeight ?? DEFAULT_PATCH_SIMILARITY_WEIGHTS.variable,
    },
  });

  const generated = await readTextFile(path.resolve(cwd, options.generated));
  const actual = await readTextFile(path.resolve(cwd, options.actual));
  const breakdown = evaluator.compare(generated, actual);
  const result = evaluator.toScore(breakdown);
  const { components } = breakdown;

  if (options.json) {
    return JSON.stringify(
      {
        score: result.score,
        verdict: result.verdict,
        components: {
          file: components.file,
          function: components.function,
          variable: components.variable,
        },
        hits: result.hits,
        misses: result.misses,
      },
      null,
      2,
    );
  }

  return [
    `Similarity: ${result.score.toFixed(3)} [${result.verdict}]`,
    `  file:     ${components.file.toFixed(3)}`,
    `  function: ${components.function.toFixed(3)}`,
    `  variable: ${components.variable.toFixed(3)}`,
    ...formatList('Hits:', result.hits),
    ...formatList('Misses:', result.misses),
  ].join('\n');
}

export const scoreCommand = command({
  name: 'score',
  description: 'Compare a generated diff with the actual diff and print the similarity',
  args: {
    generated: positional({ type: string, displayName: 'generated', description: 'Generated diff file' }),
    actual: positional({ type: string, displayName: 'actual', description: 'Actual (merged) diff file' }),
    json: flag({ long: 'json', description: 'Print machine-readable JSON' }),
    syntax: option({
      type: string,
      long: 'syntax',
      description: 'Symbol extractor: python or typescript (default: python)',
      defaultValue: () => 'python',
    }),
    fileWeight: option({
      type: optional(number),
      long: 'file-weight',
      description: 'Weight of the file component (default: 0.5)',
    }),
    functionWeight: option({
      type: optional(number),
      long: 'function-weight',
      description: 'Weight of the function component (default: 0.35)',
    }),
    variableWeight: option({
      type: optional(number),
      long: 'variable-weight',
      description: 'Weight of the variable component (default: 0.15)',
    }),
  },
  handler: async (args) => {
    console.log(await runScoreCommand(args));
  },
});
