import { type HunkMap, parseFileHunks } from '../diff/hunk-parser.js';
import {
  type SymbolExtractor,
  collectFromFilesMap,
  pythonExtractor,
} from '../diff/symbol-extractor.js';
import type { ScoreComponents } from '../types.js';
import {
  clampScore,
  jaccard,
  scoreToVerdict,
  sortedDifference,
  sortedIntersection,
} from './scoring.js';
import type { EvaluationContext, EvaluationScore, Evaluator } from './types.js';

/**
 * Weights for the file, function and variable signals. File agreement
 * dominates because touching the same artifact is the strongest signal.
 */
export interface PatchSimilarityWeights {
  readonly file: number;
  readonly function: number;
  readonly variable: number;
}

export const DEFAULT_PATCH_SIMILARITY_WEIGHTS: PatchSimilarityWeights = {
  file: 0.5,
  function: 0.35,
  variable: 0.15,
};

export interface PatchSimilarityOptions {
  readonly weights?: PatchSimilarityWeights;
  readonly extractor?: SymbolExtractor;
}

export interface PatchSimilarityBreakdown {
  readonly components: ScoreComponents;
  /** Paths present on both sides with identical hunk sequences */
  readonly matchedPaths: readonly string[];
  /** Paths touched by either side that did not match */
  readonly unmatchedPaths: readonly string[];
  readonly sharedFunctions: readonly string[];
  readonly missingFunctions: readonly string[];
  readonly extraFunctions: readonly string[];
  readonly sharedVariables: readonly string[];
  readonly missingVariables: readonly string[];
  readonly extraVariables: readonly string[];
  /** True when neither side had a recognizable file section and raw text was compared */
  readonly usedTextFallback: boolean;
}

/**
 * Throws when a weight is negative or not finite.
 */
export function assertValidWeights(weights: PatchSimilarityWeights): void {
  for (const [name, value] of Object.entries(weights)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new Error(`Patch similarity weight '${name}' must be a non-negative number`);
    }
  }
}

function hunksEqual(left: readonly string[], right: readonly string[]): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((hunk, index) => hunk === right[index]);
}

function compareFiles(
  generated: HunkMap,
  actual: HunkMap,
): { score: number; matched: string[]; unmatched: string[] } {
  const allPaths = new Set<string>([...generated.keys(), ...actual.keys()]);
  if (allPaths.size === 0) {
    return { score: 0, matched: [], unmatched: [] };
  }

  const matched: string[] = [];
  const unmatched: string[] = [];
  for (const filePath of allPaths) {
    const generatedHunks = generated.get(filePath) ?? [];
    const actualHunks = actual.get(filePath) ?? [];
    if (
      generatedHunks.length > 0 &&
      actualHunks.length > 0 &&
      hunksEqual(generatedHunks, actualHunks)
    ) {
      matched.push(filePath);
    } else {
      unmatched.push(filePath);
    }
  }

  return {
    score: matched.length / allPaths.size,
    matched: matched.sort(),
    unmatched: unmatched.sort(),
  };
}

const EMPTY_BREAKDOWN: PatchSimilarityBreakdown = {
  components: { file: 0, function: 0, variable: 0, combined: 0 },
  matchedPaths: [],
  unmatchedPaths: [],
  sharedFunctions: [],
  missingFunctions: [],
  extraFunctions: [],
  sharedVariables: [],
  missingVariables: [],
  extraVariables: [],
  usedTextFallback: false,
};

/**
 * Compare a generated unified diff against the actual merged diff.
 *
 * Combines three signals: the fraction of touched paths whose hunk sequences
 * are identical, and Jaccard overlap of the function/class names and of the
 * assigned variable names found in the hunks. An empty input on either side
 * scores 0.
 * The function is pure: it performs no I/O and reads no ambient state.
 */
export function scorePatchSimilarity(
  generated: string,
  actual: string,
  options: PatchSimilarityOptions = {},
): PatchSimilarityBreakdown {
  const weights = options.weights ?? DEFAULT_PATCH_SIMILARITY_WEIGHTS;
  const extractor = options.extractor ?? pythonExtractor;

  const generatedText = generated.trim();
  const actualText = actual.trim();
  // An empty side carries no signal
  if (!generatedText || !actualText) {
    return EMPTY_BREAKDOWN;
  }

  const generatedFiles = parseFileHunks(generatedText);
  const actualFiles = parseFileHunks(actualText);

  const usedTextFallback = generatedFiles.size === 0 && actualFiles.size === 0;
  let fileScore: number;
  let matchedPaths: string[] = [];
  let unmatchedPaths: string[] = [];
  if (usedTextFallback) {
    fileScore = generatedText.length > 0 && generatedText === actualText ? 1 : 0;
  } else {
    const comparison = compareFiles(generatedFiles, actualFiles);
    fileScore = comparison.score;
    matchedPaths = comparison.matched;
    unmatchedPaths = comparison.unmatched;
  }

  const generatedSymbols = collectFromFilesMap(generatedFiles, extractor);
  const actualSymbols = collectFromFilesMap(actualFiles, extractor);

  const functionScore = jaccard(generatedSymbols.functions, actualSymbols.functions);
  const variableScore = jaccard(generatedSymbols.variables, actualSymbols.variables);

  const combined = clampScore(
    weights.file * fileScore + weights.function * functionScore + weights.variable * variableScore,
  );

  return {
    components: {
      file: fileScore,
      function: functionScore,
      variable: variableScore,
      combined,
    },
    matchedPaths,
    unmatchedPaths,
    sharedFunctions: sortedIntersection(generatedSymbols.functions, actualSymbols.functions),
    missingFunctions: sortedDifference(actualSymbols.functions, generatedSymbols.functions),
    extraFunctions: sortedDifference(generatedSymbols.functions, actualSymbols.functions),
    sharedVariables: sortedIntersection(generatedSymbols.variables, actualSymbols.variables),
    missingVariables: sortedDifference(actualSymbols.variables, generatedSymbols.variables),
    extraVariables: sortedDifference(generatedSymbols.variables, actualSymbols.variables),
    usedTextFallback,
  };
}

/**
 * Combined similarity score in [0, 1].
 */
export function score(
  generated: string,
  actual: string,
  options: PatchSimilarityOptions = {},
): number {
  return scorePatchSimilarity(generated, actual, options).components.combined;
}

export type PatchSimilarityEvaluatorOptions = PatchSimilarityOptions;

/**
 * Evaluator that grades a candidate patch by structural agreement with the
 * reference patch.
 */
export class PatchSimilarityEvaluator implements Evaluator {
  readonly kind = 'patch_similarity';

  private readonly weights: PatchSimilarityWeights;
  private readonly extractor: SymbolExtractor;

  constructor(options: PatchSimilarityEvaluatorOptions = {}) {
    this.weights = options.weights ?? DEFAULT_PATCH_SIMILARITY_WEIGHTS;
    this.extractor = options.extractor ?? pythonExtractor;
    assertValidWeights(this.weights);
  }

  get syntax(): string {
    return this.extractor.syntax;
  }

  compare(candidate: string, reference: string): PatchSimilarityBreakdown {
    return scorePatchSimilarity(candidate, reference, {
      weights: this.weights,
      extractor: this.extractor,
    });
  }

  evaluate(context: EvaluationContext): EvaluationScore {
    return this.toScore(this.compare(context.candidate, context.reference));
  }

  toScore(breakdown: PatchSimilarityBreakdown): EvaluationScore {
    const { components } = breakdown;

    const hits = [
      ...breakdown.matchedPaths.map((filePath) => `Identical hunks in ${filePath}`),
      ...breakdown.sharedFunctions.map((name) => `Touched function ${name}`),
      ...breakdown.sharedVariables.map((name) => `Touched variable ${name}`),
    ];
    const misses = [
      ...breakdown.unmatchedPaths.map((filePath) => `Hunks differ for ${filePath}`),
      ...breakdown.missingFunctions.map((name) => `Missing function ${name}`),
      ...breakdown.extraFunctions.map((name) => `Unexpected function ${name}`),
      ...breakdown.missingVariables.map((name) => `Missing variable ${name}`),
      ...breakdown.extraVariables.map((name) => `Unexpected variable ${name}`),
    ];

    return {
      score: components.combined,
      verdict: scoreToVerdict(components.combined),
      hits,
      misses,
      reasoning: `file=${components.file.toFixed(3)} function=${components.function.toFixed(3)} variable=${components.variable.toFixed(3)} (syntax: ${this.extractor.syntax})`,
      details: {
        file: components.file,
        function: components.function,
        variable: components.variable,
        combined: components.combined,
        matched_paths: breakdown.matchedPaths,
        unmatched_paths: breakdown.unmatchedPaths,
        used_text_fallback: breakdown.usedTextFallback,
      },
    };
  }
}
