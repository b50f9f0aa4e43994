import type { HunkMap } from './hunk-parser.js';

/**
 * Names recovered from diff content. Function and type (class) names share
 * the `functions` set: both are named symbols defined by the change.
 */
export interface ExtractedSymbols {
  readonly functions: ReadonlySet<string>;
  readonly variables: ReadonlySet<string>;
}

/**
 * Recovers touched symbol names from a hunk for one source syntax.
 */
export interface SymbolExtractor {
  readonly syntax: string;
  extractFromHunk(hunkText: string): ExtractedSymbols;
}

/**
 * Regexes for one source syntax. Each pattern's first capture group is the
 * identifier. Categories are tried in order: function, type, assignment.
 */
export interface SymbolPatternSet {
  readonly syntax: string;
  readonly functionPatterns: readonly RegExp[];
  readonly typePatterns: readonly RegExp[];
  readonly assignmentPatterns: readonly RegExp[];
}

export const PYTHON_PATTERNS: SymbolPatternSet = {
  syntax: 'python',
  functionPatterns: [/^\s*def\s+([A-Za-z_]\w*)\s*\(/],
  typePatterns: [/^\s*class\s+([A-Za-z_]\w*)\s*[:(]/],
  assignmentPatterns: [/^\s*([A-Za-z_]\w*)\s*=(?!=)/],
};

export const TYPESCRIPT_PATTERNS: SymbolPatternSet = {
  syntax: 'typescript',
  functionPatterns: [
    /^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)\s*[<(]/,
  ],
  typePatterns: [
    /^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?(?:class|interface)\s+([A-Za-z_$][\w$]*)/,
  ],
  assignmentPatterns: [/^\s*(?:export\s+)?(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(?::[^=]+)?=(?!=)/],
};

const DIFF_MARKERS = ['+', '-', ' '] as const;

function stripDiffMarker(line: string): string {
  return DIFF_MARKERS.some((marker) => line.startsWith(marker)) ? line.slice(1) : line;
}

function firstCapture(patterns: readonly RegExp[], content: string): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(content);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Build a line-oriented extractor from a pattern set. At most one identifier
 * is recorded per line; the first matching category wins.
 */
export function createPatternExtractor(patternSet: SymbolPatternSet): SymbolExtractor {
  return {
    syntax: patternSet.syntax,
    extractFromHunk(hunkText: string): ExtractedSymbols {
      const functions = new Set<string>();
      const variables = new Set<string>();

      for (const line of hunkText.split(/\r\n|\r|\n/)) {
        const content = stripDiffMarker(line);

        const functionName =
          firstCapture(patternSet.functionPatterns, content) ??
          firstCapture(patternSet.typePatterns, content);
        if (functionName) {
          functions.add(functionName);
          continue;
        }

        const variableName = firstCapture(patternSet.assignmentPatterns, content);
        if (variableName) {
          variables.add(variableName);
        }
      }

      return { functions, variables };
    },
  };
}

export const pythonExtractor: SymbolExtractor = createPatternExtractor(PYTHON_PATTERNS);

/**
 * Union the symbols of every hunk of every file into two flat sets.
 */
export function collectFromFilesMap(
  filesMap: HunkMap,
  extractor: SymbolExtractor = pythonExtractor,
): ExtractedSymbols {
  const functions = new Set<string>();
  const variables = new Set<string>();

  for (const hunks of filesMap.values()) {
    for (const hunk of hunks) {
      const extracted = extractor.extractFromHunk(hunk);
      for (const name of extracted.functions) {
        functions.add(name);
      }
      for (const name of extracted.variables) {
        variables.add(name);
      }
    }
  }

  return { functions, variables };
}

/**
 * Registry of symbol extractors keyed by syntax name.
 */
export class SymbolExtractorRegistry {
  private readonly extractors = new Map<string, SymbolExtractor>();

  register(extractor: SymbolExtractor): this {
    this.extractors.set(extractor.syntax, extractor);
    return this;
  }

  get(syntax: string): SymbolExtractor | undefined {
    return this.extractors.get(syntax);
  }

  list(): string[] {
    return [...this.extractors.keys()];
  }

  resolve(syntax: string): SymbolExtractor {
    const extractor = this.extractors.get(syntax);
    if (!extractor) {
      throw new Error(
        `Unknown symbol syntax: "${syntax}". Registered syntaxes: ${this.list().join(', ')}`,
      );
    }
    return extractor;
  }
}

export function createBuiltinSymbolRegistry(): SymbolExtractorRegistry {
  return new SymbolExtractorRegistry()
    .register(pythonExtractor)
    .register(createPatternExtractor(TYPESCRIPT_PATTERNS));
}
