export * from './evaluation/types.js';
export * from './evaluation/file-utils.js';
export * from './evaluation/case-conversion.js';
export * from './evaluation/logger.js';
export * from './evaluation/config.js';
export * from './evaluation/diff/hunk-parser.js';
export * from './evaluation/diff/symbol-extractor.js';
export * from './evaluation/evaluators/scoring.js';
export * from './evaluation/evaluators/patch-similarity.js';
export type {
  EvaluationContext,
  EvaluationScore,
  Evaluator,
} from './evaluation/evaluators/types.js';
export * from './evaluation/providers/index.js';
export * from './evaluation/cache/pr-cache.js';
export * from './evaluation/sources/types.js';
export * from './evaluation/sources/github.js';
export * from './evaluation/context/tree-builder.js';
export * from './evaluation/context/prompts.js';
export * from './evaluation/context/docs-generator.js';
export * from './evaluation/generators/patch-generator.js';
export * from './evaluation/orchestrator.js';
