import type { EvaluationVerdict, JsonObject } from '../types.js';

export type { EvaluationVerdict };

export interface EvaluationContext {
  readonly caseId: number;
  /** Unified diff produced by the patch generator */
  readonly candidate: string;
  /** Unified diff that was actually merged */
  readonly reference: string;
  readonly now: Date;
}

export interface EvaluationScore {
  readonly score: number;
  readonly verdict: EvaluationVerdict;
  readonly hits: readonly string[];
  readonly misses: readonly string[];
  readonly reasoning?: string;
  /** Structured component breakdown (e.g., per-signal scores, matched paths). */
  readonly details?: JsonObject;
}

export interface Evaluator {
  readonly kind: string;
  evaluate(context: EvaluationContext): Promise<EvaluationScore> | EvaluationScore;
}
