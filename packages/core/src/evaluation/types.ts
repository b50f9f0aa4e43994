/**
 * JSON primitive values appearing in patchbench payloads.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Immutable JSON object representation.
 */
export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * Recursive JSON value supporting nested structures.
 */
export type JsonValue = JsonPrimitive | JsonObject | readonly JsonValue[];

/**
 * Guard matching JSON objects.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
}

/**
 * Guard matching JSON values.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return isJsonObject(value);
  }
  return false;
}

export type EvaluationVerdict = 'pass' | 'fail' | 'borderline';

/**
 * Metadata for one file touched by a historical change request.
 */
export interface ChangedFile {
  readonly filename: string;
  readonly status?: string;
  readonly additions?: number;
  readonly deletions?: number;
  readonly patch?: string;
  readonly rawUrl?: string;
}

/**
 * A historical change request: the problem description, the files it touched
 * and the merged unified diff.
 */
export interface ChangeRequestCase {
  readonly id: number;
  readonly body: string;
  readonly files: readonly ChangedFile[];
  readonly diffText: string;
}

/**
 * Similarity components for one generated/actual patch pair.
 */
export interface ScoreComponents {
  readonly file: number;
  readonly function: number;
  readonly variable: number;
  readonly combined: number;
}

/**
 * Outcome of one scored case.
 */
export interface CaseResult {
  readonly caseId: number;
  readonly score: number;
  readonly verdict: EvaluationVerdict;
  readonly components: ScoreComponents;
  readonly hits: readonly string[];
  readonly misses: readonly string[];
  readonly documentation: string;
  readonly generatedDiff: string;
  readonly actualDiff: string;
  readonly timestamp: string;
}

/**
 * Run-level aggregate over every scored case.
 */
export interface RunSummary {
  readonly scores: readonly number[];
  readonly meanScore: number;
  readonly durationMs: number;
  readonly errors: readonly string[];
  readonly cases: readonly CaseResult[];
}
