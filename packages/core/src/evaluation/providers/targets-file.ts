import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'yaml';

import { fileExists } from '../file-utils.js';
import type { TargetDefinition } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertTargetDefinition(value: unknown, index: number, filePath: string): TargetDefinition {
  if (!isRecord(value)) {
    throw new Error(`targets.yaml entry at index ${index} in ${filePath} must be an object`);
  }

  const { name, provider } = value;

  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new Error(`targets.yaml entry at index ${index} in ${filePath} is missing a valid 'name'`);
  }

  if (typeof provider !== 'string' || provider.trim().length === 0) {
    throw new Error(`targets.yaml entry '${name}' in ${filePath} is missing a valid 'provider'`);
  }

  // Provider-specific settings stay at the top level of each entry
  return { ...value, name, provider };
}

export async function readTargetDefinitions(
  filePath: string,
): Promise<readonly TargetDefinition[]> {
  const absolutePath = path.resolve(filePath);
  if (!(await fileExists(absolutePath))) {
    throw new Error(`targets.yaml not found at ${absolutePath}`);
  }

  const raw = await readFile(absolutePath, 'utf8');
  const parsed: unknown = parse(raw);

  if (!isRecord(parsed)) {
    throw new Error(`targets.yaml at ${absolutePath} must be a YAML object with a 'targets' field`);
  }

  const targets = parsed.targets;
  if (!Array.isArray(targets)) {
    throw new Error(`targets.yaml at ${absolutePath} must have a 'targets' array`);
  }

  return targets.map((entry: unknown, index) => assertTargetDefinition(entry, index, absolutePath));
}

export function listTargetNames(definitions: readonly TargetDefinition[]): readonly string[] {
  return definitions.map((definition) => definition.name);
}

export function findTargetDefinition(
  definitions: readonly TargetDefinition[],
  name: string,
): TargetDefinition | undefined {
  return definitions.find((definition) => definition.name === name);
}
