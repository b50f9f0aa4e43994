import {
  type EnvLookup,
  type ResolvedTarget,
  type TargetDefinition,
  findTargetDefinition,
  listTargetNames,
  readTargetDefinitions,
  resolveTargetDefinition,
} from '@patchbench/core';

import { discoverTargetsFile } from '../../utils/targets.js';

/**
 * Used when no targets.yaml exists: a local Ollama server with the default model.
 */
export const BUILTIN_TARGETS: readonly TargetDefinition[] = [{ name: 'default', provider: 'ollama' }];

export const DRY_RUN_PATCH = [
  '--- a/README.md',
  '+++ b/README.md',
  '@@ -1 +1 @@',
  '-dry run',
  '+dry run patch',
].join('\n');

export interface TargetSelectionOptions {
  readonly cwd: string;
  readonly explicitTargetsPath?: string;
  readonly generationTarget: string;
  readonly docsTarget?: string;
  readonly dryRun: boolean;
  readonly env: EnvLookup;
}

export interface TargetSelection {
  readonly generation: ResolvedTarget;
  /** Unset in dry-run mode, where documentation is not generated */
  readonly docs?: ResolvedTarget;
  readonly targetsFilePath?: string;
}

function pickDefinition(
  definitions: readonly TargetDefinition[],
  name: string,
  source: string,
): TargetDefinition {
  const definition = findTargetDefinition(definitions, name);
  if (!definition) {
    const available = listTargetNames(definitions).join(', ');
    throw new Error(`Target '${name}' not found in ${source}. Available targets: ${available}`);
  }
  return definition;
}

export async function selectTargets(options: TargetSelectionOptions): Promise<TargetSelection> {
  const { cwd, explicitTargetsPath, generationTarget, dryRun, env } = options;

  const targetsFilePath = await discoverTargetsFile({ explicitPath: explicitTargetsPath, cwd });
  const definitions = targetsFilePath
    ? await readTargetDefinitions(targetsFilePath)
    : BUILTIN_TARGETS;
  const source = targetsFilePath ?? 'built-in targets';

  const generationDefinition = pickDefinition(definitions, generationTarget, source);

  if (dryRun) {
    return {
      generation: {
        kind: 'mock',
        name: `${generationDefinition.name}-dry-run`,
        config: { response: DRY_RUN_PATCH },
      },
      targetsFilePath,
    };
  }

  const generation = resolveTargetDefinition(generationDefinition, env);
  const docsName = options.docsTarget ?? generationTarget;
  const docs =
    docsName === generationTarget
      ? generation
      : resolveTargetDefinition(pickDefinition(definitions, docsName, source), env);

  return { generation, docs, targetsFilePath };
}
