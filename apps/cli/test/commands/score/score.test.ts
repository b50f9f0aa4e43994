import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { runScoreCommand } from '../../../src/commands/score/index.js';

const ACTUAL = [
  '--- a/pkg/core.py',
  '+++ b/pkg/core.py',
  '@@ -1 +1 @@',
  '-def run():',
  '+def run(fast=False):',
  '--- a/pkg/util.py',
  '+++ b/pkg/util.py',
  '@@ -5 +5 @@',
  '-LIMIT = 10',
  '+LIMIT = 20',
  '',
].join('\n');

const GENERATED = ACTUAL.replace('+LIMIT = 20', '+LIMIT = 50\n+DEBUG = True');

function writeDiffs(): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'patchbench-score-test-'));
  writeFileSync(path.join(dir, 'generated.diff'), GENERATED, 'utf8');
  writeFileSync(path.join(dir, 'actual.diff'), ACTUAL, 'utf8');
  return dir;
}

describe('runScoreCommand', () => {
  it('prints the breakdown with hits and misses', async () => {
    const output = await runScoreCommand({
      generated: 'generated.diff',
      actual: 'actual.diff',
      json: false,
      syntax: 'python',
      cwd: writeDiffs(),
    });

    expect(output.split('\n')).toEqual([
      'Similarity: 0.675 [borderline]',
      '  file:     0.500',
      '  function: 1.000',
      '  variable: 0.500',
      'Hits:',
      '  - Identical hunks in pkg/core.py',
      '  - Touched function run',
      '  - Touched variable LIMIT',
      'Misses:',
      '  - Hunks differ for pkg/util.py',
      '  - Unexpected variable DEBUG',
    ]);
  });

  it('prints JSON when asked', async () => {
    const output = await runScoreCommand({
      generated: 'actual.diff',
      actual: 'actual.diff',
      json: true,
      syntax: 'python',
      cwd: writeDiffs(),
    });

    const parsed: unknown = JSON.parse(output);
    expect(parsed).toMatchObject({
      verdict: 'pass',
      components: { file: 1, function: 1, variable: 1 },
      misses: [],
    });
    expect(parsed).toHaveProperty('score');
    expect(output.startsWith('{\n  "score": ')).toBe(true);
  });

  it('applies weight overrides', async () => {
    const output = await runScoreCommand({
      generated: 'generated.diff',
      actual: 'actual.diff',
      json: false,
      syntax: 'python',
      fileWeight: 1,
      functionWeight: 0,
      variableWeight: 0,
      cwd: writeDiffs(),
    });

    expect(output.split('\n')[0]).toBe('Similarity: 0.500 [fail]');
  });

  it('rejects an unknown syntax', async () => {
    await expect(
      runScoreCommand({
        generated: 'generated.diff',
        actual: 'actual.diff',
        json: false,
        syntax: 'go',
        cwd: writeDiffs(),
      }),
    ).rejects.toThrow('Unknown symbol syntax: "go". Registered syntaxes: python, typescript');
  });
});
