import { readFileSync } from 'node:fs';
import { binary, run, subcommands } from 'cmd-ts';

import { evalCommand } from './commands/eval/index.js';
import { scoreCommand } from './commands/score/index.js';

function readPackageVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export const app = subcommands({
  name: 'patchbench',
  description: 'Score LLM-generated patches against merged pull requests',
  version: readPackageVersion(),
  cmds: {
    eval: evalCommand,
    score: scoreCommand,
  },
});

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await run(binary(app), argv);
}
