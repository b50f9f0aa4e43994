import { command, flag, number, option, optional, string } from 'cmd-ts';

import { runEvalCommand } from './run-eval.js';

export const evalCommand = command({
  name: 'eval',
  description: 'Generate patches for merged pull requests and score them against the real diffs',
  args: {
    config: option({
      type: optional(string),
      long: 'config',
      description: 'Path to patchbench.yaml (default: ./patchbench.yaml when present)',
    }),
    repo: option({
      type: optional(string),
      long: 'repo',
      description: "Repository to evaluate against, as 'owner/name'",
    }),
    prIds: option({
      type: optional(string),
      long: 'pr-ids',
      description: 'Comma-separated PR numbers (e.g. 2972,2933). Lists recent merged PRs when unset',
    }),
    numPrs: option({
      type: optional(number),
      long: 'num-prs',
      description: 'Maximum number of PRs to evaluate (default: 3)',
    }),
    resultsDir: option({
      type: optional(string),
      long: 'results-dir',
      description: 'Directory for per-PR artifacts and metrics (default: results)',
    }),
    target: option({
      type: optional(string),
      long: 'target',
      description: 'Target name from targets.yaml used for patch generation (default: default)',
    }),
    targets: option({
      type: optional(string),
      long: 'targets',
      description: 'Path to targets.yaml (overrides discovery)',
    }),
    docsTarget: option({
      type: optional(string),
      long: 'docs-target',
      description: 'Target used for documentation generation (default: the --target value)',
    }),
    prompts: option({
      type: optional(string),
      long: 'prompts',
      description: 'YAML file with the documentation prompts to evaluate (default: built-in prompts)',
    }),
    workers: option({
      type: optional(number),
      long: 'workers',
      description: 'Number of PRs evaluated in parallel (default: 1, max: 50)',
    }),
    forceFetch: flag({
      long: 'force-fetch',
      description: 'Ignore the PR cache and fetch everything from GitHub',
    }),
    dryRun: flag({
      long: 'dry-run',
      description: 'Use mock provider responses instead of real LLM calls',
    }),
    verbose: flag({
      long: 'verbose',
      description: 'Enable verbose logging',
    }),
  },
  handler: async (args) => {
    await runEvalCommand(args);
  },
});
