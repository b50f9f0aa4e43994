import { describe, expect, it } from 'vitest';

import {
  DocsGenerator,
  TREE_UNAVAILABLE_MESSAGE,
  selectRelevantFiles,
} from '../../../src/evaluation/context/docs-generator.js';
import { DEFAULT_DOC_PROMPTS, fillTemplate } from '../../../src/evaluation/context/prompts.js';
import { buildFileTree } from '../../../src/evaluation/context/tree-builder.js';
import type { Logger } from '../../../src/evaluation/logger.js';
import type {
  Provider,
  ProviderRequest,
  ProviderResponse,
} from '../../../src/evaluation/providers/types.js';
import type { RepositoryBrowser, RepositoryTree } from '../../../src/evaluation/sources/types.js';

class ScriptedProvider implements Provider {
  readonly id = 'mock:scripted';
  readonly kind = 'mock' as const;
  readonly targetName = 'scripted';
  readonly requests: ProviderRequest[] = [];

  constructor(private readonly replies: string[]) {}

  async invoke(request: ProviderRequest): Promise<ProviderResponse> {
    this.requests.push(request);
    return { text: this.replies.shift() ?? '' };
  }
}

const PATHS = ['src/app.py', 'README.md', 'setup.py'];

function createRepository(files: Readonly<Record<string, string>>): RepositoryBrowser {
  return {
    fetchRepoTree: async (): Promise<RepositoryTree> => ({ paths: PATHS, defaultBranch: 'main' }),
    fetchFileAtRef: async (filePath, ref) => {
      const content = files[filePath];
      if (content === undefined || ref !== 'main') {
        throw new Error('not found');
      }
      return content;
    },
  };
}

describe('DocsGenerator', () => {
  it('selects files from the tree and summarizes them', async () => {
    const provider = new ScriptedProvider(['["src/app.py", "missing.py", "setup.py"]', 'DOCS']);
    const generator = new DocsGenerator({
      provider,
      repository: createRepository({ 'src/app.py': 'print(1)' }),
    });

    const docs = await generator.generate();

    expect(docs).toBe('DOCS');
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[0]).toEqual({
      question: fillTemplate(DEFAULT_DOC_PROMPTS.selectionTemplate, { tree: buildFileTree(PATHS) }),
      systemPrompt: DEFAULT_DOC_PROMPTS.systemMessage,
      temperature: 0,
      maxOutputTokens: 4096,
    });
    expect(provider.requests[1]?.question).toBe(
      `${DEFAULT_DOC_PROMPTS.summarizeDocPrompt}\n\n` +
        '--- FILE: src/app.py ---\nprint(1)\n\n' +
        '--- FILE: setup.py (error: not found) ---\n',
    );
  });

  it('truncates file contents', async () => {
    const provider = new ScriptedProvider(['["src/app.py"]', 'DOCS']);
    const generator = new DocsGenerator({
      provider,
      repository: createRepository({ 'src/app.py': 'print(1)' }),
      maxFileChars: 5,
      prompts: { ...DEFAULT_DOC_PROMPTS, summarizeTemplate: '{files}' },
    });

    await generator.generate();

    expect(provider.requests[1]?.question).toBe('--- FILE: src/app.py ---\nprint');
  });

  it('reports an unavailable tree without calling the model', async () => {
    const provider = new ScriptedProvider([]);
    const warnings: string[] = [];
    const logger: Logger = {
      info: () => {},
      warn: (message) => warnings.push(message),
      debug: () => {},
    };
    const generator = new DocsGenerator({
      provider,
      repository: {
        fetchRepoTree: async () => {
          throw new Error('boom');
        },
        fetchFileAtRef: async () => '',
      },
      logger,
    });

    expect(await generator.generate()).toBe(TREE_UNAVAILABLE_MESSAGE);
    expect(provider.requests).toHaveLength(0);
    expect(warnings).toEqual(['Could not fetch repository tree: boom']);
  });
});

describe('selectRelevantFiles', () => {
  it('recovers a JSON array embedded in prose', async () => {
    const provider = new ScriptedProvider(['Sure: ["README.md"] hope it helps']);

    expect(await selectRelevantFiles(provider, 'tree', PATHS, 'sys')).toEqual(['README.md']);
  });

  it('keeps every path when the reply is not a list', async () => {
    const provider = new ScriptedProvider(['{"files": []}']);

    expect(await selectRelevantFiles(provider, 'tree', PATHS, 'sys')).toEqual(PATHS);
  });

  it('keeps every path when nothing parses', async () => {
    const provider = new ScriptedProvider(['I would pick the main module.']);

    expect(await selectRelevantFiles(provider, 'tree', PATHS, 'sys')).toEqual(PATHS);
  });
});

describe('fillTemplate', () => {
  it('leaves unknown placeholders in place', () => {
    expect(fillTemplate('{known} and {unknown}', { known: 'yes' })).toBe('yes and {unknown}');
  });
});
