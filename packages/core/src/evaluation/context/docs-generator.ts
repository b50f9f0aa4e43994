import { extractJsonArrayBlob } from '../evaluators/scoring.js';
import { type Logger, describeError, silentLogger } from '../logger.js';
import type { Provider } from '../providers/types.js';
import type { RepositoryBrowser, RepositoryTree } from '../sources/types.js';
import { DEFAULT_DOC_PROMPTS, type DocPromptSet, fillTemplate } from './prompts.js';
import { buildFileTree } from './tree-builder.js';

export const TREE_UNAVAILABLE_MESSAGE =
  'Could not fetch repository tree for documentation generation.';

export const DEFAULT_MAX_FILE_CHARS = 8000;
export const DEFAULT_DOCS_MAX_OUTPUT_TOKENS = 4096;

/**
 * Produces the documentation text handed to the patch generator.
 */
export interface DocumentationSource {
  generate(): Promise<string>;
}

export interface SelectFilesOptions {
  readonly selectionTemplate?: string;
  readonly maxOutputTokens?: number;
}

/**
 * Ask the model which of `allPaths` matter for documentation.
 *
 * The reply should be a JSON array of paths. When it is not, the first
 * `[...]` span is tried; if nothing parses every path is returned. Picks
 * that are not in `allPaths` are dropped.
 */
export async function selectRelevantFiles(
  provider: Provider,
  treeText: string,
  allPaths: readonly string[],
  systemPrompt: string,
  options: SelectFilesOptions = {},
): Promise<string[]> {
  const template = options.selectionTemplate ?? DEFAULT_DOC_PROMPTS.selectionTemplate;
  const response = await provider.invoke({
    question: fillTemplate(template, { tree: treeText }),
    systemPrompt,
    temperature: 0,
    maxOutputTokens: options.maxOutputTokens,
  });

  const picks = parseSelection(response.text.trim());
  if (!Array.isArray(picks)) {
    return [...allPaths];
  }
  const known = new Set(allPaths);
  return picks.filter((pick): pick is string => typeof pick === 'string' && known.has(pick));
}

function parseSelection(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    const blob = extractJsonArrayBlob(content);
    if (blob === undefined) {
      return undefined;
    }
    try {
      return JSON.parse(blob);
    } catch {
      return undefined;
    }
  }
}

export interface DocsGeneratorOptions {
  readonly provider: Provider;
  readonly repository: RepositoryBrowser;
  readonly prompts?: DocPromptSet;
  readonly maxFileChars?: number;
  readonly maxOutputTokens?: number;
  readonly logger?: Logger;
}

/**
 * Builds repository documentation with two model calls: one to pick files
 * from the rendered tree, one to summarize their contents.
 */
export class DocsGenerator implements DocumentationSource {
  private readonly provider: Provider;
  private readonly repository: RepositoryBrowser;
  private readonly prompts: DocPromptSet;
  private readonly maxFileChars: number;
  private readonly maxOutputTokens: number;
  private readonly logger: Logger;

  constructor(options: DocsGeneratorOptions) {
    this.provider = options.provider;
    this.repository = options.repository;
    this.prompts = options.prompts ?? DEFAULT_DOC_PROMPTS;
    this.maxFileChars = options.maxFileChars ?? DEFAULT_MAX_FILE_CHARS;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_DOCS_MAX_OUTPUT_TOKENS;
    this.logger = options.logger ?? silentLogger;
  }

  async generate(): Promise<string> {
    let tree: RepositoryTree;
    try {
      tree = await this.repository.fetchRepoTree();
    } catch (error) {
      this.logger.warn(`Could not fetch repository tree: ${describeError(error)}`);
      return TREE_UNAVAILABLE_MESSAGE;
    }

    const treeText = buildFileTree(tree.paths);
    const selected = await selectRelevantFiles(
      this.provider,
      treeText,
      tree.paths,
      this.prompts.systemMessage,
      { selectionTemplate: this.prompts.selectionTemplate, maxOutputTokens: this.maxOutputTokens },
    );
    this.logger.debug(`Selected ${selected.length} file(s) for documentation`);

    return this.summarizeFiles(selected, tree.defaultBranch);
  }

  async summarizeFiles(paths: readonly string[], ref: string): Promise<string> {
    const parts: string[] = [];
    for (const filePath of paths) {
      try {
        const content = await this.repository.fetchFileAtRef(filePath, ref);
        parts.push(`--- FILE: ${filePath} ---\n${content.slice(0, this.maxFileChars)}`);
      } catch (error) {
        parts.push(`--- FILE: ${filePath} (error: ${describeError(error)}) ---\n`);
      }
    }

    const prompt = fillTemplate(this.prompts.summarizeTemplate, {
      doc_prompt: this.prompts.summarizeDocPrompt,
      files: parts.join('\n\n'),
    });
    const response = await this.provider.invoke({
      question: prompt,
      systemPrompt: this.prompts.systemMessage,
      temperature: 0,
      maxOutputTokens: this.maxOutputTokens,
    });
    return response.text;
  }
}
