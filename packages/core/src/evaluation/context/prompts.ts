import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';

import { toCamelCaseDeep } from '../case-conversion.js';
import { ConfigurationError } from '../config.js';
import { fileExists } from '../file-utils.js';

/**
 * Prompt texts used to build documentation context for a repository.
 *
 * `selectionTemplate` receives the rendered tree through `{tree}`;
 * `summarizeTemplate` receives `{doc_prompt}` and `{files}`.
 */
export interface DocPromptSet {
  readonly systemMessage: string;
  readonly summarizeDocPrompt: string;
  readonly selectionTemplate: string;
  readonly summarizeTemplate: string;
}

export const DEFAULT_DOC_PROMPTS: DocPromptSet = {
  systemMessage:
    'You convert source code into high-quality documentation that helps engineers ' +
    'understand behavior and make correct changes. Be specific and reference ' +
    'symbols and files explicitly.',
  summarizeDocPrompt:
    'You are an expert technical writer. Given source code, produce concise, actionable ' +
    'documentation focused on purpose, key APIs, error handling, and edge cases. Keep it ' +
    'short and suitable for code review guidance.',
  selectionTemplate:
    'Given the project file tree below, pick which files are most relevant for ' +
    'generating concise developer-facing documentation about implementation, ' +
    'APIs, data flows and edge cases. Reply ONLY with a JSON array of the ' +
    'relative file paths you choose (no extra text).\n\n{tree}\n',
  summarizeTemplate: '{doc_prompt}\n\n{files}',
};

/**
 * Substitute `{name}` placeholders. Unknown placeholders are left as is.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, name: string) =>
    Object.hasOwn(values, name) ? values[name] : match,
  );
}

const PROMPT_TEXT = z.string().refine((text) => text.trim().length > 0, {
  message: 'must be a non-empty string',
});

/**
 * Prompt file layout. Every key is optional and falls back to
 * {@link DEFAULT_DOC_PROMPTS}; unknown keys are rejected.
 */
export const DocPromptSetSchema = z
  .object({
    systemMessage: PROMPT_TEXT.optional(),
    summarizeDocPrompt: PROMPT_TEXT.optional(),
    selectionTemplate: PROMPT_TEXT.refine((text) => text.includes('{tree}'), {
      message: 'must contain the {tree} placeholder',
    }).optional(),
    summarizeTemplate: PROMPT_TEXT.refine((text) => text.includes('{files}'), {
      message: 'must contain the {files} placeholder',
    }).optional(),
  })
  .strict();

/**
 * Load a prompt set from a YAML file with snake_case keys
 * (`system_message`, `summarize_doc_prompt`, `selection_template`,
 * `summarize_template`).
 *
 * A missing or invalid file throws {@link ConfigurationError}: the run has
 * nothing to evaluate without it.
 */
export async function loadDocPromptSet(filePath: string): Promise<DocPromptSet> {
  if (!(await fileExists(filePath))) {
    throw new ConfigurationError(`Prompt file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = DocPromptSetSchema.safeParse(toCamelCaseDeep(parsed ?? {}));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      )
      .join('; ');
    throw new ConfigurationError(`Invalid prompt file ${filePath}: ${issues}`);
  }

  return {
    systemMessage: result.data.systemMessage ?? DEFAULT_DOC_PROMPTS.systemMessage,
    summarizeDocPrompt: result.data.summarizeDocPrompt ?? DEFAULT_DOC_PROMPTS.summarizeDocPrompt,
    selectionTemplate: result.data.selectionTemplate ?? DEFAULT_DOC_PROMPTS.selectionTemplate,
    summarizeTemplate: result.data.summarizeTemplate ?? DEFAULT_DOC_PROMPTS.summarizeTemplate,
  };
}
