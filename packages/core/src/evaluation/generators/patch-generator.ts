import type { Provider } from '../providers/types.js';

export const PATCH_SYSTEM_PROMPT =
  'You generate unified diff patches based on documentation and issue/PR context. ' +
  'Output only a unified diff with file paths and hunks (---, +++, @@).';

export const DEFAULT_PATCH_MAX_OUTPUT_TOKENS = 2048;

export interface PatchGenerationRequest {
  readonly documentation: string;
  readonly problemStatement: string;
  readonly caseId: number;
}

/**
 * Produces a candidate unified diff for one case.
 */
export interface PatchGenerator {
  generate(request: PatchGenerationRequest): Promise<string>;
}

export interface LlmPatchGeneratorOptions {
  readonly provider: Provider;
  readonly systemPrompt?: string;
  readonly maxOutputTokens?: number;
  readonly temperature?: number;
}

export function buildPatchPrompt(documentation: string, problemStatement: string): string {
  return [
    'Given the documentation below and the PR description, propose a minimal patch ' +
      'that addresses the issue in the PR.',
    '',
    '<documentation>',
    documentation,
    '</documentation>',
    '',
    '<pr_description>',
    problemStatement,
    '</pr_description>',
    '',
  ].join('\n');
}

export class LlmPatchGenerator implements PatchGenerator {
  private readonly provider: Provider;
  private readonly systemPrompt: string;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;

  constructor(options: LlmPatchGeneratorOptions) {
    this.provider = options.provider;
    this.systemPrompt = options.systemPrompt ?? PATCH_SYSTEM_PROMPT;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_PATCH_MAX_OUTPUT_TOKENS;
    this.temperature = options.temperature ?? 0;
  }

  async generate(request: PatchGenerationRequest): Promise<string> {
    const response = await this.provider.invoke({
      question: buildPatchPrompt(request.documentation, request.problemStatement),
      systemPrompt: this.systemPrompt,
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
    });
    return response.text.trim();
  }
}
