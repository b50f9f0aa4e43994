import type { MockResolvedConfig } from './targets.js';
import type { Provider, ProviderRequest, ProviderResponse } from './types.js';

const DEFAULT_MOCK_RESPONSE = [
  '--- a/README.md',
  '+++ b/README.md',
  '@@ -1 +1 @@',
  '-Mock provider response.',
  '+Configure targets.yaml to supply a custom value.',
].join('\n');

/**
 * Returns a canned reply. Used for dry runs and tests.
 */
export class MockProvider implements Provider {
  readonly id: string;
  readonly kind = 'mock' as const;
  readonly targetName: string;

  private readonly cannedResponse: string;
  private readonly delayMs: number;

  constructor(targetName: string, config: MockResolvedConfig) {
    this.id = `mock:${targetName}`;
    this.targetName = targetName;
    this.cannedResponse = config.response ?? DEFAULT_MOCK_RESPONSE;
    this.delayMs = Math.max(0, config.delayMs ?? 0);
  }

  async invoke(request: ProviderRequest): Promise<ProviderResponse> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }

    return {
      text: this.cannedResponse,
      raw: {
        question: request.question,
        systemPrompt: request.systemPrompt,
      },
    };
  }
}
