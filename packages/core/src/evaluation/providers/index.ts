import { createBuiltinProviderRegistry } from './provider-registry.js';
import type { ResolvedTarget } from './targets.js';
import { resolveTargetDefinition } from './targets.js';
import type { EnvLookup, Provider, TargetDefinition } from './types.js';

export type {
  ChatMessage,
  ChatPrompt,
  EnvLookup,
  Provider,
  ProviderKind,
  ProviderRequest,
  ProviderResponse,
  TargetDefinition,
} from './types.js';
export { KNOWN_PROVIDERS, PROVIDER_ALIASES } from './types.js';

export type {
  AnthropicResolvedConfig,
  AzureResolvedConfig,
  GeminiResolvedConfig,
  MockResolvedConfig,
  OllamaResolvedConfig,
  ResolvedTarget,
  RetryConfig,
} from './targets.js';
export { DEFAULT_ANTHROPIC_MODEL, DEFAULT_OLLAMA_BASE_URL, DEFAULT_OLLAMA_MODEL } from './targets.js';

export { AnthropicProvider, AzureProvider, GeminiProvider, OllamaProvider } from './ai-sdk.js';
export { MockProvider } from './mock.js';
export {
  ProviderRegistry,
  createBuiltinProviderRegistry,
  type ProviderFactoryFn,
} from './provider-registry.js';

export { resolveTargetDefinition };
export { readTargetDefinitions, listTargetNames, findTargetDefinition } from './targets-file.js';

const builtinRegistry = createBuiltinProviderRegistry();

export function createProvider(target: ResolvedTarget): Provider {
  return builtinRegistry.create(target);
}

export function resolveAndCreateProvider(
  definition: TargetDefinition,
  env: EnvLookup = process.env,
): Provider {
  const resolved = resolveTargetDefinition(definition, env);
  return createProvider(resolved);
}
