/**
 * Provider registry.
 *
 * Maps provider kinds to factory functions. Built-in providers are
 * registered by `createBuiltinProviderRegistry()`; callers can add their
 * own through `register()`.
 */

import { AnthropicProvider, AzureProvider, GeminiProvider, OllamaProvider } from './ai-sdk.js';
import { MockProvider } from './mock.js';
import type { ResolvedTarget } from './targets.js';
import type { Provider } from './types.js';

/**
 * Factory function that creates a Provider instance from a resolved target.
 */
export type ProviderFactoryFn = (target: ResolvedTarget) => Provider;

export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactoryFn>();

  /** Register a factory function for a provider kind. */
  register(kind: string, factory: ProviderFactoryFn): this {
    this.factories.set(kind, factory);
    return this;
  }

  get(kind: string): ProviderFactoryFn | undefined {
    return this.factories.get(kind);
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }

  create(target: ResolvedTarget): Provider {
    const factory = this.factories.get(target.kind);
    if (!factory) {
      throw new Error(
        `Unknown provider kind: "${target.kind}". Registered kinds: ${this.list().join(', ')}`,
      );
    }
    return factory(target);
  }
}

export function createBuiltinProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register('ollama', (target) => {
      if (target.kind !== 'ollama') throw mismatch('ollama', target);
      return new OllamaProvider(target.name, target.config);
    })
    .register('azure', (target) => {
      if (target.kind !== 'azure') throw mismatch('azure', target);
      return new AzureProvider(target.name, target.config);
    })
    .register('anthropic', (target) => {
      if (target.kind !== 'anthropic') throw mismatch('anthropic', target);
      return new AnthropicProvider(target.name, target.config);
    })
    .register('gemini', (target) => {
      if (target.kind !== 'gemini') throw mismatch('gemini', target);
      return new GeminiProvider(target.name, target.config);
    })
    .register('mock', (target) => {
      if (target.kind !== 'mock') throw mismatch('mock', target);
      return new MockProvider(target.name, target.config);
    });
}

function mismatch(expected: string, target: ResolvedTarget): Error {
  return new Error(`Factory for '${expected}' received target '${target.name}' of kind '${target.kind}'`);
}
