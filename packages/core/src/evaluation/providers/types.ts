import type { JsonObject } from '../types.js';

export type ChatMessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatMessageRole;
  readonly content: string;
}

export type ChatPrompt = readonly ChatMessage[];

export type ProviderKind = 'ollama' | 'anthropic' | 'azure' | 'gemini' | 'mock';

/**
 * List of all supported provider kinds.
 * This is the source of truth for provider validation.
 */
export const KNOWN_PROVIDERS: readonly ProviderKind[] = [
  'ollama',
  'anthropic',
  'azure',
  'gemini',
  'mock',
] as const;

/**
 * Provider aliases that are accepted in target definitions.
 * These map to the canonical ProviderKind values.
 */
export const PROVIDER_ALIASES: Readonly<Record<string, ProviderKind>> = {
  'azure-openai': 'azure',
  google: 'gemini',
  'google-gemini': 'gemini',
};

export interface ProviderRequest {
  readonly question: string;
  readonly systemPrompt?: string;
  readonly maxOutputTokens?: number;
  readonly temperature?: number;
  readonly signal?: AbortSignal;
}

export interface ProviderResponse {
  readonly text: string;
  readonly raw?: unknown;
  readonly usage?: JsonObject;
}

export interface Provider {
  readonly id: string;
  readonly kind: ProviderKind;
  readonly targetName: string;
  invoke(request: ProviderRequest): Promise<ProviderResponse>;
}

export type EnvLookup = Readonly<Record<string, string | undefined>>;

export interface TargetDefinition {
  readonly name: string;
  readonly provider: ProviderKind | string;
  // Endpoint fields
  readonly base_url?: string | unknown | undefined;
  readonly baseUrl?: string | unknown | undefined;
  readonly endpoint?: string | unknown | undefined;
  readonly resource?: string | unknown | undefined;
  readonly resourceName?: string | unknown | undefined;
  readonly api_key?: string | unknown | undefined;
  readonly apiKey?: string | unknown | undefined;
  readonly deployment?: string | unknown | undefined;
  readonly deploymentName?: string | unknown | undefined;
  readonly model?: string | unknown | undefined;
  readonly version?: string | unknown | undefined;
  readonly api_version?: string | unknown | undefined;
  // Common fields
  readonly temperature?: number | unknown | undefined;
  readonly max_output_tokens?: number | unknown | undefined;
  readonly maxTokens?: number | unknown | undefined;
  // Mock fields
  readonly response?: string | unknown | undefined;
  readonly delayMs?: number | unknown | undefined;
  readonly delay_ms?: number | unknown | undefined;
  // Retry configuration fields
  readonly max_retries?: number | unknown | undefined;
  readonly maxRetries?: number | unknown | undefined;
  readonly retry_initial_delay_ms?: number | unknown | undefined;
  readonly retryInitialDelayMs?: number | unknown | undefined;
  readonly retry_max_delay_ms?: number | unknown | undefined;
  readonly retryMaxDelayMs?: number | unknown | undefined;
  readonly retry_backoff_factor?: number | unknown | undefined;
  readonly retryBackoffFactor?: number | unknown | undefined;
  readonly retry_status_codes?: unknown | undefined;
  readonly retryStatusCodes?: unknown | undefined;
}
