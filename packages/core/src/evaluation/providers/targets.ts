import { z } from 'zod';

import { PROVIDER_ALIASES } from './types.js';
import type { EnvLookup, TargetDefinition } from './types.js';

export interface RetryConfig {
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly backoffFactor?: number;
  readonly retryableStatusCodes?: readonly number[];
}

/**
 * Ollama settings. Ollama serves an OpenAI-compatible API under `/v1`.
 */
export interface OllamaResolvedConfig {
  readonly baseUrl: string;
  readonly model: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly retry?: RetryConfig;
}

/**
 * Azure OpenAI settings used by the Vercel AI SDK.
 */
export interface AzureResolvedConfig {
  readonly resourceName: string;
  readonly deploymentName: string;
  readonly apiKey: string;
  readonly version?: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly retry?: RetryConfig;
}

/**
 * Anthropic Claude settings used by the Vercel AI SDK.
 */
export interface AnthropicResolvedConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly retry?: RetryConfig;
}

/**
 * Google Gemini settings used by the Vercel AI SDK.
 */
export interface GeminiResolvedConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly retry?: RetryConfig;
}

export interface MockResolvedConfig {
  readonly response?: string;
  readonly delayMs?: number;
}

export type ResolvedTarget =
  | { readonly kind: 'ollama'; readonly name: string; readonly config: OllamaResolvedConfig }
  | { readonly kind: 'azure'; readonly name: string; readonly config: AzureResolvedConfig }
  | { readonly kind: 'anthropic'; readonly name: string; readonly config: AnthropicResolvedConfig }
  | { readonly kind: 'gemini'; readonly name: string; readonly config: GeminiResolvedConfig }
  | { readonly kind: 'mock'; readonly name: string; readonly config: MockResolvedConfig };

const BASE_TARGET_SCHEMA = z
  .object({
    name: z.string().min(1, 'target name is required'),
    provider: z.string().min(1, 'provider is required'),
  })
  .passthrough();

type BaseTarget = z.infer<typeof BASE_TARGET_SCHEMA>;

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_OLLAMA_MODEL = 'gemma3:12b';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5';
const DEFAULT_AZURE_API_VERSION = '2024-12-01-preview';

function normalizeAzureApiVersion(value: string | undefined): string {
  if (!value) {
    return DEFAULT_AZURE_API_VERSION;
  }
  const withoutPrefix = value.replace(/^api[-_]?version\s*=\s*/i, '').trim();
  return withoutPrefix.length > 0 ? withoutPrefix : DEFAULT_AZURE_API_VERSION;
}

function resolveRetryConfig(target: BaseTarget): RetryConfig | undefined {
  const maxRetries = resolveOptionalNumber(
    target.max_retries ?? target.maxRetries,
    `${target.name} max retries`,
  );
  const initialDelayMs = resolveOptionalNumber(
    target.retry_initial_delay_ms ?? target.retryInitialDelayMs,
    `${target.name} retry initial delay`,
  );
  const maxDelayMs = resolveOptionalNumber(
    target.retry_max_delay_ms ?? target.retryMaxDelayMs,
    `${target.name} retry max delay`,
  );
  const backoffFactor = resolveOptionalNumber(
    target.retry_backoff_factor ?? target.retryBackoffFactor,
    `${target.name} retry backoff factor`,
  );
  const retryableStatusCodes = resolveOptionalNumberArray(
    target.retry_status_codes ?? target.retryStatusCodes,
    `${target.name} retry status codes`,
  );

  // Only return retry config if at least one field is set
  if (
    maxRetries === undefined &&
    initialDelayMs === undefined &&
    maxDelayMs === undefined &&
    backoffFactor === undefined &&
    retryableStatusCodes === undefined
  ) {
    return undefined;
  }

  return { maxRetries, initialDelayMs, maxDelayMs, backoffFactor, retryableStatusCodes };
}

/**
 * Validate a raw target definition and resolve `${{ VAR }}` references
 * against `env`.
 */
export function resolveTargetDefinition(
  definition: TargetDefinition,
  env: EnvLookup = process.env,
): ResolvedTarget {
  const parsed = BASE_TARGET_SCHEMA.parse(definition);
  const lowered = parsed.provider.toLowerCase();
  const provider = PROVIDER_ALIASES[lowered] ?? lowered;

  switch (provider) {
    case 'ollama':
      return { kind: 'ollama', name: parsed.name, config: resolveOllamaConfig(parsed, env) };
    case 'azure':
      return { kind: 'azure', name: parsed.name, config: resolveAzureConfig(parsed, env) };
    case 'anthropic':
      return { kind: 'anthropic', name: parsed.name, config: resolveAnthropicConfig(parsed, env) };
    case 'gemini':
      return { kind: 'gemini', name: parsed.name, config: resolveGeminiConfig(parsed, env) };
    case 'mock':
      return { kind: 'mock', name: parsed.name, config: resolveMockConfig(parsed) };
    default:
      throw new Error(`Unsupported provider '${parsed.provider}' in target '${parsed.name}'`);
  }
}

function resolveOllamaConfig(target: BaseTarget, env: EnvLookup): OllamaResolvedConfig {
  const baseUrl =
    resolveOptionalString(target.base_url ?? target.baseUrl ?? target.endpoint, env, {
      description: `${target.name} base url`,
      allowLiteral: true,
      optionalEnv: true,
    }) ?? DEFAULT_OLLAMA_BASE_URL;
  const model =
    resolveOptionalString(target.model, env, {
      description: `${target.name} Ollama model`,
      allowLiteral: true,
      optionalEnv: true,
    }) ?? DEFAULT_OLLAMA_MODEL;

  return {
    baseUrl,
    model,
    temperature: resolveOptionalNumber(target.temperature, `${target.name} temperature`),
    maxOutputTokens: resolveOptionalNumber(
      target.max_output_tokens ?? target.maxTokens,
      `${target.name} max output tokens`,
    ),
    retry: resolveRetryConfig(target),
  };
}

function resolveAzureConfig(target: BaseTarget, env: EnvLookup): AzureResolvedConfig {
  const endpointSource = target.endpoint ?? target.resource ?? target.resourceName;
  const apiKeySource = target.api_key ?? target.apiKey;
  const deploymentSource = target.deployment ?? target.deploymentName ?? target.model;
  const versionSource = target.version ?? target.api_version;

  return {
    resourceName: resolveString(endpointSource, env, `${target.name} endpoint`),
    deploymentName: resolveString(deploymentSource, env, `${target.name} deployment`),
    apiKey: resolveString(apiKeySource, env, `${target.name} api key`),
    version: normalizeAzureApiVersion(
      resolveOptionalString(versionSource, env, {
        description: `${target.name} api version`,
        allowLiteral: true,
        optionalEnv: true,
      }),
    ),
    temperature: resolveOptionalNumber(target.temperature, `${target.name} temperature`),
    maxOutputTokens: resolveOptionalNumber(
      target.max_output_tokens ?? target.maxTokens,
      `${target.name} max output tokens`,
    ),
    retry: resolveRetryConfig(target),
  };
}

function resolveAnthropicConfig(target: BaseTarget, env: EnvLookup): AnthropicResolvedConfig {
  return {
    apiKey: resolveString(target.api_key ?? target.apiKey, env, `${target.name} Anthropic api key`),
    model:
      resolveOptionalString(target.model ?? target.deployment, env, {
        description: `${target.name} Anthropic model`,
        allowLiteral: true,
        optionalEnv: true,
      }) ?? DEFAULT_ANTHROPIC_MODEL,
    temperature: resolveOptionalNumber(target.temperature, `${target.name} temperature`),
    maxOutputTokens: resolveOptionalNumber(
      target.max_output_tokens ?? target.maxTokens,
      `${target.name} max output tokens`,
    ),
    retry: resolveRetryConfig(target),
  };
}

function resolveGeminiConfig(target: BaseTarget, env: EnvLookup): GeminiResolvedConfig {
  const model =
    resolveOptionalString(target.model ?? target.deployment, env, {
      description: `${target.name} Gemini model`,
      allowLiteral: true,
      optionalEnv: true,
    }) ?? 'gemini-2.5-flash';

  return {
    apiKey: resolveString(target.api_key ?? target.apiKey, env, `${target.name} Google API key`),
    model,
    temperature: resolveOptionalNumber(target.temperature, `${target.name} temperature`),
    maxOutputTokens: resolveOptionalNumber(
      target.max_output_tokens ?? target.maxTokens,
      `${target.name} max output tokens`,
    ),
    retry: resolveRetryConfig(target),
  };
}

function resolveMockConfig(target: BaseTarget): MockResolvedConfig {
  const response = typeof target.response === 'string' ? target.response : undefined;
  return {
    response,
    delayMs: resolveOptionalNumber(target.delay_ms ?? target.delayMs, `${target.name} delay`),
  };
}

function resolveString(source: unknown, env: EnvLookup, description: string): string {
  const value = resolveOptionalString(source, env, {
    description,
    allowLiteral: false,
    optionalEnv: false,
  });
  if (value === undefined) {
    throw new Error(`${description} is required`);
  }
  return value;
}

function resolveOptionalString(
  source: unknown,
  env: EnvLookup,
  options: { description: string; allowLiteral?: boolean; optionalEnv?: boolean },
): string | undefined {
  const { description } = options;
  if (source === undefined || source === null) {
    return undefined;
  }
  if (typeof source !== 'string') {
    throw new Error(`${description} must be a string`);
  }
  const trimmed = source.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  // Check for ${{ variable }} syntax
  const envVarMatch = trimmed.match(/^\$\{\{\s*([A-Z0-9_]+)\s*\}\}$/i);
  if (envVarMatch) {
    const varName = envVarMatch[1];
    const envValue = env[varName];

    // Treat empty or undefined env vars the same way
    if (envValue === undefined || envValue.trim().length === 0) {
      if (options.optionalEnv) {
        return undefined;
      }
      const status = envValue === undefined ? 'is not set' : 'is empty';
      throw new Error(`Environment variable '${varName}' required for ${description} ${status}`);
    }
    return envValue;
  }

  if (!options.allowLiteral) {
    throw new Error(
      `${description} must use \${{ VARIABLE_NAME }} syntax for environment variables or be marked as allowing literals`,
    );
  }
  return trimmed;
}

function resolveOptionalNumber(source: unknown, description: string): number | undefined {
  if (source === undefined || source === null || source === '') {
    return undefined;
  }
  if (typeof source === 'number') {
    return Number.isFinite(source) ? source : undefined;
  }
  if (typeof source === 'string') {
    const numeric = Number(source);
    if (Number.isFinite(numeric)) {
      return numeric;
    }
  }
  throw new Error(`${description} must be a number`);
}

function resolveOptionalNumberArray(
  source: unknown,
  description: string,
): readonly number[] | undefined {
  if (source === undefined || source === null) {
    return undefined;
  }
  if (!Array.isArray(source)) {
    throw new Error(`${description} must be an array of numbers`);
  }
  const resolved: number[] = [];
  for (let i = 0; i < source.length; i++) {
    const item: unknown = source[i];
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      throw new Error(`${description}[${i}] must be a number`);
    }
    resolved.push(item);
  }
  return resolved.length > 0 ? resolved : undefined;
}
