import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ANTHROPIC_MODEL,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OLLAMA_MODEL,
  resolveTargetDefinition,
} from '../../../src/evaluation/providers/targets.js';
import {
  findTargetDefinition,
  listTargetNames,
  readTargetDefinitions,
} from '../../../src/evaluation/providers/targets-file.js';

describe('resolveTargetDefinition', () => {
  it('applies Ollama defaults', () => {
    const resolved = resolveTargetDefinition({ name: 'local', provider: 'ollama' }, {});

    expect(resolved).toEqual({
      kind: 'ollama',
      name: 'local',
      config: {
        baseUrl: DEFAULT_OLLAMA_BASE_URL,
        model: DEFAULT_OLLAMA_MODEL,
        temperature: undefined,
        maxOutputTokens: undefined,
        retry: undefined,
      },
    });
  });

  it('reads Ollama settings from the environment when referenced', () => {
    const resolved = resolveTargetDefinition(
      {
        name: 'local',
        provider: 'ollama',
        base_url: '${{ OLLAMA_URL }}',
        model: 'qwen2.5-coder:7b',
        max_output_tokens: '512',
      },
      { OLLAMA_URL: 'http://gpu-box:11434/v1' },
    );

    expect(resolved.kind).toBe('ollama');
    if (resolved.kind === 'ollama') {
      expect(resolved.config.baseUrl).toBe('http://gpu-box:11434/v1');
      expect(resolved.config.model).toBe('qwen2.5-coder:7b');
      expect(resolved.config.maxOutputTokens).toBe(512);
    }
  });

  it('requires secrets to come from the environment', () => {
    expect(() =>
      resolveTargetDefinition(
        { name: 'claude', provider: 'anthropic', api_key: 'test-secret', model: 'claude' },
        {},
      ),
    ).toThrow(
      'claude Anthropic api key must use ${{ VARIABLE_NAME }} syntax for environment variables or be marked as allowing literals',
    );
  });

  it('reports a missing environment variable', () => {
    expect(() =>
      resolveTargetDefinition(
        {
          name: 'claude',
          provider: 'anthropic',
          api_key: '${{ ANTHROPIC_API_KEY }}',
          model: '${{ ANTHROPIC_MODEL }}',
        },
        { ANTHROPIC_MODEL: 'claude' },
      ),
    ).toThrow("Environment variable 'ANTHROPIC_API_KEY' required for claude Anthropic api key is not set");
  });

  it('accepts a literal Anthropic model and falls back to the default', () => {
    const env = { ANTHROPIC_API_KEY: 'test-secret' };
    const named = resolveTargetDefinition(
      { name: 'claude', provider: 'anthropic', api_key: '${{ ANTHROPIC_API_KEY }}', model: 'claude-haiku' },
      env,
    );
    const unnamed = resolveTargetDefinition(
      { name: 'claude', provider: 'anthropic', api_key: '${{ ANTHROPIC_API_KEY }}' },
      env,
    );

    expect(named.kind === 'anthropic' && named.config.model).toBe('claude-haiku');
    expect(unnamed.kind === 'anthropic' && unnamed.config.apiKey).toBe('test-secret');
    expect(unnamed.kind === 'anthropic' && unnamed.config.model).toBe(DEFAULT_ANTHROPIC_MODEL);
  });

  it('maps provider aliases and normalizes the Azure api version', () => {
    const resolved = resolveTargetDefinition(
      {
        name: 'az',
        provider: 'azure-openai',
        endpoint: '${{ AZURE_ENDPOINT }}',
        api_key: '${{ AZURE_KEY }}',
        deployment: '${{ AZURE_DEPLOYMENT }}',
        version: 'api-version=2024-10-01-preview',
      },
      { AZURE_ENDPOINT: 'https://example.openai.azure.com', AZURE_KEY: 'test-secret', AZURE_DEPLOYMENT: 'gpt' },
    );

    expect(resolved.kind).toBe('azure');
    if (resolved.kind === 'azure') {
      expect(resolved.config.version).toBe('2024-10-01-preview');
      expect(resolved.config.deploymentName).toBe('gpt');
    }
  });

  it('collects retry settings', () => {
    const resolved = resolveTargetDefinition(
      { name: 'local', provider: 'ollama', max_retries: 5, retry_status_codes: [429] },
      {},
    );

    if (resolved.kind !== 'ollama') {
      throw new Error(`unexpected kind ${resolved.kind}`);
    }
    expect(resolved.config.retry).toEqual({
      maxRetries: 5,
      initialDelayMs: undefined,
      maxDelayMs: undefined,
      backoffFactor: undefined,
      retryableStatusCodes: [429],
    });
  });

  it('rejects unknown providers', () => {
    expect(() => resolveTargetDefinition({ name: 'x', provider: 'carrier-pigeon' }, {})).toThrow(
      "Unsupported provider 'carrier-pigeon' in target 'x'",
    );
  });
});

describe('targets file', () => {
  function writeTargets(content: string): string {
    const dir = mkdtempSync(path.join(tmpdir(), 'patchbench-targets-'));
    const filePath = path.join(dir, 'targets.yaml');
    writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  it('reads target definitions', async () => {
    const filePath = writeTargets(
      ['targets:', '  - name: default', '    provider: ollama', '  - name: dry', '    provider: mock', ''].join(
        '\n',
      ),
    );

    const definitions = await readTargetDefinitions(filePath);

    expect(listTargetNames(definitions)).toEqual(['default', 'dry']);
    expect(findTargetDefinition(definitions, 'dry')?.provider).toBe('mock');
    expect(findTargetDefinition(definitions, 'missing')).toBeUndefined();
  });

  it('requires a targets array', async () => {
    const filePath = writeTargets('targets: nope\n');

    await expect(readTargetDefinitions(filePath)).rejects.toThrow(
      `targets.yaml at ${filePath} must have a 'targets' array`,
    );
  });

  it('requires a provider on every entry', async () => {
    const filePath = writeTargets('targets:\n  - name: broken\n');

    await expect(readTargetDefinitions(filePath)).rejects.toThrow(
      `targets.yaml entry 'broken' in ${filePath} is missing a valid 'provider'`,
    );
  });
});
