/**
 * Unit tests for provider construction, prompt flattening, configuration
 * loading and error normalization. No provider is called.
 *
 * @module tests/unit/llm/providers
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  createProviders,
  createGeminiImageTranscriber,
  flattenToPrompt,
} from '../../../src/services/llm/providers.js';
import { loadLlmConfig, routesToSecondaryOnly, LlmConfigSchema } from '../../../src/services/llm/config.js';
import {
  ProviderError,
  ProviderNotConfiguredError,
  toProviderError,
} from '../../../src/services/llm/errors.js';

function config(overrides: Record<string, unknown> = {}) {
  return LlmConfigSchema.parse(overrides);
}

describe('flattenToPrompt', () => {
  it('prefixes every system message to the last user message', () => {
    const prompt = flattenToPrompt([
      { role: 'system', content: 'S1' },
      { role: 'system', content: 'S2' },
      { role: 'user', content: 'U1' },
      { role: 'assistant', content: 'A1' },
      { role: 'user', content: 'U2' },
    ]);
    expect(prompt).toBe('S1\n\nS2\n\nU2');
  });

  it('returns the user message alone when there is no system message', () => {
    expect(flattenToPrompt([{ role: 'user', content: 'only user' }])).toBe('only user');
  });

  it('returns the system content alone when there is no user message', () => {
    expect(flattenToPrompt([{ role: 'system', content: 'only system' }])).toBe('only system');
  });
});

describe('createProviders', () => {
  it('builds OpenAI primary and Gemini secondary when both keys are set', () => {
    const pair = createProviders(config({ openaiApiKey: 'test-openai', geminiApiKey: 'test-gemini' }));
    expect(pair.primary?.kind).toBe('openai');
    expect(pair.primary?.model).toBe('gpt-4');
    expect(pair.secondary.kind).toBe('gemini');
    expect(pair.secondary.model).toBe('gemini-1.5-flash');
  });

  it('leaves the primary empty when USE_GEMINI_ALWAYS is set', () => {
    const pair = createProviders(
      config({ openaiApiKey: 'test-openai', geminiApiKey: 'test-gemini', useGeminiAlways: true })
    );
    expect(pair.primary).toBeNull();
  });

  it('leaves the primary empty without an OpenAI key', () => {
    expect(createProviders(config({ geminiApiKey: 'test-gemini' })).primary).toBeNull();
  });

  it('builds a secondary that rejects when the Gemini key is missing', async () => {
    const pair = createProviders(config());
    await expect(
      pair.secondary.complete({ messages: [{ role: 'user', content: 'hi' }], temperature: 0.7 })
    ).rejects.toBeInstanceOf(ProviderNotConfiguredError);
  });
});

describe('createGeminiImageTranscriber', () => {
  it('returns null without a Gemini key', () => {
    expect(createGeminiImageTranscriber(config())).toBeNull();
  });

  it('returns a transcriber with a Gemini key', () => {
    expect(typeof createGeminiImageTranscriber(config({ geminiApiKey: 'test-gemini' }))).toBe('function');
  });
});

describe('loadLlmConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads keys, models, routing flag and temperature from the environment', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai');
    vi.stubEnv('GEMINI_API_KEY', ' test-gemini ');
    vi.stubEnv('OPENAI_MODEL', 'gpt-4o-mini');
    vi.stubEnv('GEMINI_MODEL', '');
    vi.stubEnv('USE_GEMINI_ALWAYS', 'TRUE');
    vi.stubEnv('LLM_TEMPERATURE', '0.2');

    expect(loadLlmConfig()).toEqual({
      openaiApiKey: 'test-openai',
      geminiApiKey: 'test-gemini',
      openaiModel: 'gpt-4o-mini',
      geminiModel: 'gemini-1.5-flash',
      useGeminiAlways: true,
      temperature: 0.2,
    });
  });

  it('treats blank keys as missing', () => {
    vi.stubEnv('OPENAI_API_KEY', '   ');
    vi.stubEnv('GEMINI_API_KEY', '');
    vi.stubEnv('USE_GEMINI_ALWAYS', '');
    vi.stubEnv('LLM_TEMPERATURE', '');

    const loaded = loadLlmConfig();
    expect(loaded.openaiApiKey).toBeUndefined();
    expect(loaded.geminiApiKey).toBeUndefined();
    expect(loaded.useGeminiAlways).toBe(false);
    expect(loaded.temperature).toBe(0.7);
    expect(routesToSecondaryOnly(loaded)).toBe(true);
  });

  it('rejects a non-numeric temperature', () => {
    vi.stubEnv('LLM_TEMPERATURE', 'warm');
    expect(() => loadLlmConfig()).toThrow('Invalid numeric env var LLM_TEMPERATURE: "warm"');
  });

  it('rejects a temperature outside 0..1', () => {
    vi.stubEnv('LLM_TEMPERATURE', '1.5');
    expect(() => loadLlmConfig()).toThrow();
  });

  it('lets overrides win over the environment', () => {
    vi.stubEnv('OPENAI_MODEL', 'gpt-4o-mini');
    expect(loadLlmConfig({ openaiModel: 'gpt-4' }).openaiModel).toBe('gpt-4');
  });
});

describe('toProviderError', () => {
  it('reads the status code from the SDK error', () => {
    const error = toProviderError(Object.assign(new Error('Too many requests'), { status: 429 }), 'openai');
    expect(error).toBeInstanceOf(ProviderError);
    expect(error.statusCode).toBe(429);
    expect(error.isQuotaExceeded).toBe(true);
    expect(error.provider).toBe('openai');
  });

  it('detects a 429 mentioned only in the message', () => {
    const error = toProviderError(new Error('[429 Too Many Requests] quota exhausted'), 'gemini');
    expect(error.statusCode).toBe(429);
  });

  it('leaves the status empty for other failures', () => {
    const error = toProviderError('socket hang up', 'openai');
    expect(error.message).toBe('socket hang up');
    expect(error.statusCode).toBeUndefined();
    expect(error.isQuotaExceeded).toBe(false);
  });

  it('passes a ProviderError through unchanged', () => {
    const original = new ProviderError('bad gateway', 'gemini', 502);
    expect(toProviderError(original, 'openai')).toBe(original);
  });
});
