/**
 * Unit tests for the provider status MCP tool
 *
 * @module tests/unit/tools/health
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { healthTools, handleProviderStatus } from '../../../src/tools/health.js';
import { resetState, setLlmConfig } from '../../../src/server/state.js';
import { sessionManager } from '../../../src/server/transports/session-manager.js';
import { LlmConfigSchema } from '../../../src/services/llm/config.js';

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: { category: string; message: string; recovery: { tool: string; hint: string } };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

describe('handleProviderStatus', () => {
  beforeEach(() => {
    resetState();
  });

  afterEach(() => {
    resetState();
    vi.unstubAllEnvs();
  });

  it('exports study_provider_status', () => {
    expect(Object.keys(healthTools)).toEqual(['study_provider_status']);
  });

  it('reports OpenAI first and Gemini as fallback when both keys are set', async () => {
    setLlmConfig(LlmConfigSchema.parse({ openaiApiKey: 'test-openai', geminiApiKey: 'test-gemini' }));
    sessionManager.getLocalSession();

    const response = parseResponse(await handleProviderStatus());

    expect(response.data).toEqual({
      primary: { kind: 'openai', model: 'gpt-4' },
      secondary: { kind: 'gemini', model: 'gemini-1.5-flash' },
      secondary_only: false,
      keys: { openai_api_key: true, gemini_api_key: true },
      image_extraction_available: true,
      default_temperature: 0.7,
      active_sessions: 1,
      warnings: [],
    });
  });

  it('warns when USE_GEMINI_ALWAYS bypasses OpenAI', async () => {
    setLlmConfig(
      LlmConfigSchema.parse({ openaiApiKey: 'test-openai', geminiApiKey: 'test-gemini', useGeminiAlways: true })
    );

    const response = parseResponse(await handleProviderStatus());

    expect(response.data?.primary).toBeNull();
    expect(response.data?.secondary_only).toBe(true);
    expect(response.data?.warnings).toEqual(['USE_GEMINI_ALWAYS is set: every request goes straight to Gemini']);
  });

  it('warns about both missing keys', async () => {
    setLlmConfig(LlmConfigSchema.parse({}));

    const response = parseResponse(await handleProviderStatus());

    expect(response.data?.image_extraction_available).toBe(false);
    expect(response.data?.warnings).toEqual([
      'GEMINI_API_KEY is not set: fallback generation and image extraction will fail',
      'OPENAI_API_KEY is not set: every request goes straight to Gemini',
    ]);
  });

  it('returns a configuration error for a malformed temperature in the environment', async () => {
    vi.stubEnv('LLM_TEMPERATURE', 'warm');

    const response = parseResponse(await handleProviderStatus());

    expect(response.success).toBe(false);
    expect(response.error?.category).toBe('CONFIGURATION_ERROR');
    expect(response.error?.message).toBe('Invalid numeric env var LLM_TEMPERATURE: "warm"');
    expect(response.error?.recovery.tool).toBe('study_provider_status');
  });
});
