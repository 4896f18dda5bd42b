/**
 * Generative-Text Provider Configuration
 *
 * Two provider slots, tried in order on every call:
 *   OpenAI  - primary, chat-completion API (message list + temperature)
 *   Gemini  - secondary, single-prompt generateContent API
 *
 * The parsed value is passed into the provider clients when they are
 * constructed; nothing here is read again after startup.
 *
 * @module services/llm/config
 */

import { z } from 'zod';

export const LLM_MODELS = {
  OPENAI_DEFAULT: 'gpt-4',
  GEMINI_DEFAULT: 'gemini-1.5-flash',
} as const;

export const DEFAULT_TEMPERATURE = 0.7;

export const LlmConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  geminiApiKey: z.string().min(1).optional(),

  openaiModel: z.string().min(1).default(LLM_MODELS.OPENAI_DEFAULT),
  geminiModel: z.string().min(1).default(LLM_MODELS.GEMINI_DEFAULT),

  // Skip the primary provider entirely and send every call to Gemini
  useGeminiAlways: z.boolean().default(false),

  temperature: z.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

function parseBooleanEnv(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw.trim().toLowerCase() === 'true';
}

function parseFloatEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Load provider configuration from environment variables.
 *
 * Environment variables:
 *   OPENAI_API_KEY     - enables the primary provider
 *   GEMINI_API_KEY     - enables the secondary provider and image transcription
 *   OPENAI_MODEL       - chat model (default: gpt-4)
 *   GEMINI_MODEL       - Gemini model (default: gemini-1.5-flash)
 *   USE_GEMINI_ALWAYS  - "true" routes every call to Gemini
 *   LLM_TEMPERATURE    - default sampling temperature (default: 0.7)
 */
export function loadLlmConfig(overrides?: Partial<LlmConfig>): LlmConfig {
  const envConfig = {
    openaiApiKey: emptyToUndefined(process.env.OPENAI_API_KEY),
    geminiApiKey: emptyToUndefined(process.env.GEMINI_API_KEY),
    openaiModel: emptyToUndefined(process.env.OPENAI_MODEL),
    geminiModel: emptyToUndefined(process.env.GEMINI_MODEL),
    useGeminiAlways: parseBooleanEnv('USE_GEMINI_ALWAYS'),
    temperature: parseFloatEnv('LLM_TEMPERATURE'),
  };

  return LlmConfigSchema.parse({ ...envConfig, ...overrides });
}

/**
 * True when calls should bypass the primary provider.
 */
export function routesToSecondaryOnly(config: LlmConfig): boolean {
  return config.useGeminiAlways || !config.openaiApiKey;
}
