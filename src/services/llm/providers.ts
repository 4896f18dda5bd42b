/**
 * Provider Adapters
 *
 * Wraps the OpenAI and Gemini SDK clients behind the TextProvider variant.
 * API keys come from the LlmConfig passed in; SDK default timeouts apply.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/llm/providers
 */

import OpenAI from 'openai';
import { GoogleGenAI } from '@google/genai';

import type { LlmConfig } from './config.js';
import { ProviderNotConfiguredError } from './errors.js';
import type { ChatMessage, CompletionRequest, TextProvider } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// PROMPT SHAPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Collapse a message list into the single prompt the Gemini path takes:
 * every system message, then the content of the last user message.
 */
export function flattenToPrompt(messages: ChatMessage[]): string {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  let lastUser = '';
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') {
      lastUser = messages[i].content;
      break;
    }
  }

  if (system && lastUser) return `${system}\n\n${lastUser}`;
  return system || lastUser;
}

function toOpenAIMessage(message: ChatMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createOpenAIProvider(apiKey: string, model: string): TextProvider {
  const client = new OpenAI({ apiKey });

  return {
    kind: 'openai',
    model,
    complete: async ({ messages, temperature }: CompletionRequest) => {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map(toOpenAIMessage),
        temperature,
      });
      return response.choices[0]?.message.content ?? '';
    },
  };
}

export function createGeminiProvider(apiKey: string | undefined, model: string): TextProvider {
  if (!apiKey) {
    return {
      kind: 'gemini',
      model,
      complete: async () => {
        throw new ProviderNotConfiguredError('gemini', 'GEMINI_API_KEY');
      },
    };
  }

  const ai = new GoogleGenAI({ apiKey });

  return {
    kind: 'gemini',
    model,
    complete: async ({ messages, temperature }: CompletionRequest) => {
      const response = await ai.models.generateContent({
        model,
        contents: flattenToPrompt(messages),
        config: { temperature },
      });
      return response.text ?? '';
    },
  };
}

export interface ProviderPair {
  /** Absent when the primary provider is bypassed */
  primary: TextProvider | null;
  secondary: TextProvider;
}

/**
 * Build the provider pair for a configuration.
 * The primary slot is left empty when USE_GEMINI_ALWAYS is set or no
 * OpenAI key is available.
 */
export function createProviders(config: LlmConfig): ProviderPair {
  const primary =
    !config.useGeminiAlways && config.openaiApiKey
      ? createOpenAIProvider(config.openaiApiKey, config.openaiModel)
      : null;

  return {
    primary,
    secondary: createGeminiProvider(config.geminiApiKey, config.geminiModel),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// IMAGE TRANSCRIPTION
// ═══════════════════════════════════════════════════════════════════════════════

export type ImageMimeType = 'image/png' | 'image/jpeg';

/** Returns the text found in an image; rejects on failure */
export type ImageTranscriber = (data: Buffer, mimeType: ImageMimeType) => Promise<string>;

const IMAGE_TRANSCRIPTION_PROMPT =
  'Transcribe all readable text in this image exactly as it appears, preserving line breaks. ' +
  'If there is no text, briefly describe the image content instead. Respond with plain text only.';

/**
 * Image-to-text through the Gemini multimodal endpoint.
 * Returns null when no Gemini key is configured.
 */
export function createGeminiImageTranscriber(config: LlmConfig): ImageTranscriber | null {
  if (!config.geminiApiKey) return null;

  const ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  const model = config.geminiModel;

  return async (data, mimeType) => {
    const response = await ai.models.generateContent({
      model,
      contents: [
        {
          role: 'user',
          parts: [
            { inlineData: { mimeType, data: data.toString('base64') } },
            { text: IMAGE_TRANSCRIPTION_PROMPT },
          ],
        },
      ],
      config: { temperature: 0 },
    });
    return (response.text ?? '').trim();
  };
}
