/**
 * Generative-Text Service
 *
 * Per-call provider fallback:
 *   1. Primary (OpenAI) with the full message list.
 *   2. On any primary failure: warning diagnostic, then exactly one
 *      immediate call to Secondary (Gemini).
 *   3. On secondary failure: error diagnostic and empty text.
 *
 * Every call starts again at step 1. There is no breaker, cooldown or
 * backoff, and generate() never rejects.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/llm/service
 */

import { DEFAULT_TEMPERATURE } from './config.js';
import { toProviderError } from './errors.js';
import type { ProviderPair } from './providers.js';
import type {
  ChatMessage,
  Diagnostic,
  GenerationOutcome,
  ProviderKind,
  TextGenerator,
  TextProvider,
} from './types.js';

const PROVIDER_LABELS: Record<ProviderKind, string> = {
  openai: 'OpenAI',
  gemini: 'Gemini',
};

export class GenerativeTextService implements TextGenerator {
  private readonly primary: TextProvider | null;
  private readonly secondary: TextProvider;
  private readonly defaultTemperature: number;

  constructor(providers: ProviderPair, defaultTemperature: number = DEFAULT_TEMPERATURE) {
    this.primary = providers.primary;
    this.secondary = providers.secondary;
    this.defaultTemperature = defaultTemperature;
  }

  /**
   * Generate a completion for a message list.
   *
   * @param temperature - Sampling temperature in [0, 1]; defaults to the configured value
   */
  async generate(messages: ChatMessage[], temperature?: number): Promise<GenerationOutcome> {
    const request = { messages, temperature: temperature ?? this.defaultTemperature };
    const diagnostics: Diagnostic[] = [];

    if (this.primary) {
      try {
        const text = (await this.primary.complete(request)).trim();
        return { status: 'ok', text, provider: this.primary.kind, diagnostics };
      } catch (error) {
        const providerError = toProviderError(error, this.primary.kind);
        const label = PROVIDER_LABELS[this.primary.kind];
        const fallbackLabel = PROVIDER_LABELS[this.secondary.kind];
        const message = providerError.isQuotaExceeded
          ? `${label} API quota exceeded. Check the account's billing details and plan. Falling back to ${fallbackLabel}.`
          : `${label} API call failed: ${providerError.message}. Falling back to ${fallbackLabel}.`;
        console.error(`[GenerativeText] ${message}`);
        diagnostics.push({ level: 'warning', source: this.primary.kind, message });
      }
    }

    try {
      const text = (await this.secondary.complete(request)).trim();
      return { status: 'ok', text, provider: this.secondary.kind, diagnostics };
    } catch (error) {
      const providerError = toProviderError(error, this.secondary.kind);
      const message = `${PROVIDER_LABELS[this.secondary.kind]} API call failed: ${providerError.message}`;
      console.error(`[GenerativeText] ${message}`);
      diagnostics.push({ level: 'error', source: this.secondary.kind, message });
      return { status: 'failed', text: '', provider: null, diagnostics };
    }
  }
}
