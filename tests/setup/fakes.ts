/**
 * Test doubles for the generative-text layer.
 *
 * @module tests/setup/fakes
 */

import type {
  ChatMessage,
  CompletionRequest,
  GenerationOutcome,
  TextGenerator,
  TextProvider,
} from '../../src/services/llm/types.js';

export interface RecordedCall {
  messages: ChatMessage[];
  temperature?: number;
}

/**
 * Generator that answers from a script, one entry per call. A null entry
 * produces a failed outcome with one error diagnostic. Calls past the end
 * of the script answer "unexpected call".
 */
export class ScriptedGenerator implements TextGenerator {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: Array<string | null>) {}

  async generate(messages: ChatMessage[], temperature?: number): Promise<GenerationOutcome> {
    const index = this.calls.length;
    this.calls.push({ messages, temperature });
    const entry = index < this.script.length ? this.script[index] : 'unexpected call';

    if (entry === null) {
      return {
        status: 'failed',
        text: '',
        provider: null,
        diagnostics: [{ level: 'error', source: 'gemini', message: `Gemini API call failed: call ${index + 1}` }],
      };
    }
    return { status: 'ok', text: entry, provider: 'openai', diagnostics: [] };
  }

  /** Content of the last user message of call n (0-based) */
  userContent(n: number): string {
    const messages = this.calls[n].messages;
    return messages.filter((m) => m.role === 'user').map((m) => m.content).join('\n');
  }

  systemContent(n: number): string {
    const messages = this.calls[n].messages;
    return messages.filter((m) => m.role === 'system').map((m) => m.content).join('\n');
  }
}

export function openaiProvider(
  complete: (request: CompletionRequest) => Promise<string>,
  model = 'gpt-test'
): TextProvider {
  return { kind: 'openai', model, complete };
}

export function geminiProvider(
  complete: (request: CompletionRequest) => Promise<string>,
  model = 'gemini-test'
): TextProvider {
  return { kind: 'gemini', model, complete };
}
