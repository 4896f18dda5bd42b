/**
 * Question answering over the loaded document.
 *
 * @module services/summarization/chat
 */

import type { ChatMessage, Diagnostic, ProviderKind, TextGenerator } from '../llm/types.js';
import { documentChatMessages } from './prompts.js';

export interface ChatAnswer {
  answer: string;
  provider: ProviderKind | null;
  diagnostics: Diagnostic[];
}

/**
 * Ask one question. Only the document and the new question are sent; the
 * running history is recorded by the caller, not replayed to the model.
 */
export async function askAboutDocument(
  generator: TextGenerator,
  documentText: string,
  question: string,
  temperature?: number
): Promise<ChatAnswer> {
  const messages: ChatMessage[] = documentChatMessages(documentText, question);
  const outcome = await generator.generate(messages, temperature);
  return { answer: outcome.text, provider: outcome.provider, diagnostics: outcome.diagnostics };
}
