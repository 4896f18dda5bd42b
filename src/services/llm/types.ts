/**
 * Generative-Text Types
 *
 * @module services/llm/types
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Closed set of provider backends, in primary -> secondary order */
export type ProviderKind = 'openai' | 'gemini';

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature: number;
}

/**
 * One provider backend. `complete` resolves with the raw completion text
 * and rejects on any failure.
 */
export type TextProvider =
  | { kind: 'openai'; model: string; complete: (request: CompletionRequest) => Promise<string> }
  | { kind: 'gemini'; model: string; complete: (request: CompletionRequest) => Promise<string> };

export type DiagnosticLevel = 'warning' | 'error';

/** User-visible notice raised while serving a request */
export interface Diagnostic {
  level: DiagnosticLevel;
  source: string;
  message: string;
}

export type GenerationOutcome =
  | { status: 'ok'; text: string; provider: ProviderKind; diagnostics: Diagnostic[] }
  | { status: 'failed'; text: ''; provider: null; diagnostics: Diagnostic[] };

/** Anything that serves generate() with the fallback contract */
export interface TextGenerator {
  generate(messages: ChatMessage[], temperature?: number): Promise<GenerationOutcome>;
}
