/**
 * MCP Server State Management
 *
 * Holds the runtime configuration and the lazily built provider services.
 * Per-session study state lives in the session manager.
 *
 * @module server/state
 */

import { TextExtractor } from '../services/extraction/index.js';
import {
  GenerativeTextService,
  createGeminiImageTranscriber,
  createProviders,
  loadLlmConfig,
  DEFAULT_TEMPERATURE,
  type LlmConfig,
  type TextGenerator,
} from '../services/llm/index.js';
import {
  DEFAULT_CHUNK_MAX_CHARS,
  DEFAULT_CLARIFYING_QUESTION_COUNT,
  DEFAULT_REVIEW_QUESTION_COUNT,
  DEFAULT_SALIENT_SENTENCE_COUNT,
} from '../services/summarization/index.js';
import { configurationError } from './errors.js';
import { sessionManager } from './transports/session-manager.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  chunkMaxChars: DEFAULT_CHUNK_MAX_CHARS,
  salientSentenceCount: DEFAULT_SALIENT_SENTENCE_COUNT,
  clarifyingQuestionCount: DEFAULT_CLARIFYING_QUESTION_COUNT,
  reviewQuestionCount: DEFAULT_REVIEW_QUESTION_COUNT,
  extractionConcurrency: 3,
  temperature: DEFAULT_TEMPERATURE,
  maxUploadBytes: MAX_UPLOAD_BYTES,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  llmConfig: null,
  config: { ...defaultConfig },
};

let _textService: TextGenerator | null = null;
let _extractor: TextExtractor | null = null;

// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Provider settings from the environment. Loaded once; a malformed value
 * (e.g. LLM_TEMPERATURE=hot) throws a CONFIGURATION_ERROR on first access.
 */
export function getLlmConfig(): LlmConfig {
  if (!state.llmConfig) {
    try {
      state.llmConfig = loadLlmConfig();
    } catch (error) {
      throw configurationError(error instanceof Error ? error.message : String(error));
    }
  }
  return state.llmConfig;
}

export function getTextService(): TextGenerator {
  if (!_textService) {
    const config = getLlmConfig();
    _textService = new GenerativeTextService(createProviders(config), config.temperature);
  }
  return _textService;
}

export function getExtractor(): TextExtractor {
  if (!_extractor) {
    _extractor = new TextExtractor({ transcribeImage: createGeminiImageTranscriber(getLlmConfig()) });
  }
  return _extractor;
}

/** Replace the text service; null rebuilds from the environment on next use */
export function setTextService(service: TextGenerator | null): void {
  _textService = service;
}

/** Replace the extractor; null rebuilds from the environment on next use */
export function setExtractor(extractor: TextExtractor | null): void {
  _extractor = extractor;
}

/** Use explicit provider settings instead of the environment */
export function setLlmConfig(config: LlmConfig | null): void {
  state.llmConfig = config;
  _textService = null;
  _extractor = null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

export function resetConfig(): void {
  state.config = { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  state.llmConfig = null;
  state.config = { ...defaultConfig };
  _textService = null;
  _extractor = null;
  sessionManager.clear();
}
