/**
 * Generative-Text Service
 * Exports providers, configuration and the fallback service
 */

// Service
export { GenerativeTextService } from './service.js';

// Providers
export {
  createProviders,
  createOpenAIProvider,
  createGeminiProvider,
  createGeminiImageTranscriber,
  flattenToPrompt,
  type ProviderPair,
  type ImageTranscriber,
  type ImageMimeType,
} from './providers.js';

// Configuration
export {
  type LlmConfig,
  loadLlmConfig,
  routesToSecondaryOnly,
  LLM_MODELS,
  DEFAULT_TEMPERATURE,
} from './config.js';

// Errors
export { ProviderError, ProviderNotConfiguredError, toProviderError } from './errors.js';

// Types
export type {
  ChatMessage,
  ChatRole,
  CompletionRequest,
  Diagnostic,
  GenerationOutcome,
  ProviderKind,
  TextGenerator,
  TextProvider,
} from './types.js';
