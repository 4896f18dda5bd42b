/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { LlmConfig } from '../services/llm/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runtime pipeline settings, changeable through study_config_set
 */
export interface ServerConfig {
  /** Chunk width in UTF-16 code units (default: 3000) */
  chunkMaxChars: number;

  /** Salient sentences requested from the aggregation call (default: 3) */
  salientSentenceCount: number;

  /** Clarifying questions requested from the aggregation call (default: 2) */
  clarifyingQuestionCount: number;

  /** Author questions requested by the document review (default: 3) */
  reviewQuestionCount: number;

  /** Files extracted in parallel by a multi-file upload, 1-4 (default: 3) */
  extractionConcurrency: number;

  /** Sampling temperature, 0-1 (default: 0.7) */
  temperature: number;

  /** Per-file upload limit in bytes (default: 20 MiB) */
  maxUploadBytes: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Provider settings read from the environment, loaded on first use */
  llmConfig: LlmConfig | null;

  /** Server configuration */
  config: ServerConfig;
}
