/**
 * Provider Status MCP Tools
 *
 * Tools: study_provider_status
 *
 * Reports provider configuration and routing without calling any provider.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { getLlmConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { sessionManager } from '../server/transports/index.js';
import { routesToSecondaryOnly } from '../services/llm/config.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleProviderStatus(): Promise<ToolResponse> {
  try {
    const config = getLlmConfig();
    const secondaryOnly = routesToSecondaryOnly(config);

    const warnings: string[] = [];
    if (!config.geminiApiKey) {
      warnings.push('GEMINI_API_KEY is not set: fallback generation and image extraction will fail');
    }
    if (secondaryOnly) {
      warnings.push(
        config.useGeminiAlways
          ? 'USE_GEMINI_ALWAYS is set: every request goes straight to Gemini'
          : 'OPENAI_API_KEY is not set: every request goes straight to Gemini'
      );
    }

    return formatResponse(
      successResult({
        primary: secondaryOnly ? null : { kind: 'openai', model: config.openaiModel },
        secondary: { kind: 'gemini', model: config.geminiModel },
        secondary_only: secondaryOnly,
        keys: {
          openai_api_key: config.openaiApiKey !== undefined,
          gemini_api_key: config.geminiApiKey !== undefined,
        },
        image_extraction_available: config.geminiApiKey !== undefined,
        default_temperature: config.temperature,
        active_sessions: sessionManager.getSessionCount(),
        warnings,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const healthTools: Record<string, ToolDefinition> = {
  study_provider_status: {
    description:
      '[STATUS] Use to check which generative providers are configured and how requests are routed (OpenAI first, Gemini as fallback).',
    inputSchema: {},
    handler: handleProviderStatus,
  },
};
