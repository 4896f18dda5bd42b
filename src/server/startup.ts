/**
 * Shared Startup Validation
 *
 * Validates provider settings and applies environment-driven config.
 * Used by both src/index.ts (stdio) and src/bin-http.ts.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { routesToSecondaryOnly } from '../services/llm/config.js';
import { getLlmConfig, updateConfig } from './state.js';

/**
 * Collect startup warnings for a provider configuration.
 * Warnings only: a missing key disables a provider, not the server.
 */
export function validateStartupDependencies(): string[] {
  const config = getLlmConfig();
  const warnings: string[] = [];

  if (!config.geminiApiKey) {
    warnings.push(
      'GEMINI_API_KEY is not set. Fallback generation and image text extraction will fail.'
    );
  }

  if (config.useGeminiAlways) {
    warnings.push('USE_GEMINI_ALWAYS is set. Every request goes straight to Gemini.');
  } else if (!config.openaiApiKey) {
    warnings.push('OPENAI_API_KEY is not set. Every request goes straight to Gemini.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  updateConfig({ temperature: config.temperature });
  console.error(
    `[Config] secondary_only=${routesToSecondaryOnly(config)} temperature=${config.temperature}`
  );

  return warnings;
}
