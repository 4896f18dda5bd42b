/**
 * Configuration Management MCP Tools
 *
 * Tools: study_config_get, study_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

type ConfigKeyName = z.infer<typeof ConfigKey>;

type SettableConfig = Omit<ServerConfig, 'maxUploadBytes'>;

/** Map config keys to their state property names */
const CONFIG_KEY_MAP: Record<ConfigKeyName, keyof SettableConfig> = {
  chunk_max_chars: 'chunkMaxChars',
  salient_sentence_count: 'salientSentenceCount',
  clarifying_question_count: 'clarifyingQuestionCount',
  review_question_count: 'reviewQuestionCount',
  extraction_concurrency: 'extractionConcurrency',
  temperature: 'temperature',
};

function integerIn(key: ConfigKeyName, min: number, max: number) {
  return (v: string | number | boolean): number => {
    if (typeof v !== 'number' || !Number.isInteger(v) || v < min || v > max)
      throw validationError(`${key} must be an integer between ${min} and ${max}`, { value: v });
    return v;
  };
}

/** Validation rules per config key; each returns the accepted value */
const CONFIG_VALIDATORS: Record<ConfigKeyName, (value: string | number | boolean) => number> = {
  chunk_max_chars: integerIn('chunk_max_chars', 100, 100000),
  salient_sentence_count: integerIn('salient_sentence_count', 1, 10),
  clarifying_question_count: integerIn('clarifying_question_count', 1, 10),
  review_question_count: integerIn('review_question_count', 1, 10),
  extraction_concurrency: integerIn('extraction_concurrency', 1, 4),
  temperature: (v) => {
    if (typeof v !== 'number' || v < 0 || v > 1)
      throw validationError('temperature must be a number between 0 and 1', { value: v });
    return v;
  },
};

function setConfigValue(key: ConfigKeyName, value: string | number | boolean): number {
  const accepted = CONFIG_VALIDATORS[key](value);
  const updates: Partial<SettableConfig> = {};
  updates[CONFIG_KEY_MAP[key]] = accepted;
  updateConfig(updates);
  return accepted;
}

function configSnapshot(): Record<ConfigKeyName, number> & { max_upload_bytes: number } {
  const config = getConfig();
  return {
    chunk_max_chars: config.chunkMaxChars,
    salient_sentence_count: config.salientSentenceCount,
    clarifying_question_count: config.clarifyingQuestionCount,
    review_question_count: config.reviewQuestionCount,
    extraction_concurrency: config.extractionConcurrency,
    temperature: config.temperature,
    // Informational only
    max_upload_bytes: config.maxUploadBytes,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const snapshot = configSnapshot();

    const configNextSteps = [
      { tool: 'study_config_set', description: 'Change a configuration setting' },
      { tool: 'study_provider_status', description: 'Check provider routing' },
    ];

    if (input.key) {
      return formatResponse(
        successResult({ key: input.key, value: snapshot[input.key], next_steps: configNextSteps })
      );
    }

    return formatResponse(successResult({ ...snapshot, next_steps: configNextSteps }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    const value = setConfigValue(input.key, input.value);
    console.error(`[Config] ${input.key}=${value}`);

    return formatResponse(
      successResult({
        key: input.key,
        value,
        updated: true,
        // Server-wide: every session, stdio or HTTP, reads the same settings
        scope: 'server',
        next_steps: [
          { tool: 'study_config_get', description: 'Verify the updated configuration' },
          { tool: 'study_document_analyze', description: 'Analyze with the new settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const configTools: Record<string, ToolDefinition> = {
  study_config_get: {
    description:
      '[STATUS] Use to view pipeline configuration (chunk size, report counts, extraction concurrency, temperature). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  study_config_set: {
    description:
      '[SETUP] Use to change a pipeline setting (chunk size, report counts, extraction concurrency, temperature). Settings are server-wide and apply to every session. Returns the updated value.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
