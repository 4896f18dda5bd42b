/**
 * Unit tests for the config MCP tools
 *
 * Tools: study_config_get, study_config_set
 *
 * @module tests/unit/tools/config
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { configTools, handleConfigGet, handleConfigSet } from '../../../src/tools/config.js';
import { getConfig, resetState } from '../../../src/server/state.js';

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: { category: string; message: string };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

describe('configTools exports', () => {
  it('exports the 2 config tools', () => {
    expect(Object.keys(configTools)).toEqual(['study_config_get', 'study_config_set']);
  });
});

describe('handleConfigGet', () => {
  beforeEach(() => {
    resetState();
  });

  it('returns every setting', async () => {
    const response = parseResponse(await handleConfigGet({}));

    expect(response.data).toMatchObject({
      chunk_max_chars: 3000,
      salient_sentence_count: 3,
      clarifying_question_count: 2,
      review_question_count: 3,
      extraction_concurrency: 3,
      temperature: 0.7,
      max_upload_bytes: 20 * 1024 * 1024,
    });
  });

  it('returns one setting by key', async () => {
    const response = parseResponse(await handleConfigGet({ key: 'chunk_max_chars' }));
    expect(response.data).toMatchObject({ key: 'chunk_max_chars', value: 3000 });
  });

  it('rejects an unknown key', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const response = parseResponse(await handleConfigGet({ key: 'max_upload_bytes' }));
    expect(response.error?.category).toBe('VALIDATION_ERROR');
    vi.restoreAllMocks();
  });
});

describe('handleConfigSet', () => {
  beforeEach(() => {
    resetState();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    resetState();
    vi.restoreAllMocks();
  });

  it('updates an integer setting', async () => {
    const response = parseResponse(await handleConfigSet({ key: 'chunk_max_chars', value: 500 }));

    expect(response.data).toMatchObject({ key: 'chunk_max_chars', value: 500, updated: true });
    expect(getConfig().chunkMaxChars).toBe(500);
  });

  it('applies a change to every session', async () => {
    const response = parseResponse(
      await configTools.study_config_set.handler({ key: 'review_question_count', value: 5 }, { sessionId: 'http-a' })
    );
    expect(response.data?.scope).toBe('server');

    const other = parseResponse(
      await configTools.study_config_get.handler({ key: 'review_question_count' }, { sessionId: 'http-b' })
    );
    expect(other.data?.value).toBe(5);
  });

  it('updates the temperature', async () => {
    await handleConfigSet({ key: 'temperature', value: 0.25 });
    expect(getConfig().temperature).toBe(0.25);
  });

  it.each([
    ['chunk_max_chars', 50, 'chunk_max_chars must be an integer between 100 and 100000'],
    ['salient_sentence_count', 11, 'salient_sentence_count must be an integer between 1 and 10'],
    ['clarifying_question_count', 1.5, 'clarifying_question_count must be an integer between 1 and 10'],
    ['extraction_concurrency', 5, 'extraction_concurrency must be an integer between 1 and 4'],
    ['review_question_count', '3', 'review_question_count must be an integer between 1 and 10'],
    ['temperature', 1.2, 'temperature must be a number between 0 and 1'],
    ['temperature', true, 'temperature must be a number between 0 and 1'],
  ])('rejects %s=%j', async (key, value, message) => {
    const before = getConfig();
    const response = parseResponse(await handleConfigSet({ key, value }));

    expect(response.error?.category).toBe('VALIDATION_ERROR');
    expect(response.error?.message).toBe(message);
    expect(getConfig()).toEqual(before);
  });
});
