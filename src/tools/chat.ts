/**
 * Document Chat MCP Tools
 *
 * Tools: study_chat_ask, study_chat_history, study_chat_clear
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/chat
 */

import { z } from 'zod';

import { getConfig, getTextService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { documentNotLoadedError } from '../server/errors.js';
import { sessionManager } from '../server/transports/index.js';
import { askAboutDocument } from '../services/summarization/index.js';
import { validateInput, ChatAskInput, ChatHistoryInput } from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  type ToolContext,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

export async function handleChatAsk(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(ChatAskInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const document = session.document;
    if (!document) {
      throw documentNotLoadedError();
    }

    const result = await askAboutDocument(getTextService(), document.text, input.question, getConfig().temperature);

    // A document loaded while waiting starts its own history
    const recorded = session.document === document;
    if (recorded) {
      session.chatHistory.push(
        { role: 'user', content: input.question },
        { role: 'assistant', content: result.answer }
      );
    } else {
      console.error('[Chat] Document replaced during the question; answer not added to the new history');
    }

    return formatResponse(
      successResult({
        answer: result.answer,
        provider: result.provider,
        recorded,
        history_length: session.chatHistory.length,
        diagnostics: result.diagnostics,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleChatHistory(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(ChatHistoryInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const history = session.chatHistory;

    return formatResponse(
      successResult({
        messages: history.slice(-input.limit),
        total: history.length,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleChatClear(
  _params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const session = sessionManager.resolve(context.sessionId);
    const cleared = session.chatHistory.length;
    session.chatHistory = [];
    return formatResponse(successResult({ cleared }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const chatTools: Record<string, ToolDefinition> = {
  study_chat_ask: {
    description:
      '[CORE] Use to ask a question about the loaded document. The answer is based on the document text and recorded in the chat history.',
    inputSchema: {
      question: z.string().min(1).describe('Question about the loaded document'),
    },
    handler: handleChatAsk,
  },
  study_chat_history: {
    description: '[STATUS] Use to list the chat history of this session, oldest first.',
    inputSchema: {
      limit: z.number().int().min(1).max(500).default(50).describe('Most recent messages to return'),
    },
    handler: handleChatHistory,
  },
  study_chat_clear: {
    description: '[MANAGE] Use to clear the chat history of this session.',
    inputSchema: {},
    handler: handleChatClear,
  },
};
