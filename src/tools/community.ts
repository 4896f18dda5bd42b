/**
 * Community Board MCP Tools
 *
 * Tools: study_post_create, study_post_list, study_post_get, study_comment_add
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/community
 */

import { z } from 'zod';

import { successResult } from '../server/types.js';
import { postNotFoundError } from '../server/errors.js';
import { sessionManager } from '../server/transports/index.js';
import { extensionOf } from '../services/extraction/index.js';
import type { CommunityPost } from '../services/community/board.js';
import {
  validateInput,
  AttachmentInput,
  CommentAddInput,
  PostCreateInput,
  PostGetInput,
  PostListInput,
} from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  type ToolContext,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

function summarizePost(post: CommunityPost) {
  return {
    id: post.id,
    number: post.number,
    title: post.title,
    attachment_count: post.attachments.length,
    comment_count: post.comments.length,
    created_at: post.created_at,
  };
}

export async function handlePostCreate(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(PostCreateInput, params);
    const session = sessionManager.resolve(context.sessionId);

    const post = session.board.createPost({
      title: input.title,
      content: input.content,
      attachments: input.attachments.map((a) => ({
        file_name: a.file_name,
        ext: extensionOf(a.file_name),
        size_bytes: a.size_bytes,
      })),
    });

    return formatResponse(
      successResult({
        post,
        next_steps: [{ tool: 'study_comment_add', description: 'Comment on the post' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handlePostList(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(PostListInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const matches = session.board.listPosts(input.query);

    return formatResponse(
      successResult({
        posts: matches.slice(input.offset, input.offset + input.limit).map(summarizePost),
        total: matches.length,
        offset: input.offset,
        limit: input.limit,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handlePostGet(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(PostGetInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const post = session.board.getPost(input.post_id);
    if (!post) {
      throw postNotFoundError(input.post_id);
    }
    return formatResponse(successResult({ post }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleCommentAdd(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(CommentAddInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const comment = session.board.addComment(input.post_id, input.text);
    if (!comment) {
      throw postNotFoundError(input.post_id);
    }
    return formatResponse(successResult({ post_id: input.post_id, comment }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const communityTools: Record<string, ToolDefinition> = {
  study_post_create: {
    description:
      '[COMMUNITY] Use to publish a post on the session board with optional attachment metadata.',
    inputSchema: {
      title: z.string().min(1).describe('Post title'),
      content: z.string().min(1).describe('Post body'),
      attachments: z.array(AttachmentInput).max(20).default([]).describe('Attached file names and sizes'),
    },
    handler: handlePostCreate,
  },
  study_post_list: {
    description:
      '[COMMUNITY] Use to list board posts, optionally filtered by a case-insensitive search over title and content.',
    inputSchema: {
      query: z.string().optional().describe('Search text; empty lists every post'),
      limit: z.number().int().min(1).max(500).default(50).describe('Maximum posts to return'),
      offset: z.number().int().min(0).default(0).describe('Posts to skip for pagination'),
    },
    handler: handlePostList,
  },
  study_post_get: {
    description: '[COMMUNITY] Use to read one post with its attachments and comments.',
    inputSchema: {
      post_id: z.string().min(1).describe('Post id from study_post_list'),
    },
    handler: handlePostGet,
  },
  study_comment_add: {
    description: '[COMMUNITY] Use to add an anonymous comment to a post.',
    inputSchema: {
      post_id: z.string().min(1).describe('Post id from study_post_list'),
      text: z.string().min(1).describe('Comment text'),
    },
    handler: handleCommentAdd,
  },
};
