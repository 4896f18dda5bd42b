/**
 * Study Helper MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool. Each schema carries its own
 * constraints, messages and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

const nonBlank = (message: string) =>
  z.string().refine((value) => value.trim().length > 0, { message });

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Configuration keys that can be set
 */
export const ConfigKey = z.enum([
  'chunk_max_chars',
  'salient_sentence_count',
  'clarifying_question_count',
  'review_question_count',
  'extraction_concurrency',
  'temperature',
]);

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Standard base64 alphabet; padding optional */
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * One upload: a file on disk, or inline base64 bytes with a file name
 */
export const FileSourceInput = z
  .object({
    path: z.string().min(1).optional().describe('Path of a file readable by the server'),
    name: z.string().min(1).optional().describe('File name for inline content; its extension picks the parser'),
    content_base64: z
      .string()
      .min(1)
      .regex(BASE64_PATTERN, 'Not valid base64')
      .optional()
      .describe('File bytes, base64 encoded'),
  })
  .refine((f) => f.path !== undefined || (f.name !== undefined && f.content_base64 !== undefined), {
    message: 'Each file needs either path, or name with content_base64',
  });

export type FileSource = z.infer<typeof FileSourceInput>;

export const DocumentExtractInput = z.object({
  files: z.array(FileSourceInput).min(1, 'At least one file is required').max(20),
  include_text: z.boolean().default(false),
});

export const DocumentAnalyzeInput = z.object({
  files: z.array(FileSourceInput).min(1).max(20).optional(),
  text: z.string().optional(),
});

export const DocumentStatusInput = z.object({
  include_text: z.boolean().default(false),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CHAT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ChatAskInput = z.object({
  question: nonBlank('Question is required'),
});

export const ChatHistoryInput = z.object({
  limit: z.number().int().min(1).max(500).default(50),
});

// ═══════════════════════════════════════════════════════════════════════════════
// COMMUNITY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const AttachmentInput = z.object({
  file_name: z.string().min(1, 'Attachment file_name is required'),
  size_bytes: z.number().int().min(0),
});

export const PostCreateInput = z.object({
  title: nonBlank('Post title is required'),
  content: nonBlank('Post content is required'),
  attachments: z.array(AttachmentInput).max(20).default([]),
});

export const PostListInput = z.object({
  query: z.string().optional(),
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

export const PostGetInput = z.object({
  post_id: z.string().min(1, 'post_id is required'),
});

export const CommentAddInput = z.object({
  post_id: z.string().min(1, 'post_id is required'),
  text: nonBlank('Comment text is required'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default readable roots: home directory, /tmp, the working directory and
 * anything listed in STUDY_HELPER_ALLOWED_DIRS (comma-separated).
 */
function getDefaultAllowedBaseDirs(): string[] {
  const dirs = [path.resolve(homedir()), path.resolve('/tmp'), path.resolve(process.cwd())];

  const extraDirs = process.env.STUDY_HELPER_ALLOWED_DIRS;
  if (extraDirs) {
    for (const d of extraDirs.split(',')) {
      const trimmed = d.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }

  return dirs;
}

/**
 * Resolve a file path and confirm it stays inside the allowed directories.
 *
 * @throws ValidationError on null bytes or a path outside every allowed root
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);
  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `Set STUDY_HELPER_ALLOWED_DIRS (comma-separated) to allow more.`
    );
  }

  return resolved;
}
