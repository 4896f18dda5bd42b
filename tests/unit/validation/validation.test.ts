/**
 * Unit tests for input validation schemas and path sanitization
 *
 * @module tests/unit/validation/validation
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import * as path from 'path';
import {
  validateInput,
  sanitizePath,
  ValidationError,
  ChatHistoryInput,
  DocumentExtractInput,
  FileSourceInput,
  PostCreateInput,
  PostListInput,
  CommentAddInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('returns parsed data with defaults applied', () => {
    expect(validateInput(PostListInput, {})).toEqual({ limit: 50, offset: 0 });
    expect(validateInput(ChatHistoryInput, { limit: 5 })).toEqual({ limit: 5 });
  });

  it('joins every issue with its path', () => {
    expect(() => validateInput(PostCreateInput, { title: '', content: '' })).toThrow(
      'title: Post title is required; content: Post content is required'
    );
  });

  it('throws ValidationError', () => {
    expect(() => validateInput(CommentAddInput, { post_id: 'p', text: '\n' })).toThrow(ValidationError);
  });
});

describe('FileSourceInput', () => {
  it('accepts a path alone', () => {
    expect(FileSourceInput.safeParse({ path: '/tmp/a.pdf' }).success).toBe(true);
  });

  it('accepts a name with inline content', () => {
    expect(FileSourceInput.safeParse({ name: 'a.pdf', content_base64: 'QQ==' }).success).toBe(true);
  });

  it('rejects inline content that is not base64', () => {
    const result = FileSourceInput.safeParse({ name: 'a.pdf', content_base64: 'not base64!' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0].message).toBe('Not valid base64');
      expect(result.error.errors[0].path).toEqual(['content_base64']);
    }
  });

  it('rejects inline content without a name', () => {
    expect(FileSourceInput.safeParse({ content_base64: 'QQ==' }).success).toBe(false);
  });

  it('caps an extraction at 20 files', () => {
    const files = Array.from({ length: 21 }, (_, i) => ({ path: `/tmp/${i}.pdf` }));
    expect(DocumentExtractInput.safeParse({ files }).success).toBe(false);
  });
});

describe('PostCreateInput', () => {
  it('defaults attachments to an empty list', () => {
    expect(validateInput(PostCreateInput, { title: 'T', content: 'C' })).toEqual({
      title: 'T',
      content: 'C',
      attachments: [],
    });
  });

  it('rejects a negative attachment size', () => {
    expect(
      PostCreateInput.safeParse({ title: 'T', content: 'C', attachments: [{ file_name: 'a.pdf', size_bytes: -1 }] })
        .success
    ).toBe(false);
  });
});

describe('sanitizePath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('resolves a path inside an allowed directory', () => {
    expect(sanitizePath('/srv/notes/../notes/a.pdf', ['/srv/notes'])).toBe(path.resolve('/srv/notes/a.pdf'));
  });

  it('rejects a path that escapes the allowed directories', () => {
    expect(() => sanitizePath('/srv/notes/../secrets.txt', ['/srv/notes'])).toThrow(ValidationError);
  });

  it('rejects a sibling directory sharing the prefix', () => {
    expect(() => sanitizePath('/srv/notes-old/a.pdf', ['/srv/notes'])).toThrow(ValidationError);
  });

  it('rejects null bytes', () => {
    expect(() => sanitizePath('/tmp/a\0.pdf')).toThrow('Path contains null bytes');
  });

  it('adds directories from STUDY_HELPER_ALLOWED_DIRS', () => {
    vi.stubEnv('STUDY_HELPER_ALLOWED_DIRS', ' /srv/shared , /srv/other');
    expect(sanitizePath('/srv/other/a.pdf')).toBe(path.resolve('/srv/other/a.pdf'));
  });
});
