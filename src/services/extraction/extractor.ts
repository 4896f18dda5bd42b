/**
 * Text Extractor
 *
 * Turns uploaded files into plain text. Extraction never rejects: an
 * unsupported kind yields the fixed unsupported-format message and a
 * parser failure yields the per-kind placeholder, both reported through
 * the file's status so callers can tell text from diagnostics.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/extraction/extractor
 */

import { mapWithConcurrency } from '../../utils/worker-pool.js';
import type { ImageTranscriber } from '../llm/providers.js';
import {
  EXTRACTION_FAILURE_MESSAGES,
  IMAGE_EXTRACTION_UNAVAILABLE_MESSAGE,
  UNSUPPORTED_FORMAT_MESSAGE,
  extensionOf,
  isImageKind,
  isSupportedExtension,
  mimeTypeOf,
  type DocumentKind,
} from './file-kinds.js';
import { DEFAULT_PARSERS, type DocumentParser } from './parsers.js';

export interface UploadedFile {
  name: string;
  data: Buffer;
  /** Overrides the kind derived from the name */
  ext?: string;
}

export type ExtractionStatus = 'ok' | 'failed' | 'unsupported';

export interface ExtractedFile {
  file_name: string;
  ext: string;
  status: ExtractionStatus;
  text: string;
  char_count: number;
  error?: string;
}

export interface MergedDocument {
  text: string;
  files: ExtractedFile[];
}

export interface TextExtractorOptions {
  parsers?: Partial<Record<DocumentKind, DocumentParser>>;
  /** null disables image extraction */
  transcribeImage?: ImageTranscriber | null;
}

export const DEFAULT_EXTRACTION_CONCURRENCY = 3;

export function documentHeader(fileName: string): string {
  return `\n\n--- ${fileName} ---\n\n`;
}

export class TextExtractor {
  private readonly parsers: Record<DocumentKind, DocumentParser>;
  private readonly transcribeImage: ImageTranscriber | null;

  constructor(options: TextExtractorOptions = {}) {
    this.parsers = { ...DEFAULT_PARSERS, ...options.parsers };
    this.transcribeImage = options.transcribeImage ?? null;
  }

  /** Text of one file, or the diagnostic string that stands in for it */
  async analyzeFile(file: UploadedFile): Promise<string> {
    return (await this.extractFile(file)).text;
  }

  async extractFile(file: UploadedFile): Promise<ExtractedFile> {
    const ext = (file.ext ?? extensionOf(file.name)).toLowerCase();

    if (!isSupportedExtension(ext)) {
      return result(file.name, ext, 'unsupported', UNSUPPORTED_FORMAT_MESSAGE);
    }

    if (isImageKind(ext)) {
      if (!this.transcribeImage) {
        return result(file.name, ext, 'failed', IMAGE_EXTRACTION_UNAVAILABLE_MESSAGE, 'GEMINI_API_KEY is not set');
      }
      try {
        const text = await this.transcribeImage(file.data, mimeTypeOf(ext));
        return result(file.name, ext, 'ok', text);
      } catch (error) {
        return this.failure(file.name, ext, error);
      }
    }

    try {
      const text = await this.parsers[ext](file.data);
      return result(file.name, ext, 'ok', text);
    } catch (error) {
      return this.failure(file.name, ext, error);
    }
  }

  /**
   * Extract several files with bounded concurrency and concatenate them
   * in input order, each preceded by its name header.
   */
  async mergeDocuments(
    files: UploadedFile[],
    concurrency: number = DEFAULT_EXTRACTION_CONCURRENCY
  ): Promise<MergedDocument> {
    const extracted = await mapWithConcurrency(files, concurrency, (file) => this.extractFile(file));
    const text = extracted.map((file) => documentHeader(file.file_name) + file.text).join('');
    return { text, files: extracted };
  }

  private failure(fileName: string, ext: keyof typeof EXTRACTION_FAILURE_MESSAGES, error: unknown): ExtractedFile {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Extractor] Failed to read ${fileName} (${ext}): ${message}`);
    return result(fileName, ext, 'failed', EXTRACTION_FAILURE_MESSAGES[ext], message);
  }
}

function result(
  fileName: string,
  ext: string,
  status: ExtractionStatus,
  text: string,
  error?: string
): ExtractedFile {
  return {
    file_name: fileName,
    ext,
    status,
    text,
    char_count: text.length,
    ...(error !== undefined ? { error } : {}),
  };
}
