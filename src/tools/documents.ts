/**
 * Document MCP Tools
 *
 * Tools: study_document_extract, study_document_analyze,
 *        study_document_review, study_document_status
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/documents
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

import { getConfig, getExtractor, getTextService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { documentNotLoadedError, fileTooLargeError, pathNotFoundError } from '../server/errors.js';
import { sessionManager, type StudySession } from '../server/transports/index.js';
import type { ExtractedFile, UploadedFile } from '../services/extraction/index.js';
import type { Diagnostic } from '../services/llm/types.js';
import { reviewDocument, runChunkedSummary } from '../services/summarization/index.js';
import {
  validateInput,
  sanitizePath,
  DocumentAnalyzeInput,
  DocumentExtractInput,
  DocumentStatusInput,
  FileSourceInput,
  type FileSource,
} from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  preview,
  type ToolContext,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// UPLOAD LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Read one upload into memory, enforcing the per-file size limit before
 * any bytes are parsed.
 */
export async function loadUpload(source: FileSource, maxBytes: number): Promise<UploadedFile> {
  if (source.path !== undefined) {
    const resolved = sanitizePath(source.path);
    const stat = await fs.stat(resolved).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw pathNotFoundError(resolved);
      }
      throw error;
    });
    if (!stat.isFile()) {
      throw pathNotFoundError(resolved);
    }
    if (stat.size > maxBytes) {
      throw fileTooLargeError(resolved, stat.size, maxBytes);
    }
    return { name: source.name ?? path.basename(resolved), data: await fs.readFile(resolved) };
  }

  const name = source.name ?? 'upload';
  const data = Buffer.from(source.content_base64 ?? '', 'base64');
  if (data.length > maxBytes) {
    throw fileTooLargeError(name, data.length, maxBytes);
  }
  return { name, data };
}

function extractionDiagnostics(files: ExtractedFile[]): Diagnostic[] {
  return files
    .filter((file) => file.status !== 'ok')
    .map((file) => ({
      level: 'warning' as const,
      source: 'extractor',
      message: `${file.file_name}: ${file.text}`,
    }));
}

function describeFiles(files: ExtractedFile[]) {
  return files.map((file) => ({
    file_name: file.file_name,
    ext: file.ext,
    status: file.status,
    char_count: file.char_count,
    ...(file.error !== undefined ? { error: file.error } : {}),
  }));
}

async function extractIntoSession(session: StudySession, sources: FileSource[]) {
  const config = getConfig();
  const uploads: UploadedFile[] = [];
  for (const source of sources) {
    uploads.push(await loadUpload(source, config.maxUploadBytes));
  }

  const merged = await getExtractor().mergeDocuments(uploads, config.extractionConcurrency);
  const document = sessionManager.loadDocument(session, merged.text, merged.files);
  console.error(
    `[Extractor] Loaded ${merged.files.length} file(s), ${merged.text.length} chars into session ${session.sessionId}`
  );
  return document;
}

function requireDocument(session: StudySession) {
  if (!session.document) {
    throw documentNotLoadedError();
  }
  return session.document;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleDocumentExtract(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentExtractInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const document = await extractIntoSession(session, input.files);

    return formatResponse(
      successResult({
        files: describeFiles(document.files),
        total_chars: document.text.length,
        ...(input.include_text ? { text: preview(document.text) } : {}),
        diagnostics: extractionDiagnostics(document.files),
        next_steps: [
          { tool: 'study_document_analyze', description: 'Summarize the loaded document' },
          { tool: 'study_document_review', description: 'Review the loaded document' },
          { tool: 'study_chat_ask', description: 'Ask a question about the document' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentAnalyze(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentAnalyzeInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const config = getConfig();

    let extraction: Diagnostic[] = [];
    if (input.files) {
      const document = await extractIntoSession(session, input.files);
      extraction = extractionDiagnostics(document.files);
    } else if (input.text !== undefined) {
      sessionManager.loadDocument(session, input.text, []);
    }

    const document = requireDocument(session);
    const report = await runChunkedSummary(getTextService(), document.text, {
      chunkMaxChars: config.chunkMaxChars,
      salientSentenceCount: config.salientSentenceCount,
      clarifyingQuestionCount: config.clarifyingQuestionCount,
      temperature: config.temperature,
    });
    session.report = report;

    return formatResponse(
      successResult({
        status: report.status,
        report: report.report,
        chunk_count: report.chunk_count,
        partials: report.partials,
        aggregated_by: report.aggregated_by,
        diagnostics: [...extraction, ...report.diagnostics],
        next_steps: [
          { tool: 'study_document_review', description: 'Get review questions and corrections' },
          { tool: 'study_chat_ask', description: 'Ask a follow-up question' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentReview(
  _params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const session = sessionManager.resolve(context.sessionId);
    const document = requireDocument(session);
    const config = getConfig();

    const review = await reviewDocument(
      getTextService(),
      document.text,
      config.reviewQuestionCount,
      config.temperature
    );
    session.review = review;

    return formatResponse(
      successResult({
        summary: review.summary,
        questions: review.questions,
        corrections: review.corrections,
        diagnostics: review.diagnostics,
        next_steps: [{ tool: 'study_chat_ask', description: 'Discuss the document' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentStatus(
  params: Record<string, unknown>,
  context: ToolContext = {}
): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentStatusInput, params);
    const session = sessionManager.resolve(context.sessionId);
    const document = session.document;

    return formatResponse(
      successResult({
        session_id: session.sessionId,
        loaded: document !== null,
        ...(document
          ? {
              files: describeFiles(document.files),
              total_chars: document.text.length,
              loaded_at: new Date(document.loadedAt).toISOString(),
              ...(input.include_text ? { text: preview(document.text) } : {}),
            }
          : {}),
        has_report: session.report !== null,
        has_review: session.review !== null,
        chat_messages: session.chatHistory.length,
        posts: session.board.size,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const documentTools: Record<string, ToolDefinition> = {
  study_document_extract: {
    description:
      '[SETUP] Use to load study material. Extracts text from DOCX, PDF, PPTX, PNG and JPG files and loads the merged text into this session.',
    inputSchema: {
      files: z.array(FileSourceInput).min(1).max(20).describe('Files to extract, in merge order'),
      include_text: z.boolean().default(false).describe('Include a preview of the merged text'),
    },
    handler: handleDocumentExtract,
  },
  study_document_analyze: {
    description:
      '[CORE] Use to summarize a document. Splits it into chunks, summarizes each, and returns an overall summary with salient sentences and clarifying questions.',
    inputSchema: {
      files: z.array(FileSourceInput).min(1).max(20).optional().describe('Files to extract first (replaces the loaded document)'),
      text: z.string().optional().describe('Raw text to analyze instead of files (replaces the loaded document)'),
    },
    handler: handleDocumentAnalyze,
  },
  study_document_review: {
    description:
      '[CORE] Use to review the loaded document: summary and key points, questions for the author, and spelling/grammar corrections.',
    inputSchema: {},
    handler: handleDocumentReview,
  },
  study_document_status: {
    description: '[STATUS] Use to see what is loaded in this session.',
    inputSchema: {
      include_text: z.boolean().default(false).describe('Include a preview of the loaded text'),
    },
    handler: handleDocumentStatus,
  },
};
