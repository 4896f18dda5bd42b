/**
 * Document Parsers
 *
 * One parser per document kind, each taking the raw upload bytes and
 * resolving to plain text. Parsers reject on malformed input; the
 * extractor turns rejections into placeholders.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/extraction/parsers
 */

import mammoth from 'mammoth';
import JSZip from 'jszip';
import { getDocument, VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { DocumentKind } from './file-kinds.js';

export type DocumentParser = (data: Buffer) => Promise<string>;

// ═══════════════════════════════════════════════════════════════════════════════
// DOCX
// ═══════════════════════════════════════════════════════════════════════════════

export async function parseDocx(data: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: data });
  return result.value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PDF
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Page texts in page order, joined with a newline.
 * pdfjs prints its warnings with console.log, so only errors are enabled.
 */
export async function parsePdf(data: Buffer): Promise<string> {
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: true,
    verbosity: VerbosityLevel.ERRORS,
  });

  const pdf = await loadingTask.promise.catch(async (error: unknown) => {
    await loadingTask.destroy();
    throw error;
  });

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str + (item.hasEOL ? '\n' : '');
        }
      }
      pages.push(text.trimEnd());
      page.cleanup();
    }
    return pages.join('\n');
  } finally {
    await pdf.destroy();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PPTX
// ═══════════════════════════════════════════════════════════════════════════════

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/;

function slideNumber(path: string): number {
  const match = SLIDE_PATH.exec(path);
  return match ? Number.parseInt(match[1], 10) : Number.MAX_SAFE_INTEGER;
}

export function decodeXmlEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Paragraph texts of one slide, in document order. Runs inside a
 * paragraph are concatenated; paragraphs without runs are skipped.
 */
export function extractSlideParagraphs(xml: string): string[] {
  const withoutEmpty = xml.replace(/<a:p(?:\s[^>]*)?\/>/g, '');
  const paragraphs: string[] = [];

  for (const paragraph of withoutEmpty.matchAll(/<a:p(?:\s[^>]*)?>([\s\S]*?)<\/a:p>/g)) {
    const runs = [...paragraph[1].matchAll(/<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>/g)].map((run) =>
      decodeXmlEntities(run[1])
    );
    if (runs.length > 0) {
      paragraphs.push(runs.join(''));
    }
  }

  return paragraphs;
}

/** Slide texts in slide-number order, every paragraph on its own line */
export async function parsePptx(data: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(data);
  const slidePaths = Object.keys(zip.files)
    .filter((path) => SLIDE_PATH.test(path))
    .sort((a, b) => slideNumber(a) - slideNumber(b));

  if (slidePaths.length === 0) {
    throw new Error('Presentation contains no slides');
  }

  const lines: string[] = [];
  for (const path of slidePaths) {
    const entry = zip.file(path);
    if (!entry) continue;
    lines.push(...extractSlideParagraphs(await entry.async('string')));
  }
  return lines.join('\n');
}

export const DEFAULT_PARSERS: Record<DocumentKind, DocumentParser> = {
  docx: parseDocx,
  pdf: parsePdf,
  pptx: parsePptx,
};
