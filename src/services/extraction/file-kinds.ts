/**
 * Supported upload kinds and the fixed diagnostic strings the extractor
 * returns in place of text.
 *
 * @module services/extraction/file-kinds
 */

export const SUPPORTED_EXTENSIONS = ['docx', 'pdf', 'pptx', 'png', 'jpg', 'jpeg'] as const;

export type FileKind = (typeof SUPPORTED_EXTENSIONS)[number];

export type DocumentKind = Extract<FileKind, 'docx' | 'pdf' | 'pptx'>;

export type ImageKind = Extract<FileKind, 'png' | 'jpg' | 'jpeg'>;

export function isSupportedExtension(ext: string): ext is FileKind {
  return SUPPORTED_EXTENSIONS.some((kind) => kind === ext);
}

export function isImageKind(kind: FileKind): kind is ImageKind {
  return kind === 'png' || kind === 'jpg' || kind === 'jpeg';
}

/**
 * Lower-cased text after the last dot. A name without a dot yields the
 * whole name, which is never a supported kind.
 */
export function extensionOf(fileName: string): string {
  const segments = fileName.split('.');
  return (segments[segments.length - 1] ?? '').toLowerCase();
}

export function mimeTypeOf(kind: ImageKind): 'image/png' | 'image/jpeg' {
  return kind === 'png' ? 'image/png' : 'image/jpeg';
}

export const UNSUPPORTED_FORMAT_MESSAGE =
  'Unsupported file format. Supported formats: PDF, PPTX, DOCX, PNG, JPG, JPEG.';

export const EXTRACTION_FAILURE_MESSAGES: Record<FileKind, string> = {
  docx: 'DOCX file could not be read.',
  pdf: 'PDF file could not be read.',
  pptx: 'PPTX file could not be read.',
  png: 'Image file could not be read.',
  jpg: 'Image file could not be read.',
  jpeg: 'Image file could not be read.',
};

export const IMAGE_EXTRACTION_UNAVAILABLE_MESSAGE =
  'Image text extraction is unavailable: GEMINI_API_KEY is not set.';
