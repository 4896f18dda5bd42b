/**
 * Text Extraction
 * Exports the extractor, parsers and file-kind table
 */

export {
  TextExtractor,
  documentHeader,
  DEFAULT_EXTRACTION_CONCURRENCY,
  type UploadedFile,
  type ExtractedFile,
  type ExtractionStatus,
  type MergedDocument,
  type TextExtractorOptions,
} from './extractor.js';

export {
  parseDocx,
  parsePdf,
  parsePptx,
  extractSlideParagraphs,
  decodeXmlEntities,
  DEFAULT_PARSERS,
  type DocumentParser,
} from './parsers.js';

export {
  SUPPORTED_EXTENSIONS,
  UNSUPPORTED_FORMAT_MESSAGE,
  EXTRACTION_FAILURE_MESSAGES,
  IMAGE_EXTRACTION_UNAVAILABLE_MESSAGE,
  extensionOf,
  isSupportedExtension,
  type FileKind,
} from './file-kinds.js';
