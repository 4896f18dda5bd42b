/**
 * Summarization
 * Exports the chunk splitter, the chunked summary pipeline, review and chat
 */

export { splitIntoChunks, DEFAULT_CHUNK_MAX_CHARS } from './chunk-splitter.js';

export {
  runChunkedSummary,
  summarizeChunk,
  aggregateSummaries,
  DEFAULT_SUMMARY_OPTIONS,
  DEFAULT_SALIENT_SENTENCE_COUNT,
  DEFAULT_CLARIFYING_QUESTION_COUNT,
  type SummaryOptions,
  type SummaryReport,
  type SummaryStatus,
  type PartialSummary,
} from './pipeline.js';

export { reviewDocument, DEFAULT_REVIEW_QUESTION_COUNT, type DocumentReview } from './review.js';

export { askAboutDocument, type ChatAnswer } from './chat.js';

