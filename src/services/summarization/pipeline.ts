/**
 * Chunked Summary Pipeline
 *
 * text -> fixed-width chunks -> one partial summary per chunk (sequential)
 * -> one aggregation call over the joined partials -> final report.
 *
 * A chunk whose summary fails on both providers leaves an empty partial
 * and the run continues. The report is opaque model output; its sections
 * are requested in the prompt and never parsed.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/summarization/pipeline
 */

import type { Diagnostic, GenerationOutcome, ProviderKind, TextGenerator } from '../llm/types.js';
import { DEFAULT_CHUNK_MAX_CHARS, splitIntoChunks } from './chunk-splitter.js';
import { aggregateMessages, partialSummaryMessages, type AggregateCounts } from './prompts.js';

export const DEFAULT_SALIENT_SENTENCE_COUNT = 3;
export const DEFAULT_CLARIFYING_QUESTION_COUNT = 2;

export interface SummaryOptions extends AggregateCounts {
  chunkMaxChars: number;
  temperature?: number;
}

export const DEFAULT_SUMMARY_OPTIONS: SummaryOptions = {
  chunkMaxChars: DEFAULT_CHUNK_MAX_CHARS,
  salientSentenceCount: DEFAULT_SALIENT_SENTENCE_COUNT,
  clarifyingQuestionCount: DEFAULT_CLARIFYING_QUESTION_COUNT,
};

export interface PartialSummary {
  /** 1-based position */
  position: number;
  char_count: number;
  summary: string;
  provider: ProviderKind | null;
}

/**
 * empty: no text, no calls. failed: no report text. partial: report built
 * without one or more chunks. complete: every chunk contributed.
 */
export type SummaryStatus = 'complete' | 'partial' | 'failed' | 'empty';

export interface SummaryReport {
  status: SummaryStatus;
  report: string;
  chunk_count: number;
  partials: PartialSummary[];
  aggregated_by: ProviderKind | null;
  diagnostics: Diagnostic[];
}

export async function summarizeChunk(
  generator: TextGenerator,
  chunk: string,
  position: number,
  total: number,
  temperature?: number
): Promise<GenerationOutcome> {
  return generator.generate(partialSummaryMessages(chunk, position, total), temperature);
}

/**
 * Join partial summaries with blank lines and ask for the final report in
 * a single call. Empty partials are left out of the combined text.
 */
export async function aggregateSummaries(
  generator: TextGenerator,
  partials: string[],
  counts: AggregateCounts,
  temperature?: number
): Promise<GenerationOutcome> {
  const combined = partials.filter((p) => p.length > 0).join('\n\n');
  return generator.generate(aggregateMessages(combined, counts), temperature);
}

export async function runChunkedSummary(
  generator: TextGenerator,
  text: string,
  options: SummaryOptions = DEFAULT_SUMMARY_OPTIONS
): Promise<SummaryReport> {
  const chunks = splitIntoChunks(text, options.chunkMaxChars);
  const diagnostics: Diagnostic[] = [];

  if (chunks.length === 0) {
    return {
      status: 'empty',
      report: '',
      chunk_count: 0,
      partials: [],
      aggregated_by: null,
      diagnostics,
    };
  }

  const partials: PartialSummary[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const position = i + 1;
    const outcome = await summarizeChunk(generator, chunks[i], position, chunks.length, options.temperature);
    diagnostics.push(...outcome.diagnostics);

    if (outcome.status === 'failed') {
      const message = `Summary of chunk ${position}/${chunks.length} failed; continuing without it.`;
      console.error(`[Summarizer] ${message}`);
      diagnostics.push({ level: 'error', source: 'summarizer', message });
    }

    partials.push({
      position,
      char_count: chunks[i].length,
      summary: outcome.text,
      provider: outcome.provider,
    });
  }

  const failedChunks = partials.filter((p) => p.provider === null).length;

  if (failedChunks === partials.length) {
    const message = 'Every chunk summary failed; no report was generated.';
    console.error(`[Summarizer] ${message}`);
    diagnostics.push({ level: 'error', source: 'summarizer', message });
    return {
      status: 'failed',
      report: '',
      chunk_count: chunks.length,
      partials,
      aggregated_by: null,
      diagnostics,
    };
  }

  const aggregate = await aggregateSummaries(
    generator,
    partials.map((p) => p.summary),
    options,
    options.temperature
  );
  diagnostics.push(...aggregate.diagnostics);

  let status: SummaryStatus;
  if (aggregate.status === 'failed') {
    diagnostics.push({
      level: 'error',
      source: 'summarizer',
      message: 'Report aggregation failed; partial summaries are returned without a report.',
    });
    status = 'failed';
  } else {
    status = failedChunks > 0 ? 'partial' : 'complete';
  }

  return {
    status,
    report: aggregate.text,
    chunk_count: chunks.length,
    partials,
    aggregated_by: aggregate.provider,
    diagnostics,
  };
}
