/**
 * Three-part document review: summary, author questions, corrections.
 * The calls are independent; each one falls back and degrades on its own.
 *
 * @module services/summarization/review
 */

import type { Diagnostic, TextGenerator } from '../llm/types.js';
import { reviewCorrectionMessages, reviewQuestionMessages, reviewSummaryMessages } from './prompts.js';

export const DEFAULT_REVIEW_QUESTION_COUNT = 3;

export interface DocumentReview {
  summary: string;
  questions: string;
  corrections: string;
  diagnostics: Diagnostic[];
}

export async function reviewDocument(
  generator: TextGenerator,
  text: string,
  questionCount: number = DEFAULT_REVIEW_QUESTION_COUNT,
  temperature?: number
): Promise<DocumentReview> {
  const summary = await generator.generate(reviewSummaryMessages(text), temperature);
  const questions = await generator.generate(reviewQuestionMessages(text, questionCount), temperature);
  const corrections = await generator.generate(reviewCorrectionMessages(text), temperature);

  return {
    summary: summary.text,
    questions: questions.text,
    corrections: corrections.text,
    diagnostics: [...summary.diagnostics, ...questions.diagnostics, ...corrections.diagnostics],
  };
}
