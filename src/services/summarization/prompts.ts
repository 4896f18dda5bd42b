/**
 * Message builders for every generative call the server makes.
 *
 * @module services/summarization/prompts
 */

import type { ChatMessage } from '../llm/types.js';

export function partialSummaryMessages(chunk: string, position: number, total: number): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You summarize one section of a longer document. Write a short summary of the section ' +
        'that keeps its key facts, terms and arguments.',
    },
    {
      role: 'user',
      content: `Section ${position} of ${total}:\n\n${chunk}`,
    },
  ];
}

export interface AggregateCounts {
  salientSentenceCount: number;
  clarifyingQuestionCount: number;
}

export function aggregateMessages(combined: string, counts: AggregateCounts): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You receive the section summaries of one document, in order. Produce a study report with ' +
        'three parts:\n' +
        '1. An overall summary of the whole document.\n' +
        `2. Exactly ${counts.salientSentenceCount} salient sentences taken or paraphrased from the content.\n` +
        `3. Exactly ${counts.clarifyingQuestionCount} clarifying questions a reader might want answered.`,
    },
    { role: 'user', content: combined },
  ];
}

export function reviewSummaryMessages(text: string): ChatMessage[] {
  return [
    { role: 'system', content: 'Summarize the given document and list its main points.' },
    { role: 'user', content: text },
  ];
}

export function reviewQuestionMessages(text: string, questionCount: number): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `Review the given document and suggest ${questionCount} questions the author should consider or revise.`,
    },
    { role: 'user', content: text },
  ];
}

export function reviewCorrectionMessages(text: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: 'Correct the spelling and grammar mistakes in this document and highlight every change you made.',
    },
    { role: 'user', content: text },
  ];
}

export const DOCUMENT_CHAT_SYSTEM_PROMPT =
  'You are an assistant answering questions from the document the user uploaded. Document content: ';

export function documentChatMessages(documentText: string, question: string): ChatMessage[] {
  return [
    { role: 'system', content: DOCUMENT_CHAT_SYSTEM_PROMPT + documentText },
    { role: 'user', content: question },
  ];
}
