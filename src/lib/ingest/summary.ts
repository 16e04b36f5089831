import type { MailDocument } from '../storage/types.js';

const CONTEXT_PREVIEW_CHARS = 500;

/** First `max` code points, so a surrogate pair is never split. */
function takeCodePoints(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join('');
}

/**
 * Summary used when the summarizer fails or is disabled. Same block layout
 * as the summarization prompt asks for.
 */
export function formatFallbackSummary(doc: MailDocument): string {
  const context = doc.body ? takeCodePoints(doc.body, CONTEXT_PREVIEW_CHARS) : 'No body content available';
  return [
    '<Email Start>',
    `Date and Time: ${doc.timestamp.toISOString()}`,
    `Sender: ${doc.sender}`,
    `CC: ${doc.cc}`,
    `Subject: ${doc.subject}`,
    `Email Context: ${context}...`,
    '<Email End>',
  ].join('\n');
}

/** Cap a summary at `maxChars` characters (code points). */
export function boundSummary(summary: string, maxChars: number): string {
  return takeCodePoints(summary, maxChars);
}
