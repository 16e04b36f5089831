import { ValidationError } from '../errors.js';
import type { MailDocument } from '../storage/types.js';
import type { RawMailMessage } from './source.js';
import { normalizeTimestamp } from './timestamps.js';

/**
 * Raw source message -> MailDocument. Throws ValidationError for a missing
 * id or an unparseable date.
 */
export function normalizeMessage(raw: RawMailMessage): MailDocument {
  const sourceId = raw.id.trim();
  if (sourceId === '') {
    throw new ValidationError('Message has no id');
  }
  return {
    sourceId,
    sender: raw.from.trim(),
    cc: raw.cc.trim(),
    subject: raw.subject.trim(),
    timestamp: normalizeTimestamp(raw.date),
    body: raw.body,
  };
}
