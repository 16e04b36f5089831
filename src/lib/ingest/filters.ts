import type { MailDocument } from '../storage/types.js';

export type RelevancePredicate = (doc: MailDocument) => boolean;

export interface RelevanceRules {
  /** Substrings of the sender field */
  senders: string[];
  /** Substrings of the subject */
  subjectKeywords: string[];
}

/**
 * A message is relevant when its sender contains one of `senders` or its
 * subject contains one of `subjectKeywords` (case-insensitive). With both
 * lists empty every message is relevant.
 */
export function createRelevancePredicate(rules: RelevanceRules): RelevancePredicate {
  const senders = rules.senders.map((s) => s.trim().toLowerCase()).filter(Boolean);
  const keywords = rules.subjectKeywords.map((k) => k.trim().toLowerCase()).filter(Boolean);

  if (senders.length === 0 && keywords.length === 0) {
    return () => true;
  }

  return (doc) => {
    const sender = doc.sender.toLowerCase();
    const subject = doc.subject.toLowerCase();
    return (
      senders.some((s) => sender.includes(s)) || keywords.some((k) => subject.includes(k))
    );
  };
}
