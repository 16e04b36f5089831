import { describe, it, expect } from 'vitest';
import { createRelevancePredicate } from './filters.js';
import { makeDocument } from '../storage/test-fixtures.js';

describe('createRelevancePredicate', () => {
  it('accepts everything when no rules are set', () => {
    const relevant = createRelevancePredicate({ senders: [], subjectKeywords: ['  '] });
    expect(relevant(makeDocument('a', { sender: 'anyone@example.com' }))).toBe(true);
  });

  it('matches sender OR subject, ignoring case', () => {
    const relevant = createRelevancePredicate({
      senders: ['Billing@Example.com'],
      subjectKeywords: ['Invoice'],
    });

    expect(relevant(makeDocument('a', { sender: 'billing@example.com', subject: 'Hello' }))).toBe(true);
    expect(relevant(makeDocument('b', { sender: 'bob@example.com', subject: 'Your INVOICE #12' }))).toBe(true);
    expect(relevant(makeDocument('c', { sender: 'bob@example.com', subject: 'Lunch' }))).toBe(false);
  });
});
