import { describe, it, expect } from 'vitest';
import { normalizeTimestamp } from './timestamps.js';
import { normalizeMessage } from './normalize.js';
import { ValidationError } from '../errors.js';

describe('normalizeTimestamp', () => {
  it('reads RFC 2822 dates with an offset', () => {
    expect(normalizeTimestamp('Tue, 14 May 2024 10:30:00 +0200').toISOString()).toBe(
      '2024-05-14T08:30:00.000Z'
    );
  });

  it('ignores a trailing zone comment', () => {
    expect(normalizeTimestamp('Tue, 14 May 2024 10:30:00 +0000 (UTC)').toISOString()).toBe(
      '2024-05-14T10:30:00.000Z'
    );
  });

  it('treats ISO without an offset as UTC', () => {
    expect(normalizeTimestamp('2024-05-14T10:30:00').toISOString()).toBe('2024-05-14T10:30:00.000Z');
    expect(normalizeTimestamp('2024-05-14 10:30').toISOString()).toBe('2024-05-14T10:30:00.000Z');
  });

  it('keeps an explicit ISO offset', () => {
    expect(normalizeTimestamp('2024-05-14T10:30:00-05:00').toISOString()).toBe(
      '2024-05-14T15:30:00.000Z'
    );
  });

  it('reads epoch milliseconds as number or digit string', () => {
    expect(normalizeTimestamp(1715682600000).toISOString()).toBe('2024-05-14T10:30:00.000Z');
    expect(normalizeTimestamp('1715682600000').toISOString()).toBe('2024-05-14T10:30:00.000Z');
  });

  it('copies Date values', () => {
    const original = new Date('2024-05-14T10:30:00.000Z');
    const copy = normalizeTimestamp(original);
    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
  });

  it('rejects empty and unparseable values', () => {
    expect(() => normalizeTimestamp('   ')).toThrow('Empty timestamp');
    expect(() => normalizeTimestamp('next tuesday')).toThrow(ValidationError);
    expect(() => normalizeTimestamp(Number.NaN)).toThrow(ValidationError);
  });
});

describe('normalizeMessage', () => {
  it('trims header fields and keeps the body as-is', () => {
    expect(
      normalizeMessage({
        id: ' m-1 ',
        from: ' Alice <alice@example.com> ',
        cc: '',
        subject: '  Lunch?  ',
        date: '2024-05-14T10:30:00Z',
        body: '  see you\n',
      })
    ).toEqual({
      sourceId: 'm-1',
      sender: 'Alice <alice@example.com>',
      cc: '',
      subject: 'Lunch?',
      timestamp: new Date('2024-05-14T10:30:00.000Z'),
      body: '  see you\n',
    });
  });

  it('rejects a message without an id', () => {
    expect(() =>
      normalizeMessage({ id: '  ', from: '', cc: '', subject: '', date: 0, body: '' })
    ).toThrow('Message has no id');
  });
});
