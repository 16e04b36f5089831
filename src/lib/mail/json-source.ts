/**
 * MailSource over an exported mailbox file.
 *
 * Accepted formats:
 * - a JSON array of messages
 * - JSON lines, one message per line
 *
 * Message fields: id, from, cc, subject, date, body (only id and date are
 * required). Candidates are listed in file order.
 */

import fs from 'fs';
import { z } from 'zod';
import { NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { logWarn } from '../fault-logger.js';
import type { CandidateRef, FetchWindow, MailSource, RawMailMessage } from './source.js';
import { normalizeTimestamp } from './timestamps.js';

const RawMessageSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  from: z.string().default(''),
  cc: z.string().default(''),
  subject: z.string().default(''),
  date: z.union([z.string(), z.number()]),
  body: z.string().default(''),
});

export interface MailQuery {
  from: string[];
  subject: string[];
  /** Bare terms, matched against subject or body */
  text: string[];
}

const QUERY_TOKEN = /(\w+):"([^"]*)"|(\w+):(\S+)|"([^"]*)"|(\S+)/g;

/**
 * Parse a mailbox-style query: `from:alice subject:"quarterly report" budget`.
 * Unknown `field:` prefixes are treated as bare text.
 */
export function parseMailQuery(query: string): MailQuery {
  const parsed: MailQuery = { from: [], subject: [], text: [] };

  for (const match of query.matchAll(QUERY_TOKEN)) {
    const field = (match[1] ?? match[3] ?? '').toLowerCase();
    const value = (match[2] ?? match[4] ?? match[5] ?? match[6] ?? '').toLowerCase();
    if (value === '') continue;

    if (field === 'from') parsed.from.push(value);
    else if (field === 'subject') parsed.subject.push(value);
    else parsed.text.push(field ? `${field}:${value}` : value);
  }

  return parsed;
}

export function matchesQuery(message: RawMailMessage, query: MailQuery): boolean {
  const from = message.from.toLowerCase();
  const subject = message.subject.toLowerCase();
  const body = message.body.toLowerCase();

  return (
    query.from.every((term) => from.includes(term)) &&
    query.subject.every((term) => subject.includes(term)) &&
    query.text.every((term) => subject.includes(term) || body.includes(term))
  );
}

function withinWindow(message: RawMailMessage, window: FetchWindow): boolean {
  try {
    const ts = normalizeTimestamp(message.date).getTime();
    return ts >= window.start.getTime() && ts <= window.end.getTime();
  } catch {
    // Unparseable dates are passed on; normalization reports them per message
    return true;
  }
}

export class JsonMailSource implements MailSource {
  readonly name: string;
  private readonly filePath: string;
  private messages: RawMailMessage[] | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.name = `file:${filePath}`;
  }

  private load(): RawMailMessage[] {
    if (this.messages) return this.messages;

    if (!fs.existsSync(this.filePath)) {
      throw new NotFoundError(`Mail export not found: ${this.filePath}`, { path: this.filePath });
    }
    const content = fs.readFileSync(this.filePath, 'utf-8');

    const items: unknown[] = [];
    if (content.trimStart().startsWith('[')) {
      const parsed: unknown = parseJson(content, this.filePath, 1);
      if (!Array.isArray(parsed)) {
        throw new ValidationError(`Mail export ${this.filePath} is not a JSON array`);
      }
      items.push(...parsed);
    } else {
      content.split('\n').forEach((line, i) => {
        if (line.trim() !== '') items.push(parseJson(line, this.filePath, i + 1));
      });
    }

    const messages: RawMailMessage[] = [];
    items.forEach((item, i) => {
      const result = RawMessageSchema.safeParse(item);
      if (result.success) {
        messages.push(result.data);
      } else {
        logWarn('mail-source', 'Skipped malformed message in export', {
          file: this.filePath,
          entry: i + 1,
          problem: result.error.issues[0]?.message,
        });
      }
    });

    this.messages = messages;
    return messages;
  }

  listCandidates(window: FetchWindow, query: string): CandidateRef[] {
    const parsed = parseMailQuery(query);
    return this.load()
      .filter((m) => withinWindow(m, window) && matchesQuery(m, parsed))
      .map((m) => ({ id: m.id }));
  }

  getFull(id: string): RawMailMessage | null {
    return this.load().find((m) => m.id === id) ?? null;
  }
}

function parseJson(text: string, filePath: string, line: number): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Invalid JSON in ${filePath} (line ${line}): ${errorMessage(err)}`, {
      path: filePath,
      line,
    });
  }
}
