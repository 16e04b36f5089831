/**
 * Mail source contract. The pipeline only talks to this interface; the
 * bundled implementation reads exported mailbox files (json-source.ts).
 */

export type Awaitable<T> = T | Promise<T>;

/** Closed time range [start, end] a run fetches from. */
export interface FetchWindow {
  start: Date;
  end: Date;
}

export interface CandidateRef {
  id: string;
}

/**
 * A message as the source delivers it. `date` may be RFC 2822, ISO-8601,
 * epoch milliseconds or a Date; normalization turns it into a UTC instant.
 */
export interface RawMailMessage {
  id: string;
  from: string;
  cc: string;
  subject: string;
  date: string | number | Date;
  body: string;
}

/** Lazy (possibly paginated) candidate list. null means "no candidates". */
export type CandidateList = Iterable<CandidateRef> | AsyncIterable<CandidateRef> | null | undefined;

export interface MailSource {
  /** Human-readable description for reports */
  readonly name: string;
  listCandidates(window: FetchWindow, query: string): Awaitable<CandidateList>;
  /** null when the message disappeared between listing and fetching */
  getFull(id: string): Awaitable<RawMailMessage | null>;
}

export async function* iterateCandidates(list: CandidateList): AsyncGenerator<CandidateRef> {
  if (list === null || list === undefined) return;
  yield* list;
}
