/**
 * Ingestion run: fetch -> filter -> transform -> store -> checkpoint.
 *
 * Failures of a single message (fetching its body, normalizing, embedding,
 * storing) are recorded in the report and logged once; the run moves on.
 * A source that cannot list candidates at all aborts the run with a
 * FetchError and leaves the checkpoint where it was.
 */

import type { EmbedFn } from '../embeddings.js';
import { FetchError, RunInProgressError, TransformError, errorMessage } from '../errors.js';
import type { TransformStage } from '../errors.js';
import { logDebug, logError, logInfo, logWarn } from '../fault-logger.js';
import type { SummarizeFn } from '../llm.js';
import type { WindowConfig } from '../config-types.js';
import { normalizeMessage } from '../mail/normalize.js';
import { iterateCandidates } from '../mail/source.js';
import type { CandidateRef, FetchWindow, MailSource, RawMailMessage } from '../mail/source.js';
import type { StorageBackend } from '../storage/backends/interface.js';
import type { MailDocument } from '../storage/types.js';
import type { RelevancePredicate } from './filters.js';
import { boundSummary, formatFallbackSummary } from './summary.js';
import { inWindow, resolveWindow } from './window.js';

const COMPONENT = 'ingest';

export type RunPhase =
  | 'fetching'
  | 'filtering'
  | 'transforming'
  | 'storing'
  | 'checkpointing'
  | 'done';

export type FailureStage = TransformStage | 'filter' | 'store';

export interface RunFailure {
  sourceId: string;
  stage: FailureStage;
  reason: string;
}

export interface RunReport {
  status: 'completed' | 'cancelled';
  /** Phases entered, in order of first entry */
  phases: RunPhase[];
  window: FetchWindow;
  /** Query that produced the candidates ('' when none did) */
  query: string;
  fetched: number;
  skippedOutsideWindow: number;
  skippedIrrelevant: number;
  inserted: number;
  duplicates: number;
  failed: number;
  failures: RunFailure[];
  checkpointBefore: Date;
  checkpointAfter: Date;
  /** True when candidates were left unprocessed because maxPerRun was reached */
  limitReached: boolean;
}

export interface RunProgress {
  sourceId: string;
  fetched: number;
  inserted: number;
  failed: number;
}

export interface RunOptions {
  /** Checked between messages */
  signal?: AbortSignal;
  onProgress?: (progress: RunProgress) => void;
}

export interface IngestionPipelineOptions {
  backend: StorageBackend;
  source: MailSource;
  embed: EmbedFn;
  /** Omitted: every message gets the fallback summary */
  summarize?: SummarizeFn;
  relevance: RelevancePredicate;
  window: WindowConfig;
  /** Tried in order until one yields candidates */
  queries: string[];
  /** Newly inserted records per run; duplicates do not count */
  maxPerRun: number;
  summaryMaxChars: number;
  clock?: () => Date;
}

interface CandidateStream {
  query: string;
  first: CandidateRef;
  rest: AsyncIterator<CandidateRef>;
}

export class IngestionPipeline {
  private readonly options: IngestionPipelineOptions;
  private readonly clock: () => Date;
  private running = false;
  private currentPhase: RunPhase | 'idle' = 'idle';

  constructor(options: IngestionPipelineOptions) {
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
  }

  get phase(): RunPhase | 'idle' {
    return this.currentPhase;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(options: RunOptions = {}): Promise<RunReport> {
    if (this.running) {
      throw new RunInProgressError({ phase: this.currentPhase });
    }
    this.running = true;
    try {
      return await this.execute(options);
    } finally {
      this.running = false;
      this.currentPhase = 'idle';
    }
  }

  private enter(phase: RunPhase, report: RunReport): void {
    this.currentPhase = phase;
    if (!report.phases.includes(phase)) report.phases.push(phase);
  }

  private async execute({ signal, onProgress }: RunOptions): Promise<RunReport> {
    const { backend, maxPerRun } = this.options;
    const window = resolveWindow(this.options.window, this.clock());
    const checkpointBefore = await backend.getCheckpoint();

    const report: RunReport = {
      status: 'completed',
      phases: [],
      window,
      query: '',
      fetched: 0,
      skippedOutsideWindow: 0,
      skippedIrrelevant: 0,
      inserted: 0,
      duplicates: 0,
      failed: 0,
      failures: [],
      checkpointBefore,
      checkpointAfter: checkpointBefore,
      limitReached: false,
    };

    this.enter('fetching', report);
    const stream = signal?.aborted ? null : await this.openCandidates(window);
    if (stream) report.query = stream.query;

    let next: CandidateRef | null = stream ? stream.first : null;
    while (stream && next) {
      if (signal?.aborted) break;
      if (report.inserted >= maxPerRun) {
        report.limitReached = true;
        break;
      }

      report.fetched++;
      await this.processCandidate(next, window, report);
      onProgress?.({
        sourceId: next.id,
        fetched: report.fetched,
        inserted: report.inserted,
        failed: report.failed,
      });

      next = await this.pull(stream.rest, stream.query);
    }

    if (signal?.aborted) {
      report.status = 'cancelled';
      this.enter('done', report);
      logInfo(COMPONENT, 'Ingestion run cancelled', { fetched: report.fetched, inserted: report.inserted });
      return report;
    }

    this.enter('checkpointing', report);
    // Nothing fetched: leave the checkpoint alone
    if (report.fetched > 0) {
      report.checkpointAfter = await backend.setCheckpoint(this.clock());
    }

    this.enter('done', report);
    logInfo(COMPONENT, 'Ingestion run completed', {
      fetched: report.fetched,
      inserted: report.inserted,
      duplicates: report.duplicates,
      failed: report.failed,
    });
    return report;
  }

  // ============================================================================
  // Fetching
  // ============================================================================

  /**
   * Walk the query chain; the first query with at least one candidate wins.
   */
  private async openCandidates(window: FetchWindow): Promise<CandidateStream | null> {
    const { source } = this.options;
    const queries = this.options.queries.length > 0 ? this.options.queries : [''];

    for (const query of queries) {
      let rest: AsyncIterator<CandidateRef>;
      try {
        rest = iterateCandidates(await source.listCandidates(window, query));
      } catch (err) {
        throw new FetchError(`Mail source ${source.name} failed: ${errorMessage(err)}`, { query });
      }

      const first = await this.pull(rest, query);
      if (first) return { query, first, rest };
    }

    return null;
  }

  private async pull(iterator: AsyncIterator<CandidateRef>, query: string): Promise<CandidateRef | null> {
    try {
      const result = await iterator.next();
      return result.done ? null : result.value;
    } catch (err) {
      throw new FetchError(
        `Mail source ${this.options.source.name} failed while listing: ${errorMessage(err)}`,
        { query }
      );
    }
  }

  // ============================================================================
  // Per message
  // ============================================================================

  private fail(report: RunReport, sourceId: string, stage: FailureStage, error: unknown): void {
    const reason = errorMessage(error);
    report.failed++;
    report.failures.push({ sourceId, stage, reason });
    logError(COMPONENT, `Failed to ingest ${sourceId} (${stage})`, error, { sourceId, stage });
  }

  private async processCandidate(ref: CandidateRef, window: FetchWindow, report: RunReport): Promise<void> {
    const { source, backend, relevance, embed } = this.options;

    let raw: RawMailMessage | null;
    try {
      raw = await source.getFull(ref.id);
    } catch (err) {
      this.fail(report, ref.id, 'fetch', err);
      return;
    }
    if (!raw) {
      this.fail(report, ref.id, 'fetch', new TransformError('Message is no longer available', 'fetch'));
      return;
    }

    let doc: MailDocument;
    try {
      doc = normalizeMessage(raw);
    } catch (err) {
      this.fail(report, ref.id, 'normalize', err);
      return;
    }

    this.enter('filtering', report);
    if (!inWindow(doc.timestamp, window)) {
      report.skippedOutsideWindow++;
      return;
    }
    try {
      if (!relevance(doc)) {
        report.skippedIrrelevant++;
        return;
      }
    } catch (err) {
      this.fail(report, doc.sourceId, 'filter', err);
      return;
    }

    if (await this.alreadyStored(doc.sourceId)) {
      logDebug(COMPONENT, 'Already stored', { sourceId: doc.sourceId });
      report.duplicates++;
      return;
    }

    this.enter('transforming', report);
    const summary = await this.summarizeDoc(doc);

    let embedding: number[];
    try {
      embedding = await embed(summary);
    } catch (err) {
      this.fail(report, doc.sourceId, 'embed', err);
      return;
    }

    this.enter('storing', report);
    const outcome = await backend.store({ ...doc, summary, embedding });
    switch (outcome.status) {
      case 'inserted':
        report.inserted++;
        break;
      case 'exists':
        report.duplicates++;
        break;
      case 'failed':
        this.fail(report, doc.sourceId, 'store', outcome.reason);
        break;
    }
  }

  /**
   * Skip the summarizer and embedder for messages stored by an earlier run.
   * store() dedups again, so a failed lookup only costs the extra work.
   */
  private async alreadyStored(sourceId: string): Promise<boolean> {
    try {
      return (await this.options.backend.getRecord(sourceId)) !== null;
    } catch (err) {
      logWarn(COMPONENT, 'Duplicate lookup failed', { sourceId, error: errorMessage(err) });
      return false;
    }
  }

  private async summarizeDoc(doc: MailDocument): Promise<string> {
    const { summarize, summaryMaxChars } = this.options;
    if (!summarize) {
      return boundSummary(formatFallbackSummary(doc), summaryMaxChars);
    }
    try {
      return boundSummary(await summarize(doc), summaryMaxChars);
    } catch (err) {
      logWarn(COMPONENT, 'Summarization failed, using fallback summary', {
        sourceId: doc.sourceId,
        error: errorMessage(err),
      });
      return boundSummary(formatFallbackSummary(doc), summaryMaxChars);
    }
  }
}
