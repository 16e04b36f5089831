/**
 * Application context: everything a command needs, built once from the
 * loaded configuration and passed explicitly.
 */

import { createApiEmbedder } from './embeddings.js';
import type { EmbedFn } from './embeddings.js';
import type { MailRecallConfig } from './config-types.js';
import { configureFaultLogger } from './fault-logger.js';
import { createRelevancePredicate } from './ingest/filters.js';
import { IngestionPipeline } from './ingest/pipeline.js';
import type { WindowConfig } from './config-types.js';
import { createAnswerGenerator, createChatClient, createSummarizer } from './llm.js';
import type { ChatFn, SummarizeFn } from './llm.js';
import type { MailSource } from './mail/source.js';
import { ContextAssembler } from './retrieval/context.js';
import { openStorage } from './storage/index.js';
import type { StorageBackend } from './storage/backends/interface.js';

export interface AppOverrides {
  /** Already-initialized backend */
  backend?: StorageBackend;
  embed?: EmbedFn;
  chat?: ChatFn;
  clock?: () => Date;
  /** Search-only context: the store is opened read-only */
  readOnly?: boolean;
}

export interface PipelineOverrides {
  maxPerRun?: number;
  window?: WindowConfig;
}

export interface AppContext {
  readonly config: MailRecallConfig;
  readonly backend: StorageBackend;
  readonly embed: EmbedFn;
  readonly chat: ChatFn;
  readonly assembler: ContextAssembler;
  createPipeline(source: MailSource, overrides?: PipelineOverrides): IngestionPipeline;
  close(): Promise<void>;
}

/** Route fault logging to the data directory. */
export function configureLogging(config: MailRecallConfig): void {
  const reporting = config.error_reporting;
  configureFaultLogger({
    dir: config.data_dir,
    enabled: reporting.enabled,
    level: reporting.level,
    maxFileSizeMb: reporting.max_file_size_mb,
    webhookUrl: reporting.webhook_url,
    webhookHeaders: reporting.webhook_headers,
  });
}

export async function createAppContext(
  config: MailRecallConfig,
  overrides: AppOverrides = {}
): Promise<AppContext> {
  configureLogging(config);

  const backend =
    overrides.backend ??
    (await openStorage(config, { now: overrides.clock, readOnly: overrides.readOnly }));
  const embed = overrides.embed ?? createApiEmbedder(config.embeddings, config.storage.dimensions);
  const chat = overrides.chat ?? createChatClient(config.llm);
  const summarize: SummarizeFn | undefined = config.ingest.summarize ? createSummarizer(chat) : undefined;

  const assembler = new ContextAssembler({
    backend,
    embed,
    dimensions: config.storage.dimensions,
    topK: config.retrieval.top_k,
    itemLabel: config.retrieval.item_label,
    systemPrompt: config.retrieval.system_prompt,
    generator: createAnswerGenerator(chat),
    clock: overrides.clock,
  });

  return {
    config,
    backend,
    embed,
    chat,
    assembler,
    createPipeline(source, pipelineOverrides = {}) {
      const ingest = config.ingest;
      return new IngestionPipeline({
        backend,
        source,
        embed,
        summarize,
        relevance: createRelevancePredicate({
          senders: ingest.senders,
          subjectKeywords: ingest.subject_keywords,
        }),
        window: pipelineOverrides.window ?? ingest.window,
        queries: ingest.queries,
        maxPerRun: pipelineOverrides.maxPerRun ?? ingest.max_per_run,
        summaryMaxChars: ingest.summary_max_chars,
        clock: overrides.clock,
      });
    },
    close: () => backend.close(),
  };
}
