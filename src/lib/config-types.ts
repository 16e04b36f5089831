/**
 * Configuration types for mailrecall.
 *
 * Derived from the Zod schema so the parsed config and its type cannot drift.
 */

import type { z } from 'zod';
import type { MailRecallConfigSchema } from './config-validation.js';

export type MailRecallConfig = z.infer<typeof MailRecallConfigSchema>;

export type StorageConfig = MailRecallConfig['storage'];
export type StorageBackendKind = StorageConfig['backend'];
export type RelationalStorageConfig = StorageConfig['relational'];
export type PostgresConfig = RelationalStorageConfig['postgresql'];
export type EmbeddingsConfig = MailRecallConfig['embeddings'];
export type LLMConfig = MailRecallConfig['llm'];
export type IngestConfig = MailRecallConfig['ingest'];
export type WindowConfig = IngestConfig['window'];
export type RetrievalConfig = MailRecallConfig['retrieval'];
export type ErrorReportingConfig = MailRecallConfig['error_reporting'];
