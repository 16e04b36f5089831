/**
 * Config validation (Zod) and deep merge utility.
 *
 * The merged config (defaults, global file, project file, environment) is
 * parsed once; the parse result is the fully typed MailRecallConfig.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// ---------- Deep merge ----------

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively merge `source` into `target`.
 * - Objects are merged recursively (not replaced)
 * - Arrays and primitives from `source` override `target`
 * - `undefined` values in source are skipped
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];

    if (srcVal === undefined) continue;

    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }

  return result;
}

// ---------- Zod schemas ----------

const PostgresSchema = z.object({
  connection_string: z.string().optional(),
  host: z.string(),
  port: z.number().int().positive(),
  database: z.string(),
  user: z.string().optional(),
  password: z.string().optional(),
  ssl: z.boolean(),
  pool_size: z.number().int().positive(),
});

const StorageSchema = z.object({
  backend: z.enum(['indexed', 'relational']),
  dimensions: z.number().int().positive(),
  indexed: z.object({
    index_file: z.string().min(1),
    metadata_file: z.string().min(1),
    checkpoint_file: z.string().min(1),
  }),
  relational: z.object({
    driver: z.enum(['sqlite', 'postgresql']),
    sqlite_path: z.string().min(1),
    search_window: z.number().int().positive(),
    postgresql: PostgresSchema,
  }),
});

const EmbeddingsSchema = z.object({
  api_url: z.string().url(),
  model: z.string().min(1),
  api_key: z.string().optional(),
  timeout_ms: z.number().int().positive(),
  cache_size: z.number().int().nonnegative(),
  normalize: z.boolean(),
});

const LLMSchema = z.object({
  api_url: z.string().url(),
  model: z.string().min(1),
  api_key: z.string().optional(),
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  timeout_ms: z.number().int().positive(),
});

const WindowSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('month') }),
  z.object({ mode: z.literal('days'), days: z.number().int().positive() }),
]);

const IngestSchema = z.object({
  window: WindowSchema,
  queries: z.array(z.string()),
  senders: z.array(z.string()),
  subject_keywords: z.array(z.string()),
  max_per_run: z.number().int().positive(),
  summary_max_chars: z.number().int().positive(),
  summarize: z.boolean(),
});

const RetrievalSchema = z.object({
  top_k: z.number().int().positive(),
  item_label: z.string().min(1),
  system_prompt: z.string(),
});

const ErrorReportingSchema = z.object({
  enabled: z.boolean(),
  level: z.enum(['error', 'warn', 'info', 'debug']),
  max_file_size_mb: z.number().positive(),
  webhook_url: z.string().url().optional(),
  webhook_headers: z.record(z.string()).optional(),
});

export const MailRecallConfigSchema = z.object({
  data_dir: z.string().min(1),
  storage: StorageSchema,
  embeddings: EmbeddingsSchema,
  llm: LLMSchema,
  ingest: IngestSchema,
  retrieval: RetrievalSchema,
  error_reporting: ErrorReportingSchema,
});

/**
 * Validate a merged config object. Throws ConfigError naming every
 * invalid path.
 */
export function validateConfig(raw: Record<string, unknown>): z.infer<typeof MailRecallConfigSchema> {
  const result = MailRecallConfigSchema.safeParse(raw);

  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `"${issue.path.join('.')}": ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  return result.data;
}
