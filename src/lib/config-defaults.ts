/**
 * Default configuration values for mailrecall
 */

import { ASSISTANT_SYSTEM_PROMPT } from '../prompts/index.js';
import type { MailRecallConfig } from './config-types.js';

// Local OpenAI-compatible server (Ollama, LM Studio, llama.cpp)
export const DEFAULT_API_URL = 'http://localhost:11434/v1';

export const DEFAULT_EMBEDDING_MODEL = 'nomic-embed-text'; // 768 dimensions

export const DEFAULT_SYSTEM_PROMPT = ASSISTANT_SYSTEM_PROMPT;

export const DEFAULT_CONFIG: Omit<MailRecallConfig, 'data_dir'> = {
  storage: {
    backend: 'indexed',
    dimensions: 768,
    indexed: {
      index_file: 'emails.index.jsonl',
      metadata_file: 'emails.db',
      checkpoint_file: 'last_sync.txt',
    },
    relational: {
      driver: 'sqlite',
      sqlite_path: 'emails-relational.db',
      search_window: 100,
      postgresql: {
        host: 'localhost',
        port: 5432,
        database: 'mailrecall',
        ssl: false,
        pool_size: 10,
      },
    },
  },
  embeddings: {
    api_url: DEFAULT_API_URL,
    model: DEFAULT_EMBEDDING_MODEL,
    timeout_ms: 30000,
    cache_size: 500,
    normalize: false,
  },
  llm: {
    api_url: DEFAULT_API_URL,
    model: 'llama3.2',
    max_tokens: 1000,
    temperature: 0.3,
    timeout_ms: 60000,
  },
  ingest: {
    window: { mode: 'month' },
    queries: [''],
    senders: [],
    subject_keywords: [],
    max_per_run: 20,
    summary_max_chars: 2000,
    summarize: true,
  },
  retrieval: {
    top_k: 25,
    item_label: 'Item',
    system_prompt: DEFAULT_SYSTEM_PROMPT,
  },
  error_reporting: {
    enabled: true,
    level: 'warn',
    max_file_size_mb: 5,
  },
};
