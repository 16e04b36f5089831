/**
 * LLM collaborator: chat completions against any OpenAI-compatible API
 * (Ollama, LM Studio, llama.cpp, OpenAI, OpenRouter).
 *
 * Two uses:
 * - summarizing each email during ingestion
 * - answering questions over retrieved emails
 */

import { z } from 'zod';
import { fillPrompt, EMAIL_SUMMARY_PROMPT, EMAIL_SUMMARY_SYSTEM } from '../prompts/index.js';
import type { LLMConfig } from './config-types.js';
import { buildApiHeaders } from './embeddings.js';
import { NetworkError } from './errors.js';
import { logError } from './fault-logger.js';
import type { MailDocument } from './storage/types.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
}

export type ChatFn = (messages: ChatMessage[], options?: ChatOptions) => Promise<string>;

/** Summarizes one message; failures are handled by the caller. */
export type SummarizeFn = (doc: MailDocument) => Promise<string>;

/** Answer from a system context plus the conversation so far. */
export type AnswerGenerator = (systemContext: string, history: ChatMessage[]) => Promise<string>;

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export function chatEndpoint(apiUrl: string): string {
  const base = apiUrl.replace(/\/+$/, '');
  return base.endsWith('/chat/completions') ? base : `${base}/chat/completions`;
}

/**
 * Call any OpenAI-compatible API with multi-turn messages
 */
export function createChatClient(config: LLMConfig): ChatFn {
  const endpoint = chatEndpoint(config.api_url);

  return async (messages, options = {}) => {
    const response = await fetch(endpoint, {
      method: 'POST',
      headers: buildApiHeaders(config.api_key),
      body: JSON.stringify({
        model: config.model,
        messages,
        temperature: options.temperature ?? config.temperature,
        max_tokens: options.maxTokens ?? config.max_tokens,
      }),
      signal: AbortSignal.timeout(config.timeout_ms),
    });

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '');
      logError('llm', `API chat error ${response.status}: ${errorBody}`);
      throw new NetworkError(
        `LLM API error: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    const parsed = ChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new NetworkError('LLM API returned no choices');
    }

    return parsed.data.choices[0].message.content ?? '';
  };
}

export function buildSummaryMessages(doc: MailDocument): ChatMessage[] {
  return [
    { role: 'system', content: EMAIL_SUMMARY_SYSTEM },
    {
      role: 'user',
      content: fillPrompt(EMAIL_SUMMARY_PROMPT, {
        date: doc.timestamp.toISOString(),
        sender: doc.sender,
        cc: doc.cc,
        subject: doc.subject,
        body: doc.body,
      }),
    },
  ];
}

export function createSummarizer(chat: ChatFn): SummarizeFn {
  return async (doc) => {
    const summary = await chat(buildSummaryMessages(doc), { maxTokens: 1000, temperature: 0.3 });
    if (summary.trim() === '') {
      throw new NetworkError('LLM returned an empty summary');
    }
    return summary;
  };
}

/**
 * generate(systemContext, history): the system context goes first, then
 * the conversation.
 */
export function createAnswerGenerator(chat: ChatFn): AnswerGenerator {
  return (systemContext, history) =>
    chat([{ role: 'system', content: systemContext }, ...history]);
}
