/**
 * Retrieval and context assembly for question answering.
 *
 * retrieve() embeds the question and searches the store; buildContext()
 * numbers the results as `Item(1)`, `Item(2)`, ... in search order; ask()
 * hands the context and the conversation to the answer generator.
 */

import {
  ASSISTANT_EMPTY_REPLY,
  ASSISTANT_GENERATION_APOLOGY,
  ASSISTANT_SYSTEM_APOLOGY,
} from '../../prompts/index.js';
import type { EmbedFn } from '../embeddings.js';
import { DimensionMismatchError } from '../errors.js';
import { logError } from '../fault-logger.js';
import type { AnswerGenerator, ChatMessage } from '../llm.js';
import type { StorageBackend } from '../storage/backends/interface.js';
import { SEARCH_ERROR } from '../storage/types.js';

const COMPONENT = 'retrieval';

export interface ContextAssemblerOptions {
  backend: StorageBackend;
  embed: EmbedFn;
  /** Must equal the store's dimension */
  dimensions: number;
  topK: number;
  /** Label of numbered entries; default "Item" */
  itemLabel?: string;
  systemPrompt: string;
  generator?: AnswerGenerator;
  clock?: () => Date;
}

export interface AskResult {
  reply: string;
  /** System message with the retrieved context first, then the turns */
  history: ChatMessage[];
}

export class ContextAssembler {
  private readonly options: ContextAssemblerOptions;
  private readonly itemLabel: string;
  private readonly clock: () => Date;

  constructor(options: ContextAssemblerOptions) {
    this.options = options;
    this.itemLabel = options.itemLabel ?? 'Item';
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Summaries relevant to `query`, nearest first. Never empty. Throws
   * DimensionMismatchError when the embedder's output does not fit the store.
   */
  async retrieve(query: string, k: number = this.options.topK): Promise<string[]> {
    let embedding: number[];
    try {
      embedding = await this.options.embed(query);
    } catch (err) {
      if (err instanceof DimensionMismatchError) throw err;
      logError(COMPONENT, 'Query embedding failed', err);
      return [SEARCH_ERROR];
    }

    if (embedding.length !== this.options.dimensions) {
      throw new DimensionMismatchError(this.options.dimensions, embedding.length, {
        stage: 'query',
      });
    }

    return this.options.backend.search(embedding, k);
  }

  buildContext(texts: string[]): string {
    let context = `Today's Datetime is ${this.clock().toISOString()}\n\n`;
    texts.forEach((text, i) => {
      context += `${this.itemLabel}(${i + 1}):\n\n${text}\n\n`;
    });
    return context;
  }

  buildSystemMessage(texts: string[]): string {
    return `${this.options.systemPrompt}\n\n${this.buildContext(texts)}`;
  }

  /**
   * Answer a question. A conversation without a leading system message is
   * new: the store is searched once and the context becomes that system
   * message. Follow-up questions reuse it without searching again.
   * Never throws; failures produce an apology reply.
   */
  async ask(question: string, history: ChatMessage[] = []): Promise<AskResult> {
    const userTurn: ChatMessage = { role: 'user', content: question };

    let messages: ChatMessage[];
    try {
      if (history.length > 0 && history[0].role === 'system') {
        messages = [...history, userTurn];
      } else {
        const texts = await this.retrieve(question);
        messages = [{ role: 'system', content: this.buildSystemMessage(texts) }, ...history, userTurn];
      }
    } catch (err) {
      logError(COMPONENT, 'Could not assemble context', err);
      return this.withReply([...history, userTurn], ASSISTANT_SYSTEM_APOLOGY);
    }

    const { generator } = this.options;
    if (!generator) {
      logError(COMPONENT, 'No answer generator configured');
      return this.withReply(messages, ASSISTANT_GENERATION_APOLOGY);
    }

    try {
      const reply = await generator(messages[0].content, messages.slice(1));
      return this.withReply(messages, reply.trim() === '' ? ASSISTANT_EMPTY_REPLY : reply);
    } catch (err) {
      logError(COMPONENT, 'Answer generation failed', err);
      return this.withReply(messages, ASSISTANT_GENERATION_APOLOGY);
    }
  }

  private withReply(messages: ChatMessage[], reply: string): AskResult {
    return { reply, history: [...messages, { role: 'assistant', content: reply }] };
  }
}
