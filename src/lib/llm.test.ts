import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildSummaryMessages,
  chatEndpoint,
  createAnswerGenerator,
  createChatClient,
  createSummarizer,
} from './llm.js';
import type { ChatFn } from './llm.js';
import type { LLMConfig } from './config-types.js';
import { NetworkError } from './errors.js';
import { EMAIL_SUMMARY_SYSTEM } from '../prompts/index.js';
import { makeDocument } from './storage/test-fixtures.js';

vi.mock('./fault-logger.js', () => ({
  logError: vi.fn(),
  logWarn: vi.fn(),
}));

const CONFIG: LLMConfig = {
  api_url: 'http://localhost:11434/v1',
  model: 'test-model',
  api_key: 'test-key',
  max_tokens: 500,
  temperature: 0.2,
  timeout_ms: 1000,
};

function chatResponse(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

describe('llm', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('derives the chat completions endpoint', () => {
    expect(chatEndpoint('http://localhost:11434/v1/')).toBe('http://localhost:11434/v1/chat/completions');
    expect(chatEndpoint('https://api.example.com/v1/chat/completions')).toBe(
      'https://api.example.com/v1/chat/completions'
    );
  });

  describe('createChatClient', () => {
    it('sends the conversation with configured defaults', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(chatResponse('Hi there'));
      const chat = createChatClient(CONFIG);

      expect(await chat([{ role: 'user', content: 'Hello' }])).toBe('Hi there');

      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('http://localhost:11434/v1/chat/completions');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-key',
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0.2,
        max_tokens: 500,
      });
    });

    it('lets call options override temperature and max tokens', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(chatResponse('ok'));
      await createChatClient(CONFIG)([{ role: 'user', content: 'x' }], { maxTokens: 50, temperature: 0 });
      const body: unknown = JSON.parse(String(fetchSpy.mock.calls[0][1]?.body));
      expect(body).toMatchObject({ temperature: 0, max_tokens: 50 });
    });

    it('treats null content as an empty reply', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(chatResponse(null));
      expect(await createChatClient(CONFIG)([{ role: 'user', content: 'x' }])).toBe('');
    });

    it('throws NetworkError on HTTP errors', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        new Response('overloaded', { status: 503, statusText: 'Service Unavailable' })
      );
      await expect(createChatClient(CONFIG)([{ role: 'user', content: 'x' }])).rejects.toThrow(
        'LLM API error: 503 Service Unavailable'
      );
    });

    it('throws NetworkError when there are no choices', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        new Response(JSON.stringify({ choices: [] }), { status: 200 })
      );
      await expect(createChatClient(CONFIG)([{ role: 'user', content: 'x' }])).rejects.toThrow(NetworkError);
    });
  });

  describe('summarizer', () => {
    const doc = makeDocument('m1', {
      sender: 'alice@example.com',
      cc: 'bob@example.com',
      subject: 'Offsite',
      body: 'Offsite moved to Friday.',
    });

    it('builds a system and a user message from the document', () => {
      const [system, user] = buildSummaryMessages(doc);
      expect(system).toEqual({ role: 'system', content: EMAIL_SUMMARY_SYSTEM });
      expect(user.role).toBe('user');
      expect(user.content).toContain('alice@example.com');
      expect(user.content).toContain('Offsite moved to Friday.');
      expect(user.content).toContain('2024-05-01T09:00:00.000Z');
      expect(user.content).not.toContain('{body}');
    });

    it('returns the model summary', async () => {
      const chat = vi.fn<ChatFn>(async () => 'Offsite is on Friday.');
      expect(await createSummarizer(chat)(doc)).toBe('Offsite is on Friday.');
      expect(chat).toHaveBeenCalledWith(buildSummaryMessages(doc), { maxTokens: 1000, temperature: 0.3 });
    });

    it('rejects an empty summary', async () => {
      await expect(createSummarizer(async () => ' \n')(doc)).rejects.toThrow('LLM returned an empty summary');
    });
  });

  it('answer generator sends the system context first', async () => {
    const chat = vi.fn<ChatFn>(async () => 'answer');
    const generate = createAnswerGenerator(chat);
    expect(await generate('CONTEXT', [{ role: 'user', content: 'q' }])).toBe('answer');
    expect(chat).toHaveBeenCalledWith([
      { role: 'system', content: 'CONTEXT' },
      { role: 'user', content: 'q' },
    ]);
  });
});
