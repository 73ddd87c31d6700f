import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { InternalAxiosRequestConfig } from 'axios';
import { OllamaClient } from '../src/lib/ollama-client.js';
import type { ChatMessage, GenerationOptions } from '../src/types/index.js';
import { captureApiError, createFakeHttp, createMockLogger, type FakeReply } from './helpers.js';

const mockLogger = createMockLogger();

const options: GenerationOptions = {
  temperature: 0.2,
  repeatPenalty: 1.1,
  contextSize: 4096,
  maxTokensPerTurn: 512,
};

const messages: ChatMessage[] = [
  { role: 'system', content: 'Summarize.' },
  { role: 'user', content: 'transcript text' },
];

function clientWith(handler: (config: InternalAxiosRequestConfig) => FakeReply): OllamaClient {
  return new OllamaClient(
    { baseUrl: 'http://ollama.test:11434/', timeoutMs: 0 },
    mockLogger,
    createFakeHttp(handler)
  );
}

describe('OllamaClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('chat', () => {
    it('posts a non-streaming chat request with mapped options', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const client = clientWith((config) => {
        seen.push(config);
        return { status: 200, data: { message: { role: 'assistant', content: 'Summary' }, done_reason: 'stop' } };
      });

      const turn = await client.chat(messages, 'llama3:8b', options);

      expect(turn).toEqual({ text: 'Summary', truncated: false });
      expect(seen).toHaveLength(1);
      expect(seen[0].method).toBe('post');
      expect(seen[0].url).toBe('http://ollama.test:11434/api/chat');
      expect(JSON.parse(String(seen[0].data))).toEqual({
        model: 'llama3:8b',
        messages,
        stream: false,
        options: { temperature: 0.2, repeat_penalty: 1.1, num_ctx: 4096, num_predict: 512 },
      });
    });

    it('reports truncation when the turn stopped at the token limit', async () => {
      const client = clientWith(() => ({
        status: 200,
        data: { message: { content: 'partial' }, done_reason: 'length' },
      }));

      await expect(client.chat(messages, 'llama3:8b', options)).resolves.toEqual({ text: 'partial', truncated: true });
    });

    it('fails with empty_response on empty content', async () => {
      const client = clientWith(() => ({ status: 200, data: { message: { content: '' }, done_reason: 'stop' } }));

      const error = await captureApiError(client.chat(messages, 'llama3:8b', options));

      expect(error.code).toBe('empty_response');
    });

    it('fails with backend_unavailable when the request cannot be sent', async () => {
      const client = clientWith(() => new Error('connect ECONNREFUSED'));

      const error = await captureApiError(client.chat(messages, 'llama3:8b', options));

      expect(error.code).toBe('backend_unavailable');
      expect(error.statusCode).toBe(502);
      expect(error.message).toBe('Completion backend unavailable: connect ECONNREFUSED');
    });

    it('passes other error bodies through with the status', async () => {
      const client = clientWith(() => ({ status: 500, data: { error: 'out of memory' } }));

      const error = await captureApiError(client.chat(messages, 'llama3:8b', options));

      expect(error.code).toBe('backend_error');
      expect(error.message).toBe('out of memory');
      expect(error.details).toEqual({ status: 500 });
    });

    it('lists installed models when the requested one is missing', async () => {
      const client = clientWith((config) => {
        if (config.url?.endsWith('/api/tags')) {
          return { status: 200, data: { models: [{ name: 'llama3:8b' }, { name: 'mistral:7b' }] } };
        }
        return { status: 404, data: { error: "model 'gpt-oss:20b' not found" } };
      });

      const error = await captureApiError(client.chat(messages, 'gpt-oss:20b', options));

      expect(error.code).toBe('backend_error');
      expect(error.message).toBe(
        "Model 'gpt-oss:20b' not found. Pull it with: ollama pull gpt-oss:20b. Installed models: llama3:8b, mistral:7b"
      );
    });

    it('suggests a model to pull when none are installed', async () => {
      const client = clientWith((config) => {
        if (config.url?.endsWith('/api/tags')) {
          return { status: 200, data: { models: [] } };
        }
        return { status: 404, data: { error: 'model not found' } };
      });

      const error = await captureApiError(client.chat(messages, 'tiny', options));

      expect(error.message).toBe(
        "Model 'tiny' not found. Pull it with: ollama pull tiny. No local models found. Pull one, e.g.: ollama pull llama3:8b"
      );
    });

    it('keeps the backend error when the model listing also fails', async () => {
      const client = clientWith((config) => {
        if (config.url?.endsWith('/api/tags')) {
          return new Error('listing down');
        }
        return { status: 404, data: { error: 'model not found' } };
      });

      const error = await captureApiError(client.chat(messages, 'tiny', options));

      expect(error.message).toBe('model not found');
      expect(error.details).toEqual({ status: 404 });
    });
  });

  describe('listModels', () => {
    it('returns the installed model names', async () => {
      const client = clientWith(() => ({ status: 200, data: { models: [{ name: 'llama3:8b' }, { size: 1 }] } }));

      await expect(client.listModels()).resolves.toEqual(['llama3:8b']);
    });

    it('returns an empty list on any failure', async () => {
      const failing = clientWith(() => new Error('offline'));
      const erroring = clientWith(() => ({ status: 500, data: { error: 'boom' } }));

      await expect(failing.listModels()).resolves.toEqual([]);
      await expect(erroring.listModels()).resolves.toEqual([]);
    });
  });
});
