import { describe, it, expect, afterEach, vi } from 'vitest';
import { connect } from 'node:net';
import { readFileSync } from 'node:fs';
import { gunzipSync } from 'node:zlib';
import { createApp, type App } from '../src/app.js';
import { createJobIdFactory } from '../src/lib/job-registry.js';
import type { Config } from '../src/config.js';
import type {
  ChatMessage,
  ChatTurnResult,
  CompletionBackend,
  GenerationOptions,
  Transcript,
  TranscriptSource,
} from '../src/types/index.js';
import { createMockLogger, deferred, type Deferred } from './helpers.js';

const mockLogger = createMockLogger();

const baseConfig: Config = {
  host: '127.0.0.1',
  port: 0,
  logLevel: 'error',
  workerConcurrency: 2,
  maxQueueSize: 10,
  maxHeaderBytes: 8192,
  maxBodyBytes: 1024,
  readWriteTimeoutMs: 5000,
  jobConcurrency: 2,
  maxPendingJobs: 10,
  jobTtlMs: 60000,
  jobCleanupIntervalMs: 60000,
  ollamaBaseUrl: 'http://ollama.test:11434',
  defaultModel: 'test-model',
  contextSize: 8192,
  maxTokensPerTurn: 2048,
  temperature: 0.2,
  repeatPenalty: 1.1,
  maxContinuations: 3,
  backendTimeoutMs: 0,
  transcriptLanguage: 'en',
};

class FakeTranscripts implements TranscriptSource {
  calls = 0;
  gate: Deferred<void> | null = null;
  failure: Error | null = null;

  async fetchTranscript(_reference: string, _language: string): Promise<Transcript> {
    this.calls++;
    if (this.gate) {
      await this.gate.promise;
    }
    if (this.failure) {
      throw this.failure;
    }
    return { text: 'caption text', title: 'Test Video' };
  }
}

class FakeBackend implements CompletionBackend {
  async chat(_messages: ChatMessage[], _model: string, _options: GenerationOptions): Promise<ChatTurnResult> {
    return { text: '## Summary', truncated: false };
  }

  async listModels(): Promise<string[]> {
    return ['llama3:8b'];
  }
}

interface RawResponse {
  status: number;
  headers: Map<string, string>;
  body: Buffer;
}

function parseResponse(raw: Buffer): RawResponse {
  const headerEnd = raw.indexOf('\r\n\r\n');
  const [statusLine, ...headerLines] = raw.subarray(0, headerEnd).toString('latin1').split('\r\n');
  const headers = new Map<string, string>();
  for (const line of headerLines) {
    const colon = line.indexOf(':');
    headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
  }
  return {
    status: parseInt(statusLine.split(' ')[1], 10),
    headers,
    body: raw.subarray(headerEnd + 4),
  };
}

/**
 * Send raw request bytes and collect everything until the server closes
 */
function exchange(port: number, request: string): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const socket = connect(port, '127.0.0.1');
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('error', reject);
    socket.on('close', () => resolve(parseResponse(Buffer.concat(chunks))));
    socket.write(request);
  });
}

function get(path: string): string {
  return `GET ${path} HTTP/1.1\r\nHost: localhost\r\n\r\n`;
}

function postJson(path: string, payload: unknown): string {
  const body = JSON.stringify(payload);
  return `POST ${path} HTTP/1.1\r\nHost: localhost\r\nContent-Type: application/json\r\nContent-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`;
}

function json(response: RawResponse): unknown {
  return JSON.parse(response.body.toString('utf8'));
}

describe('DispatchServer', () => {
  const started: App[] = [];

  async function start(overrides: Partial<Config> = {}, transcripts = new FakeTranscripts()) {
    const app = createApp(
      { ...baseConfig, ...overrides },
      { transcripts, backend: new FakeBackend(), nextJobId: createJobIdFactory(() => 1) },
      mockLogger
    );
    started.push(app);
    const address = await app.server.listen();
    return { app, port: address.port, transcripts };
  }

  afterEach(async () => {
    for (const app of started.splice(0)) {
      app.registry.stopCleanup();
      await app.server.close();
    }
  });

  describe('routing', () => {
    it('answers unknown paths with 404', async () => {
      const { port } = await start();

      const response = await exchange(port, get('/nope'));

      expect(response.status).toBe(404);
      expect(response.headers.get('connection')).toBe('close');
      expect(json(response)).toEqual({ error: { code: 'not_found', message: 'Not Found' } });
    });

    it('answers a known path with another method with 404', async () => {
      const { port } = await start();

      const wrongGet = await exchange(port, get('/api/submit'));
      const wrongPost = await exchange(port, postJson('/api/job', {}));

      expect(wrongGet.status).toBe(404);
      expect(json(wrongGet)).toEqual({ error: { code: 'not_found', message: 'Not Found' } });
      expect(wrongPost.status).toBe(404);
    });

    it('serves the gzipped frontend', async () => {
      const { port } = await start();

      const response = await exchange(port, get('/'));

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
      expect(response.headers.get('content-encoding')).toBe('gzip');
      expect(gunzipSync(response.body).toString('utf8')).toBe(
        readFileSync(new URL('../public/index.html', import.meta.url), 'utf8')
      );
    });

    it('lists models', async () => {
      const { port } = await start();

      const response = await exchange(port, get('/api/models'));

      expect(response.status).toBe(200);
      expect(json(response)).toEqual(['llama3:8b']);
    });

    it('reports health with pool and job statistics', async () => {
      const { port } = await start();

      const response = await exchange(port, get('/health'));

      expect(response.status).toBe(200);
      expect(json(response)).toMatchObject({
        status: 'ok',
        queue: { queued: 0, processing: 1, concurrency: 2 },
        jobs: { waiting: 0, running: 0, tracked: 0 },
      });
    });
  });

  describe('request framing', () => {
    it('requires Content-Length on POST', async () => {
      const { port } = await start();

      const response = await exchange(port, 'POST /api/summarize HTTP/1.1\r\nHost: localhost\r\n\r\n');

      expect(response.status).toBe(411);
    });

    it('rejects a declared body above the limit', async () => {
      const { port } = await start();

      const response = await exchange(port, 'POST /api/summarize HTTP/1.1\r\nContent-Length: 4096\r\n\r\n');

      expect(response.status).toBe(413);
      expect(json(response)).toEqual({
        error: { code: 'body_too_large', message: 'Request body too large', details: { declared: 4096, maxBytes: 1024 } },
      });
    });

    it('rejects a body that is not JSON', async () => {
      const { port } = await start();

      const response = await exchange(port, 'POST /api/summarize HTTP/1.1\r\nContent-Length: 8\r\n\r\nnot json');

      expect(response.status).toBe(400);
      expect(json(response)).toMatchObject({ error: { code: 'invalid_json' } });
    });
  });

  describe('synchronous summaries', () => {
    it('returns a summary', async () => {
      const { port } = await start();

      const response = await exchange(port, postJson('/api/summarize', { url: 'https://youtu.be/abcdefghijk' }));

      expect(response.status).toBe(200);
      expect(json(response)).toEqual({ summary: '## Summary', subtitles: 'caption text', video_name: 'Test Video' });
    });

    it('returns the canned sample for a dry run', async () => {
      const { port } = await start();

      const response = await exchange(port, postJson('/api/summarize', { url: '', dry_run: true }));

      expect(response.status).toBe(200);
      expect(json(response)).toMatchObject({ video_name: 'Dry Run' });
    });
  });

  describe('jobs', () => {
    it('requires a job id', async () => {
      const { port } = await start();

      const response = await exchange(port, get('/api/job'));

      expect(response.status).toBe(400);
      expect(json(response)).toMatchObject({ error: { code: 'job_id_required' } });
    });

    it('treats an empty id as absent and falls back to job_id', async () => {
      const { app, port } = await start();

      await exchange(port, postJson('/api/submit', { url: 'https://youtu.be/abcdefghijk' }));
      await app.jobRunner.onIdle();

      const missing = await exchange(port, get('/api/job?id='));
      const fallback = await exchange(port, get('/api/job?id=&job_id=job-1-1'));

      expect(missing.status).toBe(400);
      expect(fallback.status).toBe(200);
      expect(json(fallback)).toMatchObject({ status: 'done' });
    });

    it('reports unknown jobs as not found', async () => {
      const { port } = await start();

      const response = await exchange(port, get('/api/job?id=job-0-0'));

      expect(response.status).toBe(404);
      expect(json(response)).toEqual({ status: 'error', error: 'not_found' });
    });

    it('runs a submitted job from pending to done', async () => {
      const transcripts = new FakeTranscripts();
      transcripts.gate = deferred<void>();
      const { app, port } = await start({}, transcripts);

      const submitted = await exchange(port, postJson('/api/submit', { url: 'https://youtu.be/abcdefghijk' }));
      expect(submitted.status).toBe(202);
      expect(json(submitted)).toEqual({ job_id: 'job-1-1' });

      const pending = await exchange(port, get('/api/job?id=job-1-1'));
      expect(json(pending)).toEqual({ status: 'pending' });

      transcripts.gate.resolve();
      await app.jobRunner.onIdle();

      const done = await exchange(port, get('/api/job?job_id=job-1-1'));
      expect(done.status).toBe(200);
      expect(json(done)).toEqual({
        status: 'done',
        result: { summary: '## Summary', subtitles: 'caption text', video_name: 'Test Video' },
      });
    });

    it('reports a failed job and keeps reporting it the same way', async () => {
      const transcripts = new FakeTranscripts();
      transcripts.failure = new Error('captions unavailable');
      const { app, port } = await start({}, transcripts);

      const submitted = await exchange(port, postJson('/api/submit', { url: 'https://youtu.be/abcdefghijk' }));
      expect(submitted.status).toBe(202);
      await app.jobRunner.onIdle();

      const first = await exchange(port, get('/api/job?id=job-1-1'));
      const second = await exchange(port, get('/api/job?id=job-1-1'));

      expect(first.status).toBe(200);
      expect(json(first)).toEqual({ status: 'error', error: 'captions unavailable' });
      expect(second.status).toBe(200);
      expect(second.body.toString('utf8')).toBe(first.body.toString('utf8'));
    });

    it('hands distinct ids to concurrent submissions', async () => {
      const { app, port } = await start();
      const request = postJson('/api/submit', { url: 'https://youtu.be/abcdefghijk' });

      const responses = await Promise.all([exchange(port, request), exchange(port, request)]);
      await app.jobRunner.onIdle();

      expect(responses.map((response) => response.status)).toEqual([202, 202]);
      const ids = responses.map((response) => JSON.stringify(json(response))).sort();
      expect(ids).toEqual(['{"job_id":"job-1-1"}', '{"job_id":"job-1-2"}']);
    });

    it('runs transcript-only jobs for submit_script', async () => {
      const { app, port } = await start();

      const submitted = await exchange(port, postJson('/api/submit_script', { url: 'https://youtu.be/abcdefghijk' }));
      await app.jobRunner.onIdle();
      const done = await exchange(port, get('/api/job?id=job-1-1'));

      expect(submitted.status).toBe(202);
      expect(json(done)).toEqual({
        status: 'done',
        result: { summary: 'caption text', subtitles: 'caption text', video_name: 'Test Video' },
      });
    });
  });

  describe('admission control', () => {
    it('serves every slow connection that fits in the queue', async () => {
      const transcripts = new FakeTranscripts();
      transcripts.gate = deferred<void>();
      const { app, port } = await start({ workerConcurrency: 2, maxQueueSize: 6 }, transcripts);
      const request = postJson('/api/summarize', { url: 'https://youtu.be/abcdefghijk' });

      const pending = Array.from({ length: 6 }, () => exchange(port, request));
      // Two on workers, four waiting in the queue
      await vi.waitFor(() => expect(transcripts.calls).toBe(2));
      await vi.waitFor(() => expect(app.server.pool.size).toBe(4));

      transcripts.gate.resolve();
      const responses = await Promise.all(pending);

      expect(responses.map((response) => response.status)).toEqual([200, 200, 200, 200, 200, 200]);
      expect(transcripts.calls).toBe(6);
    });

    it('turns connections away with 503 when the queue is full', async () => {
      const transcripts = new FakeTranscripts();
      transcripts.gate = deferred<void>();
      const { app, port } = await start({ workerConcurrency: 1, maxQueueSize: 1 }, transcripts);

      // Occupies the only worker
      const blocked = exchange(port, postJson('/api/summarize', { url: 'https://youtu.be/abcdefghijk' }));
      await vi.waitFor(() => expect(transcripts.calls).toBe(1));

      // Waits in the queue
      const queued = exchange(port, get('/health'));
      await vi.waitFor(() => expect(app.server.pool.size).toBe(1));

      const rejected = await exchange(port, get('/health'));
      expect(rejected.status).toBe(503);
      expect(json(rejected)).toEqual({
        error: { code: 'server_busy', message: 'Server is busy, please try again later.' },
      });

      transcripts.gate.resolve();
      expect((await blocked).status).toBe(200);
      expect((await queued).status).toBe(200);
    });
  });
});
