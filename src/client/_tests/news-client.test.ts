import { describe, it, expect, vi } from 'vitest';
import { NewsClient } from '../news-client';
import type { FetchFn } from '../../ingestion/news-connector';

const okBody = {
  answer: 'Nothing major today.',
  references: [{ source: 'Tech News', date: '2026-01-18T12:00:00Z', url: 'https://x.com/a' }],
  metadata: { retrieved_docs: 1 },
};

function respond(body: string, status: number): FetchFn {
  return vi.fn<FetchFn>().mockImplementation(async () => new Response(body, { status }));
}

describe('NewsClient', () => {
  describe('ask', () => {
    it('should post the prompt and return the parsed response', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response(JSON.stringify(okBody), { status: 200 }));
      const client = new NewsClient({ baseUrl: 'http://api.test/', fetchFn });

      const result = await client.ask('Any news?');

      expect(result).toEqual({ kind: 'ok', response: okBody });
      const [url, init] = fetchFn.mock.calls[0];
      expect(url).toBe('http://api.test/v1/chat');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"prompt":"Any news?"}');
    });

    it('should report a non-200 status with its body', async () => {
      const client = new NewsClient({ baseUrl: 'http://api.test', fetchFn: respond('{"error":"Model completion failed"}', 502) });

      await expect(client.ask('Any news?')).resolves.toEqual({
        kind: 'error-status',
        status: 502,
        body: '{"error":"Model completion failed"}',
      });
    });

    it('should report a 200 that does not match the response shape as an error status', async () => {
      const client = new NewsClient({ baseUrl: 'http://api.test', fetchFn: respond('{"answer":1}', 200) });

      await expect(client.ask('Any news?')).resolves.toEqual({ kind: 'error-status', status: 200, body: '{"answer":1}' });
    });

    it('should report an unreachable backend', async () => {
      const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'));
      const client = new NewsClient({ baseUrl: 'http://api.test', fetchFn });

      await expect(client.ask('Any news?')).resolves.toEqual({ kind: 'unreachable', message: 'fetch failed' });
    });

    it('should report a timeout', async () => {
      const fetchFn: FetchFn = (_input, init) => new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
      const client = new NewsClient({ baseUrl: 'http://api.test', timeoutMs: 20, fetchFn });

      await expect(client.ask('Any news?')).resolves.toEqual({ kind: 'timeout', timeoutMs: 20 });
    });
  });

  describe('health', () => {
    it('should classify backend health', async () => {
      const online = new NewsClient({ baseUrl: 'http://api.test', fetchFn: respond('{"status":"healthy"}', 200) });
      const degraded = new NewsClient({ baseUrl: 'http://api.test', fetchFn: respond('unavailable', 503) });
      const offline = new NewsClient({
        baseUrl: 'http://api.test',
        fetchFn: vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed')),
      });

      await expect(online.health()).resolves.toBe('online');
      await expect(degraded.health()).resolves.toBe('degraded');
      await expect(offline.health()).resolves.toBe('offline');
    });

    it('should call the health endpoint', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response('{}', { status: 200 }));
      const client = new NewsClient({ baseUrl: 'http://api.test', fetchFn });

      await client.health();

      expect(fetchFn.mock.calls[0][0]).toBe('http://api.test/health');
    });
  });
});
