// This test suite verifies both fetch client policies, including deadline and cancellation mapping.

import http from 'node:http';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { AgentHttpClient, FetchHttpClient, decodeBody, type HttpClient } from '../src/fetcher/client.js';
import { listeningPort } from './support.js';

// This mock never settles on its own and rejects only once the request signal aborts.
function hangingFetch() {
  return vi.fn(
    (_input: string | URL, init?: RequestInit) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted.')));
      })
  );
}

describe('fetch http client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps an exceeded deadline to upstream_timeout', async () => {
    vi.stubGlobal('fetch', hangingFetch());
    const client = new FetchHttpClient({ userAgent: 'test-agent/1.0' });

    await expect(client.getText('https://example.com/slow', { timeoutMs: 20 })).rejects.toMatchObject({
      code: 'upstream_timeout',
      details: { url: 'https://example.com/slow', timeoutMs: 20 }
    });
  });

  it('maps session cancellation to request_cancelled', async () => {
    vi.stubGlobal('fetch', hangingFetch());
    const client = new FetchHttpClient({ userAgent: 'test-agent/1.0' });
    const controller = new AbortController();

    const pending = client.getText('https://example.com/slow', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'request_cancelled' });
  });

  it('does not start a request for an already cancelled session', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const client = new FetchHttpClient({ userAgent: 'test-agent/1.0' });

    await expect(client.getText('https://example.com', { signal: AbortSignal.abort() })).rejects.toMatchObject({
      code: 'request_cancelled'
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('maps connection failures to upstream_unreachable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    const client = new FetchHttpClient({ userAgent: 'test-agent/1.0' });

    await expect(client.getText('https://unreachable.example/')).rejects.toMatchObject({
      code: 'upstream_unreachable',
      message: 'Fetching https://unreachable.example/ failed: fetch failed'
    });
  });

  it('treats server errors as upstream_http_error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('maintenance', { status: 503 }))
    );
    const client = new FetchHttpClient({ userAgent: 'test-agent/1.0' });

    await expect(client.getText('https://example.com/')).rejects.toMatchObject({
      code: 'upstream_http_error',
      details: { status: 503 }
    });
  });
});

describe('agent http client', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer((request, response) => {
      switch (request.url) {
        case '/hello':
          response.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
          response.end('hello from agent');
          return;
        case '/redirect':
          response.writeHead(302, { Location: '/hello' });
          response.end();
          return;
        case '/user-agent':
          response.writeHead(200, { 'Content-Type': 'text/plain' });
          response.end(request.headers['user-agent'] ?? '');
          return;
        case '/latin1':
          response.writeHead(200, { 'Content-Type': 'text/plain; charset=iso-8859-1' });
          response.end(Buffer.from([0x63, 0x61, 0x66, 0xe9]));
          return;
        case '/unknown-charset':
          response.writeHead(200, { 'Content-Type': 'text/plain; charset="x-not-a-charset"' });
          response.end(Buffer.from('café', 'utf8'));
          return;
        case '/broken':
          response.writeHead(500, { 'Content-Type': 'text/plain' });
          response.end('boom');
          return;
        default:
          response.writeHead(404);
          response.end();
      }
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    baseUrl = `http://127.0.0.1:${listeningPort(server)}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('reads the full body through its own agent', async () => {
    const client = new AgentHttpClient({ userAgent: 'test-agent/1.0' });
    try {
      await expect(client.getText(`${baseUrl}/hello`)).resolves.toEqual({
        url: `${baseUrl}/hello`,
        status: 200,
        text: 'hello from agent'
      });
    } finally {
      client.close();
    }
  });

  it.each([
    { policy: 'default', build: (): HttpClient => new FetchHttpClient({ userAgent: 'test-agent/1.0' }) },
    { policy: 'secure', build: (): HttpClient => new AgentHttpClient({ userAgent: 'test-agent/1.0' }) }
  ])('decodes the body with the declared charset under the $policy policy', async ({ build }) => {
    const client = build();
    try {
      expect((await client.getText(`${baseUrl}/latin1`)).text).toBe('café');
      expect((await client.getText(`${baseUrl}/unknown-charset`)).text).toBe('café');
    } finally {
      client.close();
    }
  });

  it('follows redirects like fetch does', async () => {
    const client = new AgentHttpClient({ userAgent: 'test-agent/1.0' });
    try {
      const response = await client.getText(`${baseUrl}/redirect`);
      expect(response.status).toBe(200);
      expect(response.text).toBe('hello from agent');
    } finally {
      client.close();
    }
  });

  it('sends the configured user agent', async () => {
    const client = new AgentHttpClient({ userAgent: 'test-agent/1.0' });
    try {
      const response = await client.getText(`${baseUrl}/user-agent`);
      expect(response.text).toBe('test-agent/1.0');
    } finally {
      client.close();
    }
  });

  it('maps error statuses to upstream_http_error', async () => {
    const client = new AgentHttpClient({ userAgent: 'test-agent/1.0' });
    try {
      await expect(client.getText(`${baseUrl}/broken`)).rejects.toMatchObject({
        code: 'upstream_http_error',
        details: { status: 500, url: `${baseUrl}/broken` }
      });
      await expect(client.getText(`${baseUrl}/nowhere`)).rejects.toMatchObject({
        code: 'upstream_http_error',
        details: { status: 404 }
      });
    } finally {
      client.close();
    }
  });

  it('refuses protocols other than http and https', async () => {
    const client = new AgentHttpClient({ userAgent: 'test-agent/1.0' });
    try {
      await expect(client.getText('ftp://127.0.0.1/file')).rejects.toMatchObject({
        code: 'upstream_unreachable',
        message: 'Fetching ftp://127.0.0.1/file failed: Unsupported protocol ftp:'
      });
    } finally {
      client.close();
    }
  });
});

describe('body decoding', () => {
  const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);

  it('uses the charset parameter from Content-Type', () => {
    expect(decodeBody(latin1, 'text/html; charset=ISO-8859-1')).toBe('café');
  });

  it('falls back to UTF-8 without a charset or with an unknown label', () => {
    const utf8 = new TextEncoder().encode('café');
    expect(decodeBody(utf8, null)).toBe('café');
    expect(decodeBody(utf8, 'text/plain')).toBe('café');
    expect(decodeBody(utf8, 'text/plain; charset=x-not-a-charset')).toBe('café');
  });
});
