// This module wraps outbound website fetches behind one client contract with two connection policies.

import http from 'node:http';
import https from 'node:https';
import { TextDecoder } from 'node:util';
import type { FastifyBaseLogger } from 'fastify';
import { AppError } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';

export type ClientPolicy = 'default' | 'secure';

export interface HttpClientOptions {
  userAgent: string;
  logger?: FastifyBaseLogger;
}

export interface HttpGetOptions {
  // Aborted when the owning session goes away.
  signal?: AbortSignal;
  timeoutMs?: number | null;
}

export interface HttpTextResponse {
  url: string;
  status: number;
  text: string;
}

export interface HttpClient {
  readonly policy: ClientPolicy;
  getText(url: string, options?: HttpGetOptions): Promise<HttpTextResponse>;
  close(): void;
}

interface RawResponse {
  status: number;
  body: Uint8Array;
  contentType: string | null;
}

const MAX_REDIRECTS = 20;
// Timers clamp longer delays to 1 ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

const CHARSET_PATTERN = /charset\s*=\s*"?([^";\s]+)"?/i;

// This helper decodes a body with the charset declared in Content-Type, defaulting to UTF-8.
export function decodeBody(body: Uint8Array, contentType: string | null): string {
  const charset = contentType?.match(CHARSET_PATTERN)?.[1];
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset ?? 'utf-8');
  } catch {
    // Unknown labels.
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(body);
}
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// This class owns deadline handling, error mapping, and logging shared by both policies.
abstract class BaseHttpClient implements HttpClient {
  public abstract readonly policy: ClientPolicy;
  protected readonly headers: Record<string, string>;
  private readonly logger?: FastifyBaseLogger;

  protected constructor(options: HttpClientOptions) {
    this.headers = {
      'User-Agent': options.userAgent
    };
    this.logger = options.logger?.child({
      component: 'http_client'
    });
  }

  protected abstract send(url: string, signal: AbortSignal): Promise<RawResponse>;

  public close(): void {}

  // This helper writes one structured client event only when a logger is available.
  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details: Record<string, unknown>): void {
    const sanitized = sanitizeForLog(details);
    const sanitizedDetails = isPlainObject(sanitized) ? sanitized : {};
    this.logger?.[level](
      {
        event,
        policy: this.policy,
        ...sanitizedDetails
      },
      event
    );
  }

  // This method performs exactly one GET attempt and maps every failure into a request-level AppError.
  public async getText(url: string, options: HttpGetOptions = {}): Promise<HttpTextResponse> {
    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      throw new AppError(499, 'request_cancelled', 'Request was cancelled before it started.', { url });
    }

    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onParentAbort, { once: true });

    let timedOut = false;
    const timer =
      timeoutMs !== undefined && timeoutMs !== null
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutMs)
        : null;

    const startedAt = Date.now();
    this.log('info', 'fetch_request_started', { url, timeoutMs: timeoutMs ?? null });

    try {
      const raw = await this.send(url, controller.signal);
      const response = { status: raw.status, text: decodeBody(raw.body, raw.contentType) };
      const durationMs = Date.now() - startedAt;

      if (response.status >= 400) {
        this.log('warn', 'fetch_request_http_error', {
          url,
          status: response.status,
          durationMs,
          bodyPreview: response.text
        });
        throw new AppError(502, 'upstream_http_error', `Upstream responded with HTTP ${response.status}.`, {
          status: response.status,
          url
        });
      }

      this.log('info', 'fetch_request_completed', {
        url,
        status: response.status,
        durationMs,
        bodyLength: response.text.length
      });
      return { url, status: response.status, text: response.text };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }

      this.log('warn', 'fetch_request_failed', {
        url,
        durationMs: Date.now() - startedAt,
        timedOut,
        cancelled: signal?.aborted ?? false,
        error: errorForLog(error)
      });

      if (timedOut) {
        throw new AppError(504, 'upstream_timeout', `Fetching ${url} exceeded ${timeoutMs} ms.`, { url, timeoutMs });
      }

      if (signal?.aborted) {
        throw new AppError(499, 'request_cancelled', 'Request was cancelled because the session closed.', { url });
      }

      const message = error instanceof Error ? error.message : 'unknown transport error';
      throw new AppError(502, 'upstream_unreachable', `Fetching ${url} failed: ${message}`, { url });
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onParentAbort);
    }
  }
}

// This client issues requests through the runtime's built-in fetch and its default connection pool.
export class FetchHttpClient extends BaseHttpClient {
  public readonly policy = 'default' as const;

  public constructor(options: HttpClientOptions) {
    super(options);
  }

  protected async send(url: string, signal: AbortSignal): Promise<RawResponse> {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: this.headers,
      signal
    });

    return {
      status: response.status,
      body: new Uint8Array(await response.arrayBuffer()),
      contentType: response.headers.get('content-type')
    };
  }
}

export interface AgentHttpClientOptions extends HttpClientOptions {
  httpsAgent?: https.Agent;
  httpAgent?: http.Agent;
}

/**
 * Issues requests through explicitly constructed keep-alive agents instead of the
 * runtime's shared pool. Certificates are always validated and TLS below 1.2 is
 * refused. Redirects are followed the same way fetch follows them.
 */
export class AgentHttpClient extends BaseHttpClient {
  public readonly policy = 'secure' as const;
  private readonly httpsAgent: https.Agent;
  private readonly httpAgent: http.Agent;

  public constructor(options: AgentHttpClientOptions) {
    super(options);
    this.httpsAgent =
      options.httpsAgent ??
      new https.Agent({
        keepAlive: true,
        rejectUnauthorized: true,
        minVersion: 'TLSv1.2'
      });
    this.httpAgent = options.httpAgent ?? new http.Agent({ keepAlive: true });
  }

  public override close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }

  protected async send(url: string, signal: AbortSignal): Promise<RawResponse> {
    let current = new URL(url);

    for (let redirects = 0; redirects <= MAX_REDIRECTS; redirects += 1) {
      const response = await this.requestOnce(current, signal);
      if (!('location' in response)) {
        return response;
      }
      current = new URL(response.location, current);
    }

    throw new Error(`Too many redirects (more than ${MAX_REDIRECTS}).`);
  }

  private requestOnce(target: URL, signal: AbortSignal): Promise<RawResponse | { location: string }> {
    const secure = target.protocol === 'https:';
    if (!secure && target.protocol !== 'http:') {
      return Promise.reject(new Error(`Unsupported protocol ${target.protocol}`));
    }

    const transport = secure ? https : http;
    const agent = secure ? this.httpsAgent : this.httpAgent;

    return new Promise((resolve, reject) => {
      const request = transport.request(
        target,
        {
          method: 'GET',
          headers: this.headers,
          agent,
          signal
        },
        (response) => {
          const status = response.statusCode ?? 0;
          const location = response.headers.location;

          if (REDIRECT_STATUSES.has(status) && location) {
            response.resume();
            resolve({ location });
            return;
          }

          const chunks: Buffer[] = [];
          response.on('data', (chunk: Buffer) => chunks.push(chunk));
          response.on('error', reject);
          response.on('end', () => {
            resolve({ status, body: Buffer.concat(chunks), contentType: response.headers['content-type'] ?? null });
          });
        }
      );

      request.on('error', reject);
      request.end();
    });
  }
}
