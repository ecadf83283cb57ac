/**
 * infra/http.ts — HTTP client for the InvenioRDM REST API.
 *
 * Thin wrapper over undici that:
 *   - Prefixes every path with the instance base URL
 *   - Sends the bearer token on every repository request
 *   - Decodes JSON bodies (an empty body decodes to null)
 *   - Translates failures into the application error types:
 *       401/403            → AuthenticationError
 *       other non-2xx      → HttpError (status + raw body)
 *       non-JSON body      → ProtocolError (raw text included)
 *       no response at all → NetworkError
 *
 * get(), post() and put() take paths relative to the base URL; put() also
 * accepts raw bytes and extra headers.
 *
 * Pre-signed storage URLs are absolute and carry their own credentials, so
 * part uploads go through putRaw(), which sends no Authorization header and
 * leaves status handling to the caller.
 *
 * All requests share one undici Agent. Its header and body timeouts are set
 * from `timeoutMs`; TLS verification can be switched off for instances with
 * self-signed certificates. Tests inject a MockAgent as the dispatcher.
 */
import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import { LIMITS } from '../shared';
import {
  AuthenticationError,
  HttpError,
  NetworkError,
  ProtocolError,
} from '../utils/errors';
import { logger } from '../utils/logger';

type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface RepositoryClientOptions {
  baseUrl: string;
  token: string;
  verifyTls?: boolean;
  timeoutMs?: number;
  /** Replaces the default Agent (e.g., a MockAgent in tests) */
  dispatcher?: Dispatcher;
}

/** Status and undecoded body text of a response */
export interface RawResponse {
  statusCode: number;
  body: string;
}

type RequestBody = string | Uint8Array;

export class RepositoryClient {
  readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: RepositoryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? LIMITS.REQUEST_TIMEOUT_MS;

    const verifyTls = options.verifyTls ?? true;
    if (!verifyTls) {
      // Once per client, not per request
      logger.warn('TLS certificate verification is disabled', { baseUrl: this.baseUrl });
    }

    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: { rejectUnauthorized: verifyTls },
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
  }

  // ─── Repository API (authenticated, JSON) ─────────────────────

  async get(path: string): Promise<unknown> {
    return this.requestJson('GET', path);
  }

  async post(path: string, body?: unknown): Promise<unknown> {
    return this.requestJson('POST', path, body);
  }

  /**
   * PUT to a repository path. Byte bodies are sent as-is; anything else is
   * serialized as JSON. `headers` are added to (and may override) the
   * defaults.
   */
  async put(path: string, body: unknown, headers: Record<string, string> = {}): Promise<unknown> {
    return this.requestJson('PUT', path, body, headers);
  }

  // ─── Storage (pre-signed, unauthenticated) ─────────────────────

  /**
   * PUT raw bytes to an absolute pre-signed URL.
   * Returns the status and body text without interpreting the status.
   */
  async putRaw(url: string, body: Uint8Array, headers: Record<string, string>): Promise<RawResponse> {
    const response = await this.send('PUT', url, headers, body);
    logger.debug(`PUT ${url}`, { status: response.statusCode, bytes: body.byteLength });
    return response;
  }

  /** Releases pooled connections held by the default Agent */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  // ─── Internals ─────────────────────────────────────────────────

  private async requestJson(
    method: HttpMethod,
    path: string,
    body?: unknown,
    extraHeaders: Record<string, string> = {},
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: 'application/json',
    };

    let payload: RequestBody | undefined;
    if (body instanceof Uint8Array) {
      payload = body;
      headers['Content-Type'] = 'application/octet-stream';
    } else if (body !== undefined) {
      payload = JSON.stringify(body);
      headers['Content-Type'] = 'application/json';
    }
    Object.assign(headers, extraHeaders);

    const response = await this.send(method, url, headers, payload);
    const text = response.body;
    logger.debug(`${method} ${url}`, { status: response.statusCode });

    if (response.statusCode === 401 || response.statusCode === 403) {
      throw new AuthenticationError(response.statusCode, url);
    }
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new HttpError(response.statusCode, url, text);
    }

    // Some endpoints answer with an empty body (e.g., 204)
    if (text.trim() === '') {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new ProtocolError(
        `Failed to parse JSON response from ${url} (status ${response.statusCode})`,
        text,
      );
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: RequestBody,
  ): Promise<RawResponse> {
    try {
      const response = await request(url, {
        method,
        headers,
        body,
        dispatcher: this.dispatcher,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      return { statusCode: response.statusCode, body: await response.body.text() };
    } catch (err) {
      throw new NetworkError(url, err);
    }
  }
}

export function createRepositoryClient(options: RepositoryClientOptions): RepositoryClient {
  return new RepositoryClient(options);
}
