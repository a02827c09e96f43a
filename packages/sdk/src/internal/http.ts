/**
 * HTTP client wrapping Node.js built-in fetch.
 *
 * The only place HTTP concerns are handled. This layer handles:
 * - JSON serialization of request bodies
 * - Timeout via AbortController
 * - Error mapping to TenderlyError (network, HTTP status, decode)
 * - Response validation against a zod schema
 * - One debug log line per request when a logger is set
 *
 * No retries: the first failure is returned to the caller.
 */

import type { z } from 'zod';
import { TenderlyError } from '../error.js';
import { USER_AGENT } from './constants.js';

export interface Logger {
  debug(message: string): void;
}

export interface HttpRequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  /** Prefix for the debug log line, e.g. "[tenderly]" */
  logTag?: string;
  /** Replaces the URL path in the debug log line */
  logLabel?: string;
  /** Maps a non-2xx body to an error; falls back to TenderlyError.fromResponse */
  mapError?: (body: unknown, status: number) => TenderlyError | undefined;
}

interface RawResponse {
  status: number;
  text: string;
}

export class HttpClient {
  private readonly timeout: number;
  private readonly logger?: Logger;

  constructor(timeout: number, logger?: Logger) {
    this.timeout = timeout;
    this.logger = logger;
  }

  async request<S extends z.ZodTypeAny>(
    method: string,
    url: string,
    schema: S,
    opts?: HttpRequestOptions,
  ): Promise<z.output<S>> {
    const res = await this.send(method, url, opts);
    return decodeJson(schema, res);
  }

  async requestVoid(method: string, url: string, opts?: HttpRequestOptions): Promise<void> {
    await this.send(method, url, opts);
  }

  private async send(method: string, url: string, opts?: HttpRequestOptions): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const start = Date.now();
    let status: number | undefined;

    try {
      const headers: Record<string, string> = {
        'Accept': 'application/json',
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
        ...opts?.headers,
      };

      const res = await fetch(url, {
        method,
        headers,
        body: opts?.body !== undefined ? JSON.stringify(opts.body) : undefined,
        signal: controller.signal,
      });
      status = res.status;
      const text = await res.text();

      if (!res.ok) {
        const body = parseJsonOrText(text);
        throw opts?.mapError?.(body, res.status) ?? TenderlyError.fromResponse(body, res.status);
      }

      return { status: res.status, text };
    } catch (error) {
      if (error instanceof TenderlyError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw TenderlyError.timeout(this.timeout);
      }
      // fetch rejects with TypeError on connection failures. Its message may
      // quote header values, so only the host is reported.
      throw TenderlyError.network(`Request to ${hostOf(url)} failed`, error);
    } finally {
      clearTimeout(timeoutId);
      this.log(method, url, status, Date.now() - start, opts);
    }
  }

  private log(
    method: string,
    url: string,
    status: number | undefined,
    duration: number,
    opts?: HttpRequestOptions,
  ): void {
    if (!this.logger) return;
    const tag = opts?.logTag ?? '[tenderly]';
    const label = opts?.logLabel ?? `${method} ${URL.canParse(url) ? new URL(url).pathname : url}`;
    try {
      this.logger.debug(`${tag} ${label} ${status ?? 'ERR'} ${duration}ms`);
    } catch {
      // a failing logger never replaces the request outcome
    }
  }
}

function hostOf(url: string): string {
  return URL.canParse(url) ? new URL(url).host : 'an invalid URL';
}

function parseJsonOrText(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function decodeJson<S extends z.ZodTypeAny>(schema: S, res: RawResponse): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(res.text) as unknown;
  } catch (err) {
    throw TenderlyError.decode(
      `Response body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      res.status,
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw TenderlyError.decode(
      `Response does not match the expected shape: ${issues[0] ?? 'invalid'}`,
      res.status,
      { issues },
    );
  }
  return parsed.data;
}
