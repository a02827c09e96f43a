/**
 * TenderlyError - the single error type thrown by every SDK operation.
 *
 * `kind` tells callers which side failed:
 * - NETWORK: the request never produced a response (fetch failure, timeout)
 * - HTTP: the service answered with a non-2xx status
 * - DECODE: a 2xx response whose body is not the expected JSON shape
 * - RPC: an admin RPC response carrying a JSON-RPC `error` object
 * - VALIDATION: a parameter was rejected locally, no request was sent
 */

import { RETRYABLE_STATUSES } from './internal/constants.js';

export const ERROR_KINDS = ['NETWORK', 'HTTP', 'DECODE', 'RPC', 'VALIDATION'] as const;
export type TenderlyErrorKind = (typeof ERROR_KINDS)[number];

export interface TenderlyErrorOptions {
  kind: TenderlyErrorKind;
  code: string;
  message: string;
  status: number;
  retryable: boolean;
  details?: Record<string, unknown>;
  requestId?: string;
  rpcCode?: number;
  cause?: unknown;
}

export class TenderlyError extends Error {
  readonly kind: TenderlyErrorKind;
  readonly code: string;
  readonly status: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;
  readonly requestId?: string;
  readonly rpcCode?: number;

  constructor(opts: TenderlyErrorOptions) {
    super(opts.message);
    this.name = 'TenderlyError';
    this.kind = opts.kind;
    this.code = opts.code;
    this.status = opts.status;
    this.retryable = opts.retryable;
    this.details = opts.details;
    this.requestId = opts.requestId;
    this.rpcCode = opts.rpcCode;
    if (opts.cause !== undefined) this.cause = opts.cause;
  }

  get isRetryable(): boolean {
    return this.retryable;
  }

  /**
   * Parse an API error response body into a TenderlyError.
   *
   * The service wraps errors as `{ error: { id, slug, message } }`; some
   * endpoints answer with a flat `{ message }`. Anything else keeps only the
   * status, and a string body is carried in `details.body`.
   */
  static fromResponse(body: unknown, status: number): TenderlyError {
    const retryable = RETRYABLE_STATUSES.includes(status);

    if (isRecord(body)) {
      const inner = isRecord(body['error']) ? body['error'] : body;
      const slug = inner['slug'] ?? inner['code'];
      return new TenderlyError({
        kind: 'HTTP',
        code: typeof slug === 'string' ? slug : `HTTP_${status}`,
        message: typeof inner['message'] === 'string'
          ? inner['message']
          : `Request failed with status ${status}`,
        status,
        retryable,
        requestId: typeof inner['id'] === 'string' ? inner['id'] : undefined,
        details: isRecord(inner['data']) ? inner['data'] : undefined,
      });
    }

    return new TenderlyError({
      kind: 'HTTP',
      code: `HTTP_${status}`,
      message: `Request failed with status ${status}`,
      status,
      retryable,
      details: typeof body === 'string' && body.length > 0 ? { body } : undefined,
    });
  }

  static network(message: string, cause?: unknown): TenderlyError {
    return new TenderlyError({
      kind: 'NETWORK',
      code: 'NETWORK_ERROR',
      message,
      status: 0,
      retryable: true,
      cause,
    });
  }

  static timeout(ms: number): TenderlyError {
    return new TenderlyError({
      kind: 'NETWORK',
      code: 'REQUEST_TIMEOUT',
      message: `Request timed out after ${ms}ms`,
      status: 0,
      retryable: true,
    });
  }

  static decode(message: string, status: number, details?: Record<string, unknown>): TenderlyError {
    return new TenderlyError({
      kind: 'DECODE',
      code: 'DECODE_ERROR',
      message,
      status,
      retryable: false,
      details,
    });
  }

  static rpc(rpcCode: number, message: string, data?: unknown): TenderlyError {
    return new TenderlyError({
      kind: 'RPC',
      code: 'RPC_ERROR',
      message,
      status: 0,
      retryable: false,
      rpcCode,
      details: data !== undefined ? { data } : undefined,
    });
  }

  static validation(message: string, code = 'VALIDATION_ERROR'): TenderlyError {
    return new TenderlyError({
      kind: 'VALIDATION',
      code,
      message,
      status: 0,
      retryable: false,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      status: this.status,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
      ...(this.requestId && { requestId: this.requestId }),
      ...(this.rpcCode !== undefined && { rpcCode: this.rpcCode }),
    };
  }
}

export function isTenderlyError(err: unknown): err is TenderlyError {
  return err instanceof TenderlyError;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
