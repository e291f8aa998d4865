import {
  InstrumentationServerError,
  createInstrumentationError,
  type InstrumentationErrorContext,
} from './errors.js';
import type { InstrumentationClientConfig } from './types.js';

export const DEFAULT_BASE_URL = 'http://localhost:3000/v1';

export type QueryValue = string | number | boolean | undefined | ReadonlyArray<string>;

export interface HttpRequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface ErrorEnvelope {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Aborts when the caller's signal fires or the deadline passes.
 * `release()` must run once the request settles.
 */
class RequestDeadline {
  readonly controller = new AbortController();
  timedOut = false;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly onCallerAbort = () => this.controller.abort();

  constructor(
    readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal,
  ) {
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);

    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  toError(): InstrumentationServerError {
    return new InstrumentationServerError(
      this.timedOut ? `Request timed out after ${this.timeoutMs}ms` : 'Request was aborted',
      { status: 408, code: this.timedOut ? 'TIMEOUT' : 'ABORTED' },
    );
  }

  release(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}

export class InstrumentationHttpClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly applicationKey?: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeoutMs: number;

  constructor(config: InstrumentationClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.token = config.token;
    this.applicationKey = config.applicationKey;
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.defaultTimeoutMs = config.timeoutMs ?? 30_000;
  }

  async request<T>(options: HttpRequestOptions): Promise<T> {
    const deadline = new RequestDeadline(options.timeoutMs ?? this.defaultTimeoutMs, options.signal);

    try {
      const response = await this.fetchFn(this.url(options), {
        method: options.method,
        headers: this.headers(options),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: deadline.controller.signal,
      });
      const parsed = parseJson(await response.text());
      const context: Omit<InstrumentationErrorContext, 'code'> = {
        status: response.status,
        headers: Object.fromEntries(response.headers.entries()),
      };

      if (!response.ok) {
        const envelope = readErrorEnvelope(response.status, parsed);
        throw createInstrumentationError(envelope.message, { ...context, ...envelope });
      }

      if (parsed === undefined) {
        throw new InstrumentationServerError('Expected JSON response from instrumentation API', {
          ...context,
          code: 'INVALID_RESPONSE',
        });
      }

      return parsed as T;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw deadline.toError();
      }
      throw error;
    } finally {
      deadline.release();
    }
  }

  private url(options: HttpRequestOptions): string {
    const path = options.path.startsWith('/') ? options.path : `/${options.path}`;
    const url = new URL(`${this.baseUrl}${path}`);

    // Without a profile token, authenticate with the application key
    const query: Record<string, QueryValue> =
      !this.token && this.applicationKey
        ? { ...options.query, key: this.applicationKey }
        : { ...options.query };

    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      if (typeof value === 'object') {
        for (const item of value) url.searchParams.append(key, item);
      } else {
        url.searchParams.set(key, String(value));
      }
    }

    return url.toString();
  }

  private headers(options: HttpRequestOptions): Headers {
    const headers = new Headers(this.defaultHeaders);
    for (const [key, value] of Object.entries(options.headers ?? {})) {
      headers.set(key, value);
    }

    if (this.token && !headers.has('authorization') && !headers.has('x-api-key')) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }
    if (options.body !== undefined && !headers.has('content-type')) {
      headers.set('Content-Type', 'application/json');
    }

    return headers;
  }
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrorEnvelope(status: number, parsed: unknown): ErrorEnvelope {
  const fallback: ErrorEnvelope = {
    code: `HTTP_${status}`,
    message: `Instrumentation API request failed with status ${status}`,
  };
  if (!isRecord(parsed) || !isRecord(parsed.error)) {
    return fallback;
  }

  const { code, message, details } = parsed.error;
  return {
    code: typeof code === 'string' ? code : fallback.code,
    message: typeof message === 'string' ? message : fallback.message,
    details,
  };
}
