/**
 * @fileoverview HTTP transport for the ClickUp client
 * @module @tasklink/clickup/http
 */

import axios, { isAxiosError, isCancel, type AxiosAdapter, type AxiosInstance } from 'axios';
import { TimeoutError, UnknownError, isTaskLinkError, type TaskLinkError } from '@tasklink/errors';
import type { ArrayFormat, ParamValue } from './types.js';

/**
 * Options for {@link createHttpClient}.
 */
export interface HttpClientOptions {
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Replaces the platform adapter; tests pass an in-process one */
  adapter?: AxiosAdapter;
}

const DEFAULT_TIMEOUT_MS = 30000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Convert an axios transport failure (no HTTP response) into a tasklink error.
 * Cancellation and timeouts become `TimeoutError`; anything else, such as
 * DNS or connection failures, becomes `UnknownError`.
 */
export function toTransportError(error: unknown): TaskLinkError {
  if (isTaskLinkError(error)) {
    return error;
  }
  if (isCancel(error)) {
    return new TimeoutError('Request aborted', { cause: error });
  }
  if (isAxiosError(error)) {
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(`Request timed out: ${error.message}`, { cause: error });
    }
    return new UnknownError(`Transport failure: ${error.message}`, {
      cause: error,
      details: { code: error.code },
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UnknownError(`Transport failure: ${message}`, { cause: error });
}

/**
 * Creates the axios instance used by the request executor.
 *
 * Every HTTP status resolves (`validateStatus`), so the executor sees each
 * ClickUp response and classifies it; only transport failures reject.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    validateStatus: () => true,
    adapter: options.adapter,
  });

  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      throw toTransportError(error);
    }
  );

  return client;
}

function appendValue(search: URLSearchParams, key: string, value: ParamValue): void {
  if (value === null) {
    return;
  }
  if (typeof value === 'object') {
    search.append(key, JSON.stringify(value));
  } else {
    search.append(key, typeof value === 'boolean' ? (value ? 'true' : 'false') : String(value));
  }
}

/**
 * Builds a query string (without the leading `?`).
 *
 * `undefined` and `null` are dropped. Arrays are written as repeated
 * `key[]=value` pairs, or joined with commas for params listed as `comma`.
 */
export function buildQueryString(
  params: Record<string, ParamValue | undefined>,
  arrayFormats: Readonly<Record<string, ArrayFormat>> = {}
): string {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      if (arrayFormats[key] === 'comma') {
        search.append(key, value.map(String).join(','));
      } else {
        for (const element of value) {
          appendValue(search, `${key}[]`, element);
        }
      }
    } else {
      appendValue(search, key, value);
    }
  }

  return search.toString();
}

/**
 * Retries an async operation with exponential backoff.
 * Only errors flagged `retryable` are retried.
 *
 * @param fn - The async function to retry
 * @param maxRetries - Maximum number of retries
 * @param baseDelayMs - Base delay in milliseconds
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  baseDelayMs: number = 500,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const retryable = isTaskLinkError(error) && error.retryable;
      if (!retryable || attempt >= maxRetries || signal?.aborted) {
        throw error;
      }

      // Add jitter (±10%)
      const delay = baseDelayMs * Math.pow(2, attempt) * (0.9 + Math.random() * 0.2);
      await sleep(delay, signal);
    }
  }
}

/**
 * Sleep for a specified duration; rejects with `TimeoutError` when the
 * signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TimeoutError('Request aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TimeoutError('Request aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
