/**
 * @fileoverview Request executor: one validated HTTP round trip per call.
 * @module @tasklink/clickup/executor
 */

import type { AxiosInstance } from 'axios';
import { ConfigurationError, UnknownError } from '@tasklink/errors';
import { createLogger, type Logger } from '@tasklink/logger';
import type { CredentialContext } from './credentials.js';
import { classifyApiError } from './error-codes.js';
import { buildQueryString } from './http.js';
import { validateParams } from './validation.js';
import type { CallOptions, EndpointDescriptor, Params, PathValues } from './types.js';

/**
 * Decoded ClickUp response body.
 */
export type Payload = Record<string, unknown>;

export interface RequestExecutorOptions {
  http: AxiosInstance;
  credentials: CredentialContext;
  logger?: Logger;
}

function isRecord(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute `{placeholder}` segments, URL-encoding each value.
 *
 * @throws ConfigurationError when a placeholder has no value
 */
export function resolvePath(template: string, values: PathValues): string {
  return template.replace(/\{(\w+)\}/g, (_, key: string) => {
    const value = values[key];
    if (value === undefined || String(value).trim() === '') {
      throw new ConfigurationError(`Missing path value '${key}' for ${template}`, { placeholder: key });
    }
    return encodeURIComponent(String(value));
  });
}

/**
 * Issues exactly one HTTP request per {@link RequestExecutor.execute} call.
 * Pre-flight validation runs before the network is touched; non-2xx
 * responses are classified and thrown. Nothing is retried here.
 */
export class RequestExecutor {
  private readonly http: AxiosInstance;
  private readonly credentials: CredentialContext;
  private readonly logger: Logger;

  constructor(options: RequestExecutorOptions) {
    this.http = options.http;
    this.credentials = options.credentials;
    this.logger = options.logger ?? createLogger({ component: 'executor' });
  }

  async execute(
    descriptor: EndpointDescriptor,
    pathValues: PathValues = {},
    params: Params = {},
    options: CallOptions = {}
  ): Promise<Payload> {
    validateParams(descriptor, params);
    const path = resolvePath(descriptor.path, pathValues);

    const query: Params = {};
    for (const field of descriptor.query) {
      query[field] = params[field];
    }
    const queryString = buildQueryString(query, descriptor.arrayParams);

    let data: Params | undefined;
    if (descriptor.method === 'POST' || descriptor.method === 'PUT') {
      // null is sent as-is; ClickUp reads it as "clear this field"
      const fields = descriptor.body.filter((field) => params[field] !== undefined);
      if (fields.length > 0) {
        data = Object.fromEntries(fields.map((field) => [field, params[field]]));
      }
    }

    const url = queryString ? `${path}?${queryString}` : path;
    const start = performance.now();

    const response = await this.http.request<unknown>({
      method: descriptor.method,
      url,
      data,
      headers: { Authorization: this.credentials.resolve(options.token) },
      signal: options.signal,
      timeout: options.timeoutMs,
    });

    const durationMs = Math.round(performance.now() - start);
    this.logger.debug('ClickUp request', {
      operation: descriptor.name,
      method: descriptor.method,
      path,
      status: response.status,
      durationMs,
    });

    if (response.status < 200 || response.status >= 300) {
      const error = classifyApiError(response.status, response.data);
      this.logger.warn('ClickUp request failed', {
        operation: descriptor.name,
        status: response.status,
        kind: error.kind,
        ecode: error.ecode,
      });
      throw error;
    }

    const body = response.data;
    if (body === undefined || body === null || body === '') {
      return {};
    }
    if (!isRecord(body)) {
      throw new UnknownError('Unexpected ClickUp response body', {
        httpStatus: response.status,
        details: { body },
      });
    }
    return body;
  }
}
