/**
 * @fileoverview Environment configuration for the ClickUp client.
 * @module @tasklink/clickup/config
 */

import { z } from 'zod';
import { ConfigurationError } from '@tasklink/errors';

export const DEFAULT_API_URL = 'https://app.clickup.com/api/v2';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const clickUpEnvSchema = z.object({
  CLICKUP_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  CLICKUP_BASE_TOKEN: optionalString,
  CLICKUP_API_URL: optionalString.pipe(z.string().url().optional()),
  CLICKUP_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().optional()),
  CLICKUP_READ_RETRIES: optionalString.pipe(z.coerce.number().int().min(0).max(5).optional()),
});

export interface ClickUpConfig {
  readonly token: string;
  readonly baseToken?: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Retries of `ServerError` on GET operations; writes are never retried */
  readonly readRetries: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Turn a zod failure into a `ConfigurationError` naming every bad variable.
 */
export function toConfigurationError(error: z.ZodError): ConfigurationError {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || '_';
    (fields[field] ??= []).push(issue.message);
  }
  return new ConfigurationError(`Invalid configuration: ${Object.keys(fields).join(', ')}`, { fields });
}

/**
 * Read and validate the client configuration from environment variables.
 *
 * @throws ConfigurationError listing the offending variables
 */
export function loadConfig(env: Env = process.env): ClickUpConfig {
  const result = clickUpEnvSchema.safeParse(env);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  const parsed = result.data;
  return Object.freeze({
    token: parsed.CLICKUP_TOKEN,
    baseToken: parsed.CLICKUP_BASE_TOKEN,
    baseUrl: parsed.CLICKUP_API_URL ?? DEFAULT_API_URL,
    timeoutMs: parsed.CLICKUP_TIMEOUT_MS ?? 30000,
    readRetries: parsed.CLICKUP_READ_RETRIES ?? 0,
  });
}
