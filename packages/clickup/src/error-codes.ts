/**
 * @fileoverview ClickUp ECODE classification
 * @module @tasklink/clickup/error-codes
 */

import { z } from 'zod';
import {
  AuthError,
  NotFoundError,
  PlanRestrictionError,
  ServerError,
  UnknownError,
  ValidationError,
  type ApiError,
  type UpstreamErrorOptions,
} from '@tasklink/errors';

type ClassifiedKind = 'auth' | 'validation' | 'not_found' | 'server' | 'plan_restriction';

/**
 * Known ClickUp error codes. Codes are kept exactly as ClickUp sends them,
 * including the misspelled `OUATH_066`.
 */
export const ECODE_KINDS = {
  OAUTH_017: 'auth',
  OAUTH_019: 'auth',
  OAUTH_023: 'auth',
  OAUTH_027: 'auth',
  OAUTH_057: 'auth',
  OAUTH_061: 'auth',
  TIMEENTRYM_006: 'auth',
  TIMEENTRY_059: 'auth',

  SHARD_001: 'validation',
  ITEM_155: 'validation',
  ITEM_156: 'validation',
  OAUTH_040: 'validation',
  PUBAPITASK_008: 'validation',
  PUBAPITASK_009: 'validation',
  TIMEENTRY_007: 'validation',
  TIMEENTRY_062: 'validation',
  TIMEENTRY_065: 'validation',

  ACCESS_083: 'not_found',
  ACCESS_190: 'not_found',
  APP_001: 'not_found',
  OUATH_066: 'not_found',

  ITEMV2_003: 'server',
  CHECK_012: 'server',
  COMM_003: 'server',
  GROUP_HELPERS_001: 'server',
  '22P02': 'server',
  OAUTH_095: 'server',
  OAUTH_097: 'server',

  TEAM_110: 'plan_restriction',
} as const satisfies Readonly<Record<string, ClassifiedKind>>;

export type KnownEcode = keyof typeof ECODE_KINDS;

const errorBodySchema = z
  .object({
    err: z.string().optional(),
    ECODE: z.string().optional(),
  })
  .passthrough();

function isKnownEcode(ecode: string): ecode is KnownEcode {
  return Object.prototype.hasOwnProperty.call(ECODE_KINDS, ecode);
}

function build(kind: ClassifiedKind, message: string, options: UpstreamErrorOptions): ApiError {
  switch (kind) {
    case 'auth':
      return new AuthError(message, options);
    case 'validation':
      return new ValidationError(message, {}, options);
    case 'not_found':
      return new NotFoundError(message, options);
    case 'server':
      return new ServerError(message, options);
    case 'plan_restriction':
      return new PlanRestrictionError(message, options);
  }
}

function kindFromStatus(status: number): ClassifiedKind | undefined {
  if (status === 401) return 'auth';
  if (status === 404) return 'not_found';
  if (status >= 500) return 'server';
  return undefined;
}

/**
 * Map a failed ClickUp response onto the local taxonomy.
 *
 * A recognised `ECODE` decides the kind. A body without an `ECODE` falls back
 * to the HTTP status for 401, 404 and 5xx; everything else, including an
 * unrecognised `ECODE`, becomes an `UnknownError` carrying the raw body.
 */
export function classifyApiError(status: number, body: unknown): ApiError {
  const parsed = errorBodySchema.safeParse(body);
  const ecode = parsed.success ? parsed.data.ECODE : undefined;
  const upstreamMessage = parsed.success ? parsed.data.err : undefined;
  const message = upstreamMessage ?? `ClickUp request failed with status ${status}`;

  if (ecode !== undefined) {
    if (isKnownEcode(ecode)) {
      return build(ECODE_KINDS[ecode], message, { ecode, httpStatus: status });
    }
    return new UnknownError(message, { ecode, httpStatus: status, details: { body } });
  }

  const fallback = kindFromStatus(status);
  if (fallback && parsed.success) {
    return build(fallback, message, { httpStatus: status });
  }

  return new UnknownError(message, { httpStatus: status, details: { body } });
}
