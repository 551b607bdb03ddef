/**
 * @fileoverview Pre-flight checks run before any network call.
 * @module @tasklink/clickup/validation
 */

import { ValidationError } from '@tasklink/errors';
import type { EndpointDescriptor, ParamValue, Params } from './types.js';

/** Location params of which at most one may narrow a request */
export const HIERARCHY_KEYS = ['space_id', 'folder_id', 'list_id'] as const;
const HIERARCHY_SET: ReadonlySet<string> = new Set(HIERARCHY_KEYS);

/**
 * Minimum length ClickUp needs to read a query array as an array; a
 * one-element `key[]=v` is read as a scalar and rejected upstream.
 */
export const MIN_ARRAY_LENGTH = 2;

/**
 * Whether a param counts as set. Blank strings do not.
 */
export function isPresent(value: ParamValue | undefined): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  return true;
}

class FieldErrors {
  private readonly errors: Record<string, string[]> = {};

  add(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  throwIfAny(message: string): void {
    if (Object.keys(this.errors).length > 0) {
      throw new ValidationError(message, this.errors);
    }
  }
}

/**
 * Pad a one-element array with empty strings up to the length ClickUp reads
 * as an array. Never applied automatically: callers opt in.
 *
 * @example
 * ```typescript
 * padArrayParam(['812']); // ['812', '']
 * ```
 */
export function padArrayParam<T extends string | number>(values: readonly T[]): Array<T | ''> {
  const padded: Array<T | ''> = [...values];
  while (padded.length > 0 && padded.length < MIN_ARRAY_LENGTH) {
    padded.push('');
  }
  return padded;
}

/**
 * Reject a hierarchy scope that names more than one of space, folder and list.
 */
export function validateHierarchyScope(params: Params): void {
  const set = HIERARCHY_KEYS.filter((key) => isPresent(params[key]));
  if (set.length > 1) {
    const errors = new FieldErrors();
    for (const key of set) {
      errors.add(key, `only one of ${HIERARCHY_KEYS.join(', ')} may be set`);
    }
    errors.throwIfAny('Conflicting hierarchy scope');
  }
}

/**
 * Reject a range whose start is after its end.
 */
export function validateDateRange(start: number, end: number): void {
  if (start > end) {
    throw new ValidationError('Start date is after end date', {
      start_date: [`${new Date(start).toISOString()} is after ${new Date(end).toISOString()}`],
    });
  }
}

/**
 * Check a parameter set against a descriptor.
 *
 * @throws ValidationError listing every offending field
 */
export function validateParams(descriptor: EndpointDescriptor, params: Params): void {
  const errors = new FieldErrors();
  const allowed = new Set([...descriptor.query, ...descriptor.body]);

  for (const field of descriptor.required) {
    if (!isPresent(params[field])) {
      errors.add(field, 'is required');
    }
  }

  for (const [field, value] of Object.entries(params)) {
    if (value !== undefined && !allowed.has(field)) {
      errors.add(field, `is not a parameter of ${descriptor.name}`);
    }
  }

  for (const [field, format] of Object.entries(descriptor.arrayParams)) {
    const value = params[field];
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length < MIN_ARRAY_LENGTH) {
        errors.add(field, `must contain at least ${MIN_ARRAY_LENGTH} elements (pad with padArrayParam)`);
      }
    } else if (format === 'brackets') {
      errors.add(field, 'must be an array');
    }
  }

  for (const group of descriptor.exclusive ?? []) {
    const set = group.filter((field) => isPresent(params[field]));
    if (set.length > 1) {
      for (const field of set) {
        errors.add(field, `only one of ${group.join(', ')} may be set`);
      }
    }
  }

  errors.throwIfAny(`Invalid parameters for ${descriptor.name}`);

  if (descriptor.query.some((field) => HIERARCHY_SET.has(field))) {
    validateHierarchyScope(params);
  }
}
