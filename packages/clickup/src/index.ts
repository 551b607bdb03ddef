/**
 * @fileoverview ClickUp REST API v2 client
 * @module @tasklink/clickup
 *
 * @example
 * ```typescript
 * import { ClickUpClient, padArrayParam } from '@tasklink/clickup';
 *
 * const client = ClickUpClient.fromEnv();
 * const page = await client.getTasks('901', { statuses: padArrayParam(['open']) });
 * ```
 */

export * from './types.js';
export * from './config.js';
export * from './credentials.js';
export * from './endpoints.js';
export * from './error-codes.js';
export * from './http.js';
export * from './validation.js';
export * from './executor.js';
export * from './paginator.js';
export * from './dates.js';
export * from './aggregation.js';
export * from './compound.js';
export * from './client.js';
