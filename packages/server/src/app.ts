/**
 * @fileoverview Hono application re-exposing the ClickUp client over HTTP.
 * @module @tasklink/server/app
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import {
  formatDuration,
  listOperations,
  pathParams,
  type CallOptions,
  type ClickUpClient,
  type CompoundResult,
  type DateInput,
  type ParamValue,
  type TaskCompoundResult,
} from '@tasklink/clickup';
import { ValidationError } from '@tasklink/errors';
import { errorHandler, notFoundHandler } from '@tasklink/errors/middleware';
import { createRequestLogger, getLogger, type LoggerEnv, type RequestLoggerConfig } from '@tasklink/logger';

export interface AppOptions {
  client: ClickUpClient;
  requestLogger?: RequestLoggerConfig;
  /** Include stack traces in error bodies */
  includeStack?: boolean;
}

type AppContext = Context<LoggerEnv>;

// ============================================================================
// Input parsing
// ============================================================================

function toFieldErrors(error: z.ZodError): Record<string, string[]> {
  const fieldErrors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || '_';
    (fieldErrors[field] ??= []).push(issue.message);
  }
  return fieldErrors;
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, message: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, toFieldErrors(result.error));
  }
  return result.data;
}

async function readJson(c: AppContext): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body is not valid JSON', { body: ['must be a JSON document'] });
  }
}

/**
 * `[year, month, day, hour?, minute?, second?]` from its parts, when the
 * count fits.
 */
function toDateTuple(parts: number[]): DateInput | undefined {
  if (parts.length < 3 || parts.length > 6) {
    return undefined;
  }
  const [year, month, day, hour, minute, second] = parts;
  if (hour === undefined) return [year, month, day];
  if (minute === undefined) return [year, month, day, hour];
  if (second === undefined) return [year, month, day, hour, minute];
  return [year, month, day, hour, minute, second];
}

/** Epoch milliseconds, `Y,M,D[,h,mi,s]`, or an ISO date */
const dateQuery = z.string().transform((value, ctx): DateInput => {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  if (trimmed.includes(',')) {
    const parts = trimmed.split(',').map((part) => Number(part.trim()));
    const tuple = parts.every(Number.isInteger) ? toDateTuple(parts) : undefined;
    if (tuple) {
      return tuple;
    }
  } else if (!Number.isNaN(Date.parse(trimmed))) {
    return new Date(trimmed);
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected epoch ms, Y,M,D[,h,mi,s] or an ISO date' });
  return z.NEVER;
});

/** Comma-separated ids */
const idsQuery = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0));

const booleanQuery = z.enum(['true', 'false']).transform((value) => value === 'true');

const rangeQuery = z.object({
  team_id: idsQuery.optional(),
  assignee: idsQuery.optional(),
  username: z.string().trim().min(1).optional(),
  start_date: dateQuery.optional(),
  end_date: dateQuery.optional(),
});

const worktimeQuery = rangeQuery.extend({
  only_billable: booleanQuery.optional(),
});

const tasksQuery = rangeQuery.extend({
  date_field: z.enum(['date_created', 'due_date', 'date_updated', 'date_done']).optional(),
  include_closed: booleanQuery.optional(),
  subtasks: booleanQuery.optional(),
});

const idValue = z.union([z.string().min(1), z.number()]);

const paramValue: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(paramValue), z.record(paramValue)])
);

const operationBody = z.object({
  path: z.record(idValue).default({}),
  params: z.record(paramValue).default({}),
});

const itemBody = z.object({ name: z.string(), assignee: idValue.optional() });

const checklistItemsBody = z.object({
  task_id: z.string().optional(),
  checklist_id: z.string().optional(),
  checklist_name: z.string().optional(),
  items: z.array(itemBody),
  custom_task_ids: z.boolean().optional(),
  team_id: idValue.optional(),
});

const taskComprehensiveBody = z.object({
  list_id: idValue,
  task: z.record(paramValue),
  checklists: z.array(z.object({ name: z.string(), items: z.array(itemBody).default([]) })).default([]),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Per-request options: the credential override comes from the `token` query
 * parameter, else the `Authorization` header, and is sent verbatim.
 */
function callOptions(c: AppContext): CallOptions {
  const token = c.req.query('token') ?? c.req.header('authorization');
  return { token: token?.trim() || undefined, signal: c.req.raw.signal };
}

function single(ids: string[] | undefined): string | string[] | undefined {
  if (ids === undefined || ids.length === 0) {
    return undefined;
  }
  return ids.length === 1 ? ids[0] : ids;
}

async function resolveAssignee(
  client: ClickUpClient,
  query: z.output<typeof rangeQuery>,
  options: CallOptions
): Promise<string | string[] | undefined> {
  if (query.username === undefined) {
    return single(query.assignee);
  }
  if (query.assignee !== undefined) {
    throw new ValidationError('Invalid query', {
      username: ['cannot be combined with assignee'],
    });
  }
  return client.resolveUserId(query.username, options);
}

function renderCompound(result: CompoundResult | TaskCompoundResult): Record<string, unknown> {
  if (result.ok) {
    return { ...result };
  }
  return { ...result, error: result.error.toPayload() };
}

// ============================================================================
// Application
// ============================================================================

/**
 * Build the HTTP application.
 *
 * @example
 * ```typescript
 * const app = createApp({ client: ClickUpClient.fromEnv() });
 * const res = await app.request('/operations');
 * ```
 */
export function createApp(options: AppOptions): Hono<LoggerEnv> {
  const { client } = options;
  const app = new Hono<LoggerEnv>();

  app.use('*', createRequestLogger(options.requestLogger));
  app.onError(
    errorHandler({
      includeStack: options.includeStack,
      onError: (error, ctx) => {
        const log = getLogger(ctx);
        if (error.isOperational) {
          log.warn('Request failed', { code: error.code, kind: error.kind, ecode: error.ecode });
        } else {
          log.error('Request failed', { error });
        }
      },
    })
  );
  app.notFound(notFoundHandler());

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.get('/operations', (c) =>
    c.json({
      operations: listOperations().map((descriptor) => ({
        name: descriptor.name,
        method: descriptor.method,
        path: descriptor.path,
        pathParams: pathParams(descriptor),
        query: descriptor.query,
        body: descriptor.body,
        required: descriptor.required,
        paginated: descriptor.pagination !== undefined,
      })),
    })
  );

  app.post('/operations/:name', async (c) => {
    const input = parseWith(operationBody, await readJson(c), 'Invalid operation request');
    const payload = await client.call(c.req.param('name'), input, callOptions(c));
    return c.json(payload);
  });

  app.get('/additional/user_worktime', async (c) => {
    const query = parseWith(worktimeQuery, c.req.query(), 'Invalid query');
    const call = callOptions(c);
    const totals = await client.userWorktime(
      {
        teamId: single(query.team_id),
        assignee: await resolveAssignee(client, query, call),
        startDate: query.start_date,
        endDate: query.end_date,
        onlyBillable: query.only_billable,
      },
      call
    );
    getLogger(c).info('Worktime aggregated', { users: Object.keys(totals).length });
    return c.json({ durations: client.formatWorktime(totals), totals_ms: totals });
  });

  app.get('/additional/user_tasks', async (c) => {
    const query = parseWith(tasksQuery, c.req.query(), 'Invalid query');
    const call = callOptions(c);
    const tasks = await client.userTasks(
      {
        teamId: single(query.team_id),
        assignee: await resolveAssignee(client, query, call),
        startDate: query.start_date,
        endDate: query.end_date,
        dateField: query.date_field,
        includeClosed: query.include_closed,
        subtasks: query.subtasks,
      },
      call
    );
    return c.json(tasks);
  });

  app.get('/additional/user_task_worktime', async (c) => {
    const query = parseWith(rangeQuery, c.req.query(), 'Invalid query');
    const call = callOptions(c);
    const userId = await resolveAssignee(client, query, call);
    if (typeof userId !== 'string') {
      throw new ValidationError('Invalid query', { username: ['one username or one assignee is required'] });
    }
    const report = await client.userTaskWorktime(
      { userId, teamId: single(query.team_id), startDate: query.start_date, endDate: query.end_date },
      call
    );
    return c.json({
      username: query.username ?? null,
      user_id: report.userId,
      tasks: report.tasks.map((task) => ({
        task_id: task.taskId,
        custom_id: task.customId ?? null,
        task_name: task.taskName ?? null,
        duration: formatDuration(task.durationMs),
        duration_ms: task.durationMs,
      })),
    });
  });

  app.post('/additional/multiple_checklist_items', async (c) => {
    const body = parseWith(checklistItemsBody, await readJson(c), 'Invalid checklist request');
    const result = await client.createChecklistItems(
      {
        taskId: body.task_id,
        checklistId: body.checklist_id,
        checklistName: body.checklist_name,
        items: body.items,
        customTaskIds: body.custom_task_ids,
        teamId: body.team_id,
      },
      callOptions(c)
    );
    return c.json(renderCompound(result), result.ok ? 201 : 207);
  });

  app.post('/additional/task_comprehensive', async (c) => {
    const body = parseWith(taskComprehensiveBody, await readJson(c), 'Invalid task request');
    const name = body.task['name'];
    if (typeof name !== 'string') {
      throw new ValidationError('Invalid task request', { 'task.name': ['is required'] });
    }
    const result = await client.createTaskWithChecklistAndItems(
      { listId: body.list_id, task: { ...body.task, name }, checklists: body.checklists },
      callOptions(c)
    );
    return c.json(renderCompound(result), result.ok ? 201 : 207);
  });

  return app;
}
