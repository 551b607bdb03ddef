/**
 * @fileoverview Multi-step writes that report partial progress.
 * @module @tasklink/clickup/compound
 *
 * Steps run strictly in order. The first failing step ends the sequence:
 * nothing is rolled back, later steps are never attempted, and the result
 * lists what was created before the failure.
 */

import { z } from 'zod';
import { UnknownError, ValidationError, isApiError, type ApiError } from '@tasklink/errors';
import { createLogger } from '@tasklink/logger';
import { lookupEndpoint } from './endpoints.js';
import type { Payload, RequestExecutor } from './executor.js';
import {
  ChecklistResponseSchema,
  CreatedTaskSchema,
  type CallOptions,
  type ClickUpChecklist,
  type Params,
} from './types.js';

const logger = createLogger({ component: 'compound' });

export type CompoundStep = 'create-task' | 'create-checklist' | 'create-checklist-item';

/**
 * A checklist created (or filled) by a compound operation.
 */
export interface ChecklistComposite {
  taskId?: string;
  checklistId: string;
  itemIds: string[];
}

interface CompoundFailure {
  ok: false;
  failedStep: CompoundStep;
  /** Index of the failing item, for `create-checklist-item` */
  failedItem?: number;
  error: ApiError;
}

export type CompoundResult =
  | { ok: true; checklistId: string; itemIds: string[] }
  | (CompoundFailure & { checklistId?: string; itemIds: string[] });

export type TaskCompoundResult =
  | { ok: true; taskId: string; checklists: ChecklistComposite[] }
  | (CompoundFailure & { taskId?: string; checklists: ChecklistComposite[] });

const idSchema = z.union([z.string().min(1), z.number()]);

const itemSchema = z.object({
  name: z.string().trim().min(1, 'is required'),
  assignee: idSchema.optional(),
});

export type ChecklistItemInput = z.infer<typeof itemSchema>;

const checklistItemsSchema = z
  .object({
    taskId: z.string().min(1).optional(),
    checklistId: z.string().min(1).optional(),
    checklistName: z.string().trim().min(1).optional(),
    items: z.array(itemSchema).min(1, 'at least one item is required'),
    customTaskIds: z.boolean().optional(),
    teamId: idSchema.optional(),
  })
  .superRefine((input, ctx) => {
    if ((input.taskId === undefined) === (input.checklistId === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['taskId'],
        message: 'exactly one of taskId or checklistId is required',
      });
    }
    if (input.taskId !== undefined && input.checklistName === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['checklistName'],
        message: 'is required when taskId is given',
      });
    }
    if (input.checklistId !== undefined && input.checklistName !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['checklistName'],
        message: 'is not allowed when checklistId is given',
      });
    }
  });

export type CreateChecklistItemsInput = z.input<typeof checklistItemsSchema>;

const taskWithChecklistsSchema = z.object({
  listId: idSchema,
  task: z.object({ name: z.string().trim().min(1, 'is required') }).passthrough(),
  checklists: z.array(
    z.object({
      name: z.string().trim().min(1, 'is required'),
      items: z.array(itemSchema),
    })
  ),
});

export interface CreateTaskWithChecklistsInput {
  listId: string | number;
  /** `create-task` params; `name` is required */
  task: Params & { name: string };
  checklists: Array<{ name: string; items: ChecklistItemInput[] }>;
}

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join('.') || '_';
      (fieldErrors[field] ??= []).push(issue.message);
    }
    throw new ValidationError('Invalid compound operation input', fieldErrors);
  }
  return result.data;
}

type StepOutcome<T> = { ok: true; value: T } | { ok: false; error: ApiError };

/**
 * Run one step; API errors become a failed outcome, anything else propagates.
 */
async function step<T>(fn: () => Promise<T>): Promise<StepOutcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    if (isApiError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

function parseChecklist(payload: Payload): ClickUpChecklist {
  const result = ChecklistResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new UnknownError('Unexpected checklist response shape', { details: { body: payload } });
  }
  return result.data.checklist;
}

/**
 * Find the id of the item just inserted: the last item not seen before,
 * preferring one whose name matches.
 */
export function findNewItemId(checklist: ClickUpChecklist, known: ReadonlySet<string>, name: string): string {
  const fresh = checklist.items.filter((item) => !known.has(item.id));
  const byName = fresh.filter((item) => item.name === name);
  const match = byName[byName.length - 1] ?? fresh[fresh.length - 1];
  if (!match) {
    throw new UnknownError(`Inserted checklist item '${name}' not found in response`, {
      details: { checklistId: checklist.id },
    });
  }
  return match.id;
}

function taskRefParams(customTaskIds: boolean | undefined, teamId: string | number | undefined): Params {
  return {
    custom_task_ids: customTaskIds || teamId !== undefined ? true : undefined,
    team_id: teamId,
  };
}

interface FillOutcome {
  itemIds: string[];
  failure?: { failedItem: number; error: ApiError };
}

async function fillChecklist(
  executor: RequestExecutor,
  checklistId: string,
  known: Set<string>,
  items: ChecklistItemInput[],
  options: CallOptions
): Promise<FillOutcome> {
  const descriptor = lookupEndpoint('create-checklist-item');
  const itemIds: string[] = [];

  for (const [index, item] of items.entries()) {
    const outcome = await step(async () => {
      const payload = await executor.execute(
        descriptor,
        { checklist_id: checklistId },
        { name: item.name, assignee: item.assignee },
        options
      );
      const checklist = parseChecklist(payload);
      const id = findNewItemId(checklist, known, item.name);
      for (const existing of checklist.items) {
        known.add(existing.id);
      }
      return id;
    });

    if (!outcome.ok) {
      logger.warn('Checklist item insert failed', { checklistId, index, kind: outcome.error.kind });
      return { itemIds, failure: { failedItem: index, error: outcome.error } };
    }
    itemIds.push(outcome.value);
  }

  return { itemIds };
}

async function createChecklist(
  executor: RequestExecutor,
  taskId: string,
  name: string,
  refs: Params,
  options: CallOptions
): Promise<StepOutcome<ClickUpChecklist>> {
  return step(async () =>
    parseChecklist(
      await executor.execute(lookupEndpoint('create-checklist'), { task_id: taskId }, { name, ...refs }, options)
    )
  );
}

/**
 * Create a checklist on a task (or reuse an existing one) and insert items
 * one by one.
 *
 * @throws ValidationError for malformed input, before any request
 */
export async function createChecklistItems(
  executor: RequestExecutor,
  input: CreateChecklistItemsInput,
  options: CallOptions = {}
): Promise<CompoundResult> {
  const parsed = parseInput(checklistItemsSchema, input);
  const known = new Set<string>();
  let checklistId = parsed.checklistId;

  if (checklistId === undefined) {
    const created = await createChecklist(
      executor,
      parsed.taskId ?? '',
      parsed.checklistName ?? '',
      taskRefParams(parsed.customTaskIds, parsed.teamId),
      options
    );
    if (!created.ok) {
      return { ok: false, failedStep: 'create-checklist', error: created.error, itemIds: [] };
    }
    checklistId = created.value.id;
    for (const item of created.value.items) {
      known.add(item.id);
    }
  }

  const filled = await fillChecklist(executor, checklistId, known, parsed.items, options);
  if (filled.failure) {
    return {
      ok: false,
      failedStep: 'create-checklist-item',
      failedItem: filled.failure.failedItem,
      error: filled.failure.error,
      checklistId,
      itemIds: filled.itemIds,
    };
  }
  return { ok: true, checklistId, itemIds: filled.itemIds };
}

/**
 * Create a task, then each of its checklists with their items.
 *
 * @throws ValidationError for malformed input, before any request
 */
export async function createTaskWithChecklistAndItems(
  executor: RequestExecutor,
  input: CreateTaskWithChecklistsInput,
  options: CallOptions = {}
): Promise<TaskCompoundResult> {
  const parsed = parseInput(taskWithChecklistsSchema, input);

  const createdTask = await step(async () => {
    const payload = await executor.execute(
      lookupEndpoint('create-task'),
      { list_id: parsed.listId },
      input.task,
      options
    );
    const result = CreatedTaskSchema.safeParse(payload);
    if (!result.success) {
      throw new UnknownError('Unexpected task response shape', { details: { body: payload } });
    }
    return result.data.id;
  });
  if (!createdTask.ok) {
    return { ok: false, failedStep: 'create-task', error: createdTask.error, checklists: [] };
  }

  const taskId = createdTask.value;
  const checklists: ChecklistComposite[] = [];

  for (const entry of parsed.checklists) {
    const created = await createChecklist(executor, taskId, entry.name, {}, options);
    if (!created.ok) {
      return { ok: false, failedStep: 'create-checklist', error: created.error, taskId, checklists };
    }

    const known = new Set(created.value.items.map((item) => item.id));
    const filled = await fillChecklist(executor, created.value.id, known, entry.items, options);
    checklists.push({ taskId, checklistId: created.value.id, itemIds: filled.itemIds });

    if (filled.failure) {
      return {
        ok: false,
        failedStep: 'create-checklist-item',
        failedItem: filled.failure.failedItem,
        error: filled.failure.error,
        taskId,
        checklists,
      };
    }
  }

  return { ok: true, taskId, checklists };
}
