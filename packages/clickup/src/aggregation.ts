/**
 * @fileoverview Cross-workspace aggregations over time entries and tasks.
 * @module @tasklink/clickup/aggregation
 */

import type { z } from 'zod';
import { NotFoundError, UnknownError } from '@tasklink/errors';
import { createLogger } from '@tasklink/logger';
import type { CredentialContext } from './credentials.js';
import { formatDuration, startOfMonth, toEpochMs } from './dates.js';
import { lookupEndpoint } from './endpoints.js';
import type { RequestExecutor } from './executor.js';
import { collectPages } from './paginator.js';
import { validateDateRange } from './validation.js';
import {
  AuthorizedTeamsSchema,
  ClickUpTaskSchema,
  ClickUpTimeEntrySchema,
  type CallOptions,
  type ClickUpTask,
  type ClickUpTeam,
  type DateInput,
  type TaskSummary,
  type TaskWorktime,
  type TimeEntryRecord,
  type UserTaskWorktime,
  type WorktimeSummary,
} from './types.js';

const logger = createLogger({ component: 'aggregation' });

type Id = string | number;

/**
 * What the aggregators need from a client.
 */
export interface AggregationContext {
  executor: RequestExecutor;
  credentials: CredentialContext;
}

interface RangeInput {
  /** One workspace id, several, or none for every workspace the token can see */
  teamId?: Id | Id[];
  /** Defaults to the start of the current month */
  startDate?: DateInput;
  /** Defaults to now */
  endDate?: DateInput;
  /** Clock used for the defaults */
  now?: Date;
}

export interface UserWorktimeInput extends RangeInput {
  /** User ids; sent to ClickUp and applied as a filter */
  assignee?: Id | Id[];
  /** Count only entries flagged billable */
  onlyBillable?: boolean;
}

export interface UserTaskWorktimeInput extends RangeInput {
  userId: Id;
}

export type TaskDateField = 'date_created' | 'due_date' | 'date_updated' | 'date_done';

export interface UserTasksInput extends RangeInput {
  /** User ids to keep; tasks of other assignees are ignored */
  assignee?: Id | Id[];
  /** Task date the range applies to */
  dateField?: TaskDateField;
  includeClosed?: boolean;
  subtasks?: boolean;
}

function toIdList(value: Id | Id[] | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return (Array.isArray(value) ? value : [value]).map(String);
}

function resolveRange(input: RangeInput): { start: number; end: number } {
  const now = input.now ?? new Date();
  const start = input.startDate === undefined ? startOfMonth(now) : toEpochMs(input.startDate);
  const end = input.endDate === undefined ? now.getTime() : toEpochMs(input.endDate);
  validateDateRange(start, end);
  return { start, end };
}

function parseOrFail<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UnknownError(`Unexpected ${what} shape`, {
      details: { issues: result.error.issues, body: value },
    });
  }
  return result.data;
}

/**
 * Workspaces visible to the (base) token.
 */
export async function fetchAuthorizedTeams(
  ctx: AggregationContext,
  options: CallOptions = {}
): Promise<ClickUpTeam[]> {
  const payload = await ctx.executor.execute(lookupEndpoint('authorized-teams'), {}, {}, {
    ...options,
    token: ctx.credentials.resolveBase(options.token),
  });
  return parseOrFail(AuthorizedTeamsSchema, payload, 'authorized teams').teams;
}

/**
 * The given workspace ids, or every workspace the (base) token can see.
 *
 * @throws NotFoundError when discovery finds no workspace
 */
export async function resolveTeamIds(
  ctx: AggregationContext,
  teamId: Id | Id[] | undefined,
  options: CallOptions = {}
): Promise<string[]> {
  const given = toIdList(teamId);
  if (given && given.length > 0) {
    return given;
  }
  const teams = await fetchAuthorizedTeams(ctx, options);
  if (teams.length === 0) {
    throw new NotFoundError('No workspaces are authorized for this token');
  }
  return teams.map((team) => team.id);
}

/**
 * Normalise a raw ClickUp time entry.
 */
export function toTimeEntryRecord(raw: unknown): TimeEntryRecord {
  const entry = parseOrFail(ClickUpTimeEntrySchema, raw, 'time entry');
  return {
    userId: entry.user.id,
    userName: entry.user.username,
    durationMs: entry.duration,
    taskId: entry.task?.id,
    taskName: entry.task?.name,
    taskCustomId: entry.task?.custom_id ?? undefined,
    start: entry.start,
    end: entry.end ?? undefined,
    billable: entry.billable ?? false,
  };
}

/**
 * Sum tracked time per user name over one or more workspaces.
 *
 * The range is checked before any request. Running timers (negative
 * durations) are skipped; several entries of one user are summed. With
 * `onlyBillable`, non-billable entries count as zero, so their users still
 * appear.
 *
 * @throws ValidationError when the start is after the end
 */
export async function userWorktime(
  ctx: AggregationContext,
  input: UserWorktimeInput = {},
  options: CallOptions = {}
): Promise<WorktimeSummary> {
  const { start, end } = resolveRange(input);
  const userFilter = toIdList(input.assignee);
  const filterSet = userFilter ? new Set(userFilter) : undefined;
  const teams = await resolveTeamIds(ctx, input.teamId, options);
  const descriptor = lookupEndpoint('time-entries');

  const totals = new Map<string, number>();
  for (const teamId of teams) {
    const items = await collectPages(
      ctx.executor,
      descriptor,
      { team_id: teamId },
      { start_date: start, end_date: end, assignee: input.assignee },
      options
    );

    for (const raw of items) {
      const entry = toTimeEntryRecord(raw);
      if (filterSet && !filterSet.has(entry.userId)) continue;
      if (entry.durationMs < 0) continue;
      const counted = input.onlyBillable && !entry.billable ? 0 : entry.durationMs;
      totals.set(entry.userName, (totals.get(entry.userName) ?? 0) + counted);
    }
  }

  logger.debug('Worktime aggregated', { teams: teams.length, users: totals.size });
  return Object.fromEntries(totals);
}

/**
 * Tasks one user tracked time on, with the time summed per task.
 *
 * Entries without a task and running timers are skipped. Tasks keep the
 * order in which their first entry arrived.
 *
 * @throws ValidationError when the start is after the end
 */
export async function userTaskWorktime(
  ctx: AggregationContext,
  input: UserTaskWorktimeInput,
  options: CallOptions = {}
): Promise<UserTaskWorktime> {
  const { start, end } = resolveRange(input);
  const userId = String(input.userId);
  const teams = await resolveTeamIds(ctx, input.teamId, options);
  const descriptor = lookupEndpoint('time-entries');

  const tasks = new Map<string, TaskWorktime>();
  for (const teamId of teams) {
    const items = await collectPages(
      ctx.executor,
      descriptor,
      { team_id: teamId },
      { start_date: start, end_date: end, assignee: userId },
      options
    );

    for (const raw of items) {
      const entry = toTimeEntryRecord(raw);
      if (entry.userId !== userId || entry.taskId === undefined || entry.durationMs < 0) continue;
      const current = tasks.get(entry.taskId);
      if (current) {
        current.durationMs += entry.durationMs;
      } else {
        tasks.set(entry.taskId, {
          taskId: entry.taskId,
          customId: entry.taskCustomId,
          taskName: entry.taskName,
          durationMs: entry.durationMs,
        });
      }
    }
  }

  logger.debug('Task worktime aggregated', { teams: teams.length, tasks: tasks.size });
  return { userId, tasks: [...tasks.values()] };
}

/**
 * Render a worktime summary with human-readable durations.
 *
 * @example
 * ```typescript
 * formatWorktime({ alice: 5_400_000 }); // { alice: '1:30:00' }
 * ```
 */
export function formatWorktime(summary: WorktimeSummary): Record<string, string> {
  return Object.fromEntries(
    Object.entries(summary).map(([user, ms]): [string, string] => [user, formatDuration(ms)])
  );
}

/**
 * Group tasks of one or more workspaces by assignee user name.
 * A task with several matching assignees is listed under each of them.
 *
 * @throws ValidationError when the start is after the end
 */
export async function userTasks(
  ctx: AggregationContext,
  input: UserTasksInput = {},
  options: CallOptions = {}
): Promise<TaskSummary> {
  const { start, end } = resolveRange(input);
  const dateField = input.dateField ?? 'date_created';
  const userFilter = toIdList(input.assignee);
  const filterSet = userFilter ? new Set(userFilter) : undefined;
  const teams = await resolveTeamIds(ctx, input.teamId, options);
  const descriptor = lookupEndpoint('team-tasks');

  const grouped = new Map<string, ClickUpTask[]>();
  for (const teamId of teams) {
    const items = await collectPages(
      ctx.executor,
      descriptor,
      { team_id: teamId },
      {
        [`${dateField}_gt`]: start,
        [`${dateField}_lt`]: end,
        include_closed: input.includeClosed,
        subtasks: input.subtasks,
      },
      options
    );

    for (const raw of items) {
      const task = parseOrFail(ClickUpTaskSchema, raw, 'task');
      for (const assignee of task.assignees) {
        if (filterSet && !filterSet.has(assignee.id)) continue;
        const list = grouped.get(assignee.username) ?? [];
        list.push(task);
        grouped.set(assignee.username, list);
      }
    }
  }

  logger.debug('Tasks aggregated', { teams: teams.length, users: grouped.size });
  return Object.fromEntries(grouped);
}
