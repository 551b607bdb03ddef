import { z } from 'zod';

/**
 * @fileoverview ClickUp-specific type definitions and Zod schemas.
 * Only the fields the aggregators and compound operations read are modelled;
 * every schema passes unknown fields through.
 * @packageDocumentation
 */

// ============================================================================
// Request shapes
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * How an array parameter is serialised in the query string.
 * - `brackets`: `assignees[]=1&assignees[]=2`
 * - `comma`: `assignee=1,2`
 */
export type ArrayFormat = 'brackets' | 'comma';

/**
 * A value accepted as a query or body parameter.
 */
export type ParamValue =
  | string
  | number
  | boolean
  | null
  | ParamValue[]
  | { [key: string]: ParamValue | undefined };

export type Params = Record<string, ParamValue | undefined>;

/**
 * Values substituted into `{placeholder}` path segments.
 */
export type PathValues = Record<string, string | number | undefined>;

/**
 * How an endpoint pages its results.
 */
export interface PaginationSpec {
  /** Key of the item array in the payload */
  itemsKey: string;
  /** Query parameter carrying the zero-based page number; absent for single-page endpoints */
  pageParam?: string;
  /** Full page size; a shorter page ends iteration */
  pageSize?: number;
  /** Payload key that is `true` on the last page */
  lastPageKey?: string;
}

/**
 * Static description of one ClickUp operation.
 */
export interface EndpointDescriptor {
  name: string;
  method: HttpMethod;
  /** Path relative to the API base, with `{placeholder}` segments */
  path: string;
  query: readonly string[];
  body: readonly string[];
  /** Params that must be present and non-empty */
  required: readonly string[];
  /** Array params; each must hold at least two elements when given */
  arrayParams: Readonly<Record<string, ArrayFormat>>;
  /** Groups of params of which at most one may be set */
  exclusive?: readonly (readonly string[])[];
  pagination?: PaginationSpec;
  /** Safe to repeat (GET) */
  idempotent: boolean;
}

/**
 * Per-call options accepted by every client operation.
 */
export interface CallOptions {
  /** Token used for this call only, instead of the configured one */
  token?: string;
  signal?: AbortSignal;
  /** Overrides the client-wide timeout for this call */
  timeoutMs?: number;
}

/**
 * A date accepted by the aggregators: epoch milliseconds, a `Date`, or a
 * `[year, month, day, hour?, minute?, second?]` tuple (month 1-12, local time).
 */
export type DateInput =
  | number
  | Date
  | [number, number, number]
  | [number, number, number, number]
  | [number, number, number, number, number]
  | [number, number, number, number, number, number];

// ============================================================================
// Payload schemas
// ============================================================================

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const numericSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

/**
 * ClickUp user schema.
 */
export const ClickUpUserSchema = z
  .object({
    id: idSchema,
    username: z.string().nullable().transform((value) => value ?? ''),
    email: z.string().nullish(),
  })
  .passthrough();
export type ClickUpUser = z.infer<typeof ClickUpUserSchema>;

/**
 * ClickUp team (workspace) schema, as returned by `GET /team`.
 */
export const ClickUpTeamSchema = z
  .object({
    id: idSchema,
    name: z.string().optional(),
    members: z.array(z.object({ user: ClickUpUserSchema }).passthrough()).optional(),
  })
  .passthrough();
export type ClickUpTeam = z.infer<typeof ClickUpTeamSchema>;

export const AuthorizedTeamsSchema = z.object({
  teams: z.array(ClickUpTeamSchema),
});

/**
 * Time entry as returned by `GET /team/{team_id}/time_entries`.
 * Numeric fields arrive as strings.
 */
export const ClickUpTimeEntrySchema = z
  .object({
    id: idSchema.optional(),
    user: ClickUpUserSchema,
    duration: numericSchema,
    start: numericSchema.optional(),
    end: numericSchema.nullish(),
    billable: z.boolean().optional(),
    task: z
      .object({ id: idSchema, name: z.string().optional(), custom_id: z.string().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();
export type ClickUpTimeEntry = z.infer<typeof ClickUpTimeEntrySchema>;

/**
 * Normalised time entry used by the worktime aggregator.
 */
export interface TimeEntryRecord {
  userId: string;
  userName: string;
  durationMs: number;
  taskId?: string;
  taskName?: string;
  taskCustomId?: string;
  start?: number;
  end?: number;
  billable: boolean;
}

/**
 * ClickUp task schema. Fields beyond these are kept untouched.
 */
export const ClickUpTaskSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    assignees: z.array(ClickUpUserSchema).default([]),
    status: z.object({ status: z.string() }).passthrough().optional(),
  })
  .passthrough();
export type ClickUpTask = z.infer<typeof ClickUpTaskSchema>;

/**
 * Response of `POST /list/{list_id}/task`.
 */
export const CreatedTaskSchema = z.object({ id: z.string() }).passthrough();

/**
 * ClickUp checklist schema.
 */
export const ClickUpChecklistSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    items: z
      .array(z.object({ id: z.string(), name: z.string().optional() }).passthrough())
      .default([]),
  })
  .passthrough();
export type ClickUpChecklist = z.infer<typeof ClickUpChecklistSchema>;

/**
 * Response of checklist and checklist item writes.
 */
export const ChecklistResponseSchema = z.object({ checklist: ClickUpChecklistSchema });

// ============================================================================
// Results
// ============================================================================

/**
 * Total tracked time per user name, in milliseconds.
 */
export type WorktimeSummary = Record<string, number>;

/**
 * Tasks per assignee user name.
 */
export type TaskSummary = Record<string, ClickUpTask[]>;

/**
 * Tracked time on one task.
 */
export interface TaskWorktime {
  taskId: string;
  customId?: string;
  taskName?: string;
  durationMs: number;
}

/**
 * One user's tasks with the time tracked on each.
 */
export interface UserTaskWorktime {
  userId: string;
  tasks: TaskWorktime[];
}
