/**
 * @fileoverview ClickUp REST API v2 client.
 * @module @tasklink/clickup/client
 */

import type { AxiosAdapter, AxiosInstance } from 'axios';
import { NotFoundError, ValidationError } from '@tasklink/errors';
import { createLogger, type Logger } from '@tasklink/logger';
import {
  fetchAuthorizedTeams,
  formatWorktime,
  userTaskWorktime,
  userTasks,
  userWorktime,
  type AggregationContext,
  type UserTaskWorktimeInput,
  type UserTasksInput,
  type UserWorktimeInput,
} from './aggregation.js';
import {
  createChecklistItems,
  createTaskWithChecklistAndItems,
  type CompoundResult,
  type CreateChecklistItemsInput,
  type CreateTaskWithChecklistsInput,
  type TaskCompoundResult,
} from './compound.js';
import { loadConfig, type ClickUpConfig, type Env } from './config.js';
import { CredentialContext } from './credentials.js';
import { lookupEndpoint, pathParams, type OperationName } from './endpoints.js';
import { RequestExecutor, type Payload } from './executor.js';
import { createHttpClient, withRetry } from './http.js';
import { collectPages, type PaginateOptions } from './paginator.js';
import { isPresent } from './validation.js';
import type {
  CallOptions,
  EndpointDescriptor,
  Params,
  PathValues,
  TaskSummary,
  UserTaskWorktime,
  WorktimeSummary,
} from './types.js';

type Id = string | number;

/**
 * Client configuration options.
 */
export interface ClickUpClientOptions {
  /** Prebuilt credentials; takes precedence over `token`/`baseToken` */
  credentials?: CredentialContext;
  token?: string;
  /** Fallback token for workspace discovery */
  baseToken?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Retries of `ServerError` on GET operations (default 0) */
  readRetries?: number;
  /** Base backoff delay between read retries */
  retryDelayMs?: number;
  /** Prebuilt axios instance; when absent one is created */
  http?: AxiosInstance;
  /** Adapter for the created axios instance */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

/**
 * Input of {@link ClickUpClient.call}.
 */
export interface OperationInput {
  path?: PathValues;
  params?: Params;
}

// Parameter shapes. Kept as type aliases so they are assignable to `Params`.

export type TaskRefParams = {
  custom_task_ids?: boolean;
  /** Workspace id; implies `custom_task_ids=true` */
  team_id?: Id;
};

export type ArchivedParams = { archived?: boolean };

export type TaskFilterParams = {
  archived?: boolean;
  include_markdown_description?: boolean;
  page?: number;
  order_by?: 'id' | 'created' | 'updated' | 'due_date';
  reverse?: boolean;
  subtasks?: boolean;
  statuses?: string[];
  include_closed?: boolean;
  assignees?: Id[];
  tags?: string[];
  due_date_gt?: number;
  due_date_lt?: number;
  date_created_gt?: number;
  date_created_lt?: number;
  date_updated_gt?: number;
  date_updated_lt?: number;
  date_done_gt?: number;
  date_done_lt?: number;
  custom_fields?: string;
  custom_items?: number[];
};

export type TeamTaskFilterParams = TaskFilterParams &
  TaskRefParams & {
    space_ids?: Id[];
    project_ids?: Id[];
    list_ids?: Id[];
    parent?: string;
  };

export type GetTaskParams = TaskRefParams & {
  include_subtasks?: boolean;
  include_markdown_description?: boolean;
};

export type TimeEntryParams = TaskRefParams & {
  start_date?: number;
  end_date?: number;
  /** One user id, or two or more */
  assignee?: Id | Id[];
  include_task_tags?: boolean;
  include_location_names?: boolean;
  space_id?: Id;
  folder_id?: Id;
  list_id?: Id;
  task_id?: string;
};

export type CommentPageParams = { start?: number; start_id?: string };

export type TaskWriteParams = {
  description?: string;
  markdown_description?: string;
  status?: string;
  priority?: number | null;
  due_date?: number | null;
  due_date_time?: boolean;
  parent?: string | null;
  time_estimate?: number | null;
  start_date?: number | null;
  start_date_time?: boolean;
};

export type CreateTaskParams = TaskWriteParams &
  TaskRefParams & {
    name: string;
    assignees?: Id[];
    tags?: string[];
    notify_all?: boolean;
    links_to?: string | null;
    check_required_custom_fields?: boolean;
    custom_fields?: Array<{ id: string; value: string | number | boolean | null }>;
    custom_item_id?: number | null;
  };

export type EditTaskParams = TaskWriteParams &
  TaskRefParams & {
    name?: string;
    archived?: boolean;
    assignees?: { add?: Id[]; rem?: Id[] };
  };

export type EditChecklistParams = { name?: string; position?: number };

export type ChecklistItemParams = { name: string; assignee?: Id | null };

export type EditChecklistItemParams = {
  name?: string;
  assignee?: Id | null;
  resolved?: boolean;
  parent?: string | null;
};

export type CommentParams = { comment_text: string; assignee?: Id; notify_all?: boolean };

export type UpdateCommentParams = { comment_text: string; assignee?: Id; resolved?: boolean };

export type DependencyParams = TaskRefParams & { depends_on?: string; dependency_of?: string };

/**
 * Set `custom_task_ids` when a workspace id accompanies a task reference.
 */
function withTaskRef(descriptor: EndpointDescriptor, params: Params): Params {
  if (
    descriptor.query.includes('custom_task_ids') &&
    isPresent(params['team_id']) &&
    params['custom_task_ids'] === undefined
  ) {
    return { ...params, custom_task_ids: true };
  }
  return params;
}

/**
 * ClickUp REST API v2 client.
 * One method per catalog operation, the cross-workspace aggregations and the
 * compound checklist writes. Every method takes a trailing {@link CallOptions}.
 *
 * @example
 * ```typescript
 * const client = new ClickUpClient({ token: process.env.CLICKUP_TOKEN });
 *
 * const task = await client.createTask('901', { name: 'Write release notes' });
 * const worktime = await client.userWorktime({ teamId: '42', assignee: ['7', '8'] });
 * console.log(client.formatWorktime(worktime));
 * ```
 */
export class ClickUpClient {
  readonly credentials: CredentialContext;
  private readonly executor: RequestExecutor;
  private readonly readRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: ClickUpClientOptions) {
    this.credentials = options.credentials ?? CredentialContext.create(options.token, options.baseToken);
    this.logger = options.logger ?? createLogger({ component: 'clickup-client' });
    this.readRetries = options.readRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 500;

    const http =
      options.http ??
      createHttpClient({
        baseUrl: options.baseUrl ?? 'https://app.clickup.com/api/v2',
        timeoutMs: options.timeoutMs,
        adapter: options.adapter,
      });
    this.executor = new RequestExecutor({
      http,
      credentials: this.credentials,
      logger: this.logger.child({ component: 'executor' }),
    });
  }

  /**
   * Build a client from a validated configuration.
   */
  static fromConfig(config: ClickUpConfig, extra: ClickUpClientOptions = {}): ClickUpClient {
    return new ClickUpClient({
      token: config.token,
      baseToken: config.baseToken,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      readRetries: config.readRetries,
      ...extra,
    });
  }

  /**
   * Build a client from `CLICKUP_*` environment variables.
   *
   * @throws ConfigurationError when the environment is invalid
   */
  static fromEnv(env: Env = process.env, extra: ClickUpClientOptions = {}): ClickUpClient {
    return ClickUpClient.fromConfig(loadConfig(env), extra);
  }

  private get context(): AggregationContext {
    return { executor: this.executor, credentials: this.credentials };
  }

  private dispatch(
    descriptor: EndpointDescriptor,
    path: PathValues,
    params: Params,
    options: CallOptions
  ): Promise<Payload> {
    const prepared = withTaskRef(descriptor, params);
    const send = () => this.executor.execute(descriptor, path, prepared, options);
    if (descriptor.idempotent && this.readRetries > 0) {
      return withRetry(send, this.readRetries, this.retryDelayMs, options.signal);
    }
    return send();
  }

  private run(name: OperationName, path: PathValues, params: Params, options: CallOptions): Promise<Payload> {
    return this.dispatch(lookupEndpoint(name), path, params, options);
  }

  /**
   * Dispatch any catalog operation by name.
   *
   * @throws UnknownOperationError when the name is not in the catalog
   * @throws ValidationError when a path value is missing
   */
  async call(operation: string, input: OperationInput = {}, options: CallOptions = {}): Promise<Payload> {
    const descriptor = lookupEndpoint(operation);
    const path = input.path ?? {};
    const missing = pathParams(descriptor).filter((key) => !isPresent(path[key]));
    if (missing.length > 0) {
      throw new ValidationError(
        `Invalid parameters for ${descriptor.name}`,
        Object.fromEntries(missing.map((key): [string, string[]] => [key, ['path value is required']]))
      );
    }
    this.logger.debug('Dispatching operation', { operation: descriptor.name });
    return this.dispatch(descriptor, path, input.params ?? {}, options);
  }

  // ==========================================================================
  // Workspaces & hierarchy
  // ==========================================================================

  getAuthorizedTeams(options: CallOptions = {}): Promise<Payload> {
    return this.run('authorized-teams', {}, {}, options);
  }

  getAuthorizedUser(options: CallOptions = {}): Promise<Payload> {
    return this.run('authorized-user', {}, {}, options);
  }

  /** User groups of a workspace */
  getTeams(params: { team_id?: Id; group_ids?: string } = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('teams', {}, params, options);
  }

  getSpaces(teamId: Id, params: ArchivedParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('spaces', { team_id: teamId }, params, options);
  }

  getSpace(spaceId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('space', { space_id: spaceId }, {}, options);
  }

  getFolders(spaceId: Id, params: ArchivedParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('folders', { space_id: spaceId }, params, options);
  }

  getFolder(folderId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('folder', { folder_id: folderId }, {}, options);
  }

  getLists(folderId: Id, params: ArchivedParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('lists', { folder_id: folderId }, params, options);
  }

  getList(listId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('list', { list_id: listId }, {}, options);
  }

  getFolderlessLists(spaceId: Id, params: ArchivedParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('folderless-lists', { space_id: spaceId }, params, options);
  }

  getUser(teamId: Id, userId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('user', { team_id: teamId, user_id: userId }, {}, options);
  }

  getCustomTaskTypes(teamId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('custom-task-types', { team_id: teamId }, {}, options);
  }

  getAccessibleCustomFields(listId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('accessible-custom-fields', { list_id: listId }, {}, options);
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  /** One page of a list's tasks */
  getTasks(listId: Id, params: TaskFilterParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('tasks', { list_id: listId }, params, options);
  }

  /**
   * Every task of a list, following pages until exhaustion.
   */
  getAllTasks(listId: Id, params: TaskFilterParams = {}, options: PaginateOptions = {}): Promise<unknown[]> {
    return collectPages(this.executor, lookupEndpoint('tasks'), { list_id: listId }, params, options);
  }

  /** One page of tasks across a workspace */
  getTeamTasks(teamId: Id, params: TeamTaskFilterParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('team-tasks', { team_id: teamId }, params, options);
  }

  getTask(taskId: string, params: GetTaskParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('task', { task_id: taskId }, params, options);
  }

  createTask(listId: Id, params: CreateTaskParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('create-task', { list_id: listId }, params, options);
  }

  /**
   * Update a task. Assignees are changed by delta:
   * `{ assignees: { add: [7], rem: [8] } }`.
   */
  editTask(taskId: string, params: EditTaskParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('edit-task', { task_id: taskId }, params, options);
  }

  deleteTask(taskId: string, params: TaskRefParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('delete-task', { task_id: taskId }, params, options);
  }

  removeTaskFromList(listId: Id, taskId: string, options: CallOptions = {}): Promise<Payload> {
    return this.run('remove-task-from-list', { list_id: listId, task_id: taskId }, {}, options);
  }

  addTaskLink(taskId: string, linksTo: string, params: TaskRefParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('add-task-link', { task_id: taskId, links_to: linksTo }, params, options);
  }

  deleteTaskLink(
    taskId: string,
    linksTo: string,
    params: TaskRefParams = {},
    options: CallOptions = {}
  ): Promise<Payload> {
    return this.run('delete-task-link', { task_id: taskId, links_to: linksTo }, params, options);
  }

  /**
   * @throws ValidationError when both `depends_on` and `dependency_of` are set
   */
  addTaskDependency(taskId: string, params: DependencyParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('add-task-dependency', { task_id: taskId }, params, options);
  }

  deleteTaskDependency(taskId: string, params: DependencyParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('delete-task-dependency', { task_id: taskId }, params, options);
  }

  // ==========================================================================
  // Checklists
  // ==========================================================================

  createChecklist(taskId: string, name: string, params: TaskRefParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('create-checklist', { task_id: taskId }, { ...params, name }, options);
  }

  editChecklist(checklistId: string, params: EditChecklistParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('edit-checklist', { checklist_id: checklistId }, params, options);
  }

  deleteChecklist(checklistId: string, options: CallOptions = {}): Promise<Payload> {
    return this.run('delete-checklist', { checklist_id: checklistId }, {}, options);
  }

  createChecklistItem(checklistId: string, params: ChecklistItemParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('create-checklist-item', { checklist_id: checklistId }, params, options);
  }

  editChecklistItem(
    checklistId: string,
    itemId: string,
    params: EditChecklistItemParams,
    options: CallOptions = {}
  ): Promise<Payload> {
    return this.run('edit-checklist-item', { checklist_id: checklistId, checklist_item_id: itemId }, params, options);
  }

  deleteChecklistItem(checklistId: string, itemId: string, options: CallOptions = {}): Promise<Payload> {
    return this.run('delete-checklist-item', { checklist_id: checklistId, checklist_item_id: itemId }, {}, options);
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  getTaskComments(
    taskId: string,
    params: TaskRefParams & CommentPageParams = {},
    options: CallOptions = {}
  ): Promise<Payload> {
    return this.run('task-comments', { task_id: taskId }, params, options);
  }

  getListComments(listId: Id, params: CommentPageParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('list-comments', { list_id: listId }, params, options);
  }

  getChatViewComments(viewId: string, params: CommentPageParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('chat-view-comments', { view_id: viewId }, params, options);
  }

  createTaskComment(
    taskId: string,
    params: CommentParams & TaskRefParams,
    options: CallOptions = {}
  ): Promise<Payload> {
    return this.run('create-task-comment', { task_id: taskId }, params, options);
  }

  createListComment(listId: Id, params: CommentParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('create-list-comment', { list_id: listId }, params, options);
  }

  createChatViewComment(
    viewId: string,
    params: { comment_text: string; notify_all?: boolean },
    options: CallOptions = {}
  ): Promise<Payload> {
    return this.run('create-chat-view-comment', { view_id: viewId }, params, options);
  }

  updateComment(commentId: Id, params: UpdateCommentParams, options: CallOptions = {}): Promise<Payload> {
    return this.run('update-comment', { comment_id: commentId }, params, options);
  }

  deleteComment(commentId: Id, options: CallOptions = {}): Promise<Payload> {
    return this.run('delete-comment', { comment_id: commentId }, {}, options);
  }

  // ==========================================================================
  // Time tracking
  // ==========================================================================

  getTimeEntries(teamId: Id, params: TimeEntryParams = {}, options: CallOptions = {}): Promise<Payload> {
    return this.run('time-entries', { team_id: teamId }, params, options);
  }

  // ==========================================================================
  // Aggregations & compound writes
  // ==========================================================================

  userWorktime(input: UserWorktimeInput = {}, options: CallOptions = {}): Promise<WorktimeSummary> {
    return userWorktime(this.context, input, options);
  }

  formatWorktime(summary: WorktimeSummary): Record<string, string> {
    return formatWorktime(summary);
  }

  userTasks(input: UserTasksInput = {}, options: CallOptions = {}): Promise<TaskSummary> {
    return userTasks(this.context, input, options);
  }

  userTaskWorktime(input: UserTaskWorktimeInput, options: CallOptions = {}): Promise<UserTaskWorktime> {
    return userTaskWorktime(this.context, input, options);
  }

  createChecklistItems(input: CreateChecklistItemsInput, options: CallOptions = {}): Promise<CompoundResult> {
    return createChecklistItems(this.executor, input, options);
  }

  createTaskWithChecklistAndItems(
    input: CreateTaskWithChecklistsInput,
    options: CallOptions = {}
  ): Promise<TaskCompoundResult> {
    return createTaskWithChecklistAndItems(this.executor, input, options);
  }

  /**
   * Look a user id up by username (case-insensitive) among the members of
   * every authorized workspace.
   *
   * @throws NotFoundError when no member has that username
   */
  async resolveUserId(username: string, options: CallOptions = {}): Promise<string> {
    const wanted = username.trim().toLowerCase();
    const teams = await fetchAuthorizedTeams(this.context, options);
    for (const team of teams) {
      const member = team.members?.find((entry) => entry.user.username.toLowerCase() === wanted);
      if (member) {
        return member.user.id;
      }
    }
    throw new NotFoundError(`No user named '${username}' in the authorized workspaces`, {
      details: { username },
    });
  }
}
