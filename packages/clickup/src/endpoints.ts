/**
 * @fileoverview Endpoint catalog: operation name to request descriptor.
 * @module @tasklink/clickup/endpoints
 */

import { UnknownOperationError } from '@tasklink/errors';
import type { ArrayFormat, EndpointDescriptor, HttpMethod, PaginationSpec } from './types.js';

interface EndpointSpec {
  method: HttpMethod;
  path: string;
  query?: readonly string[];
  body?: readonly string[];
  required?: readonly string[];
  arrayParams?: Readonly<Record<string, ArrayFormat>>;
  exclusive?: readonly (readonly string[])[];
  pagination?: PaginationSpec;
}

/** Lets a task be addressed by its custom id */
const TASK_REF = ['custom_task_ids', 'team_id'] as const;
const COMMENT_PAGE = ['start', 'start_id'] as const;
const DATE_FILTERS = [
  'due_date_gt',
  'due_date_lt',
  'date_created_gt',
  'date_created_lt',
  'date_updated_gt',
  'date_updated_lt',
  'date_done_gt',
  'date_done_lt',
] as const;

const TASK_PAGES: PaginationSpec = {
  itemsKey: 'tasks',
  pageParam: 'page',
  pageSize: 100,
  lastPageKey: 'last_page',
};

const ENDPOINT_SPECS = {
  // GET
  'authorized-teams': { method: 'GET', path: '/team' },
  'authorized-user': { method: 'GET', path: '/user' },
  teams: { method: 'GET', path: '/group', query: ['team_id', 'group_ids'] },
  spaces: { method: 'GET', path: '/team/{team_id}/space', query: ['archived'] },
  space: { method: 'GET', path: '/space/{space_id}' },
  folders: { method: 'GET', path: '/space/{space_id}/folder', query: ['archived'] },
  folder: { method: 'GET', path: '/folder/{folder_id}' },
  lists: { method: 'GET', path: '/folder/{folder_id}/list', query: ['archived'] },
  list: { method: 'GET', path: '/list/{list_id}' },
  'folderless-lists': { method: 'GET', path: '/space/{space_id}/list', query: ['archived'] },
  tasks: {
    method: 'GET',
    path: '/list/{list_id}/task',
    query: [
      'archived',
      'include_markdown_description',
      'page',
      'order_by',
      'reverse',
      'subtasks',
      'statuses',
      'include_closed',
      'assignees',
      'tags',
      ...DATE_FILTERS,
      'custom_fields',
      'custom_items',
    ],
    arrayParams: { statuses: 'brackets', assignees: 'brackets', tags: 'brackets', custom_items: 'brackets' },
    pagination: TASK_PAGES,
  },
  'team-tasks': {
    method: 'GET',
    path: '/team/{team_id}/task',
    query: [
      'page',
      'order_by',
      'reverse',
      'subtasks',
      'space_ids',
      'project_ids',
      'list_ids',
      'statuses',
      'include_closed',
      'assignees',
      'tags',
      ...DATE_FILTERS,
      'custom_fields',
      ...TASK_REF,
      'parent',
      'include_markdown_description',
      'custom_items',
    ],
    arrayParams: {
      space_ids: 'brackets',
      project_ids: 'brackets',
      list_ids: 'brackets',
      statuses: 'brackets',
      assignees: 'brackets',
      tags: 'brackets',
      custom_items: 'brackets',
    },
    pagination: TASK_PAGES,
  },
  task: {
    method: 'GET',
    path: '/task/{task_id}',
    query: [...TASK_REF, 'include_subtasks', 'include_markdown_description'],
  },
  user: { method: 'GET', path: '/team/{team_id}/user/{user_id}' },
  'time-entries': {
    method: 'GET',
    path: '/team/{team_id}/time_entries',
    query: [
      'start_date',
      'end_date',
      'assignee',
      'include_task_tags',
      'include_location_names',
      'space_id',
      'folder_id',
      'list_id',
      'task_id',
      ...TASK_REF,
    ],
    arrayParams: { assignee: 'comma' },
    exclusive: [['space_id', 'folder_id', 'list_id', 'task_id']],
    pagination: { itemsKey: 'data' },
  },
  'task-comments': { method: 'GET', path: '/task/{task_id}/comment', query: [...TASK_REF, ...COMMENT_PAGE] },
  'list-comments': { method: 'GET', path: '/list/{list_id}/comment', query: COMMENT_PAGE },
  'chat-view-comments': { method: 'GET', path: '/view/{view_id}/comment', query: COMMENT_PAGE },
  'custom-task-types': { method: 'GET', path: '/team/{team_id}/custom_item' },
  'accessible-custom-fields': { method: 'GET', path: '/list/{list_id}/field' },

  // POST / PUT
  'create-task': {
    method: 'POST',
    path: '/list/{list_id}/task',
    query: TASK_REF,
    body: [
      'name',
      'description',
      'markdown_description',
      'parent',
      'assignees',
      'tags',
      'status',
      'priority',
      'due_date',
      'due_date_time',
      'time_estimate',
      'start_date',
      'start_date_time',
      'notify_all',
      'links_to',
      'check_required_custom_fields',
      'custom_fields',
      'custom_item_id',
    ],
    required: ['name'],
  },
  'edit-task': {
    method: 'PUT',
    path: '/task/{task_id}',
    query: TASK_REF,
    body: [
      'name',
      'description',
      'markdown_description',
      'status',
      'priority',
      'due_date',
      'due_date_time',
      'parent',
      'time_estimate',
      'start_date',
      'start_date_time',
      'assignees',
      'archived',
    ],
  },
  'create-checklist': {
    method: 'POST',
    path: '/task/{task_id}/checklist',
    query: TASK_REF,
    body: ['name'],
    required: ['name'],
  },
  'edit-checklist': { method: 'PUT', path: '/checklist/{checklist_id}', body: ['name', 'position'] },
  'create-checklist-item': {
    method: 'POST',
    path: '/checklist/{checklist_id}/checklist_item',
    body: ['name', 'assignee'],
    required: ['name'],
  },
  'edit-checklist-item': {
    method: 'PUT',
    path: '/checklist/{checklist_id}/checklist_item/{checklist_item_id}',
    body: ['name', 'assignee', 'resolved', 'parent'],
  },
  'create-task-comment': {
    method: 'POST',
    path: '/task/{task_id}/comment',
    query: TASK_REF,
    body: ['comment_text', 'assignee', 'notify_all'],
    required: ['comment_text'],
  },
  'create-list-comment': {
    method: 'POST',
    path: '/list/{list_id}/comment',
    body: ['comment_text', 'assignee', 'notify_all'],
    required: ['comment_text'],
  },
  'create-chat-view-comment': {
    method: 'POST',
    path: '/view/{view_id}/comment',
    body: ['comment_text', 'notify_all'],
    required: ['comment_text'],
  },
  'update-comment': {
    method: 'PUT',
    path: '/comment/{comment_id}',
    body: ['comment_text', 'assignee', 'resolved'],
    required: ['comment_text'],
  },
  'add-task-link': { method: 'POST', path: '/task/{task_id}/link/{links_to}', query: TASK_REF },
  'add-task-dependency': {
    method: 'POST',
    path: '/task/{task_id}/dependency',
    query: TASK_REF,
    body: ['depends_on', 'dependency_of'],
    exclusive: [['depends_on', 'dependency_of']],
  },

  // DELETE
  'delete-comment': { method: 'DELETE', path: '/comment/{comment_id}' },
  'remove-task-from-list': { method: 'DELETE', path: '/list/{list_id}/task/{task_id}' },
  'delete-task': { method: 'DELETE', path: '/task/{task_id}', query: TASK_REF },
  'delete-checklist': { method: 'DELETE', path: '/checklist/{checklist_id}' },
  'delete-checklist-item': {
    method: 'DELETE',
    path: '/checklist/{checklist_id}/checklist_item/{checklist_item_id}',
  },
  'delete-task-link': { method: 'DELETE', path: '/task/{task_id}/link/{links_to}', query: TASK_REF },
  'delete-task-dependency': {
    method: 'DELETE',
    path: '/task/{task_id}/dependency',
    query: ['depends_on', 'dependency_of', ...TASK_REF],
    exclusive: [['depends_on', 'dependency_of']],
  },
} as const satisfies Record<string, EndpointSpec>;

/**
 * Name of a catalog operation.
 */
export type OperationName = keyof typeof ENDPOINT_SPECS;

function freezeDescriptor(name: string, spec: EndpointSpec): EndpointDescriptor {
  return Object.freeze({
    name,
    method: spec.method,
    path: spec.path,
    query: Object.freeze([...(spec.query ?? [])]),
    body: Object.freeze([...(spec.body ?? [])]),
    required: Object.freeze([...(spec.required ?? [])]),
    arrayParams: Object.freeze({ ...(spec.arrayParams ?? {}) }),
    exclusive: spec.exclusive ? Object.freeze(spec.exclusive.map((group) => Object.freeze([...group]))) : undefined,
    pagination: spec.pagination ? Object.freeze({ ...spec.pagination }) : undefined,
    idempotent: spec.method === 'GET',
  });
}

const ENDPOINTS: ReadonlyMap<string, EndpointDescriptor> = new Map(
  Object.entries(ENDPOINT_SPECS).map(([name, spec]): [string, EndpointDescriptor] => [
    name,
    freezeDescriptor(name, spec),
  ])
);

/**
 * Type guard for catalog operation names.
 */
export function isOperationName(name: string): name is OperationName {
  return ENDPOINTS.has(name);
}

/**
 * Look an operation up in the catalog.
 *
 * @throws UnknownOperationError when the name is not in the catalog
 */
export function lookupEndpoint(name: string): EndpointDescriptor {
  const descriptor = ENDPOINTS.get(name);
  if (!descriptor) {
    throw new UnknownOperationError(name);
  }
  return descriptor;
}

/**
 * Every descriptor, in catalog order.
 */
export function listOperations(): EndpointDescriptor[] {
  return [...ENDPOINTS.values()];
}

/**
 * Names of the `{placeholder}` segments in a descriptor's path.
 */
export function pathParams(descriptor: EndpointDescriptor): string[] {
  return [...descriptor.path.matchAll(/\{(\w+)\}/g)].map((match) => match[1] ?? '');
}
