import { describe, it, expect } from 'vitest';
import {
  AuthError,
  ConfigurationError,
  TimeoutError,
  UnknownError,
  ValidationError,
} from '@tasklink/errors';
import { lookupEndpoint } from '../src/endpoints.js';
import { resolvePath } from '../src/executor.js';
import { buildQueryString } from '../src/http.js';
import { padArrayParam } from '../src/validation.js';
import { createTestContext } from './helpers/context.js';
import { createMockTransport } from './helpers/mock-transport.js';

describe('resolvePath', () => {
  it('should substitute and encode placeholders', () => {
    expect(resolvePath('/task/{task_id}/link/{links_to}', { task_id: 'a b', links_to: 'c/d' })).toBe(
      '/task/a%20b/link/c%2Fd'
    );
  });

  it('should reject a missing placeholder value', () => {
    expect(() => resolvePath('/list/{list_id}', {})).toThrow(ConfigurationError);
    expect(() => resolvePath('/list/{list_id}', { list_id: ' ' })).toThrow(
      "Missing path value 'list_id' for /list/{list_id}"
    );
  });
});

describe('buildQueryString', () => {
  it('should drop absent values and write booleans', () => {
    expect(buildQueryString({ archived: false, page: 0, order_by: undefined, parent: null })).toBe(
      'archived=false&page=0'
    );
  });

  it('should repeat bracket arrays and join comma arrays', () => {
    expect(buildQueryString({ statuses: ['open', 'done'] })).toBe('statuses%5B%5D=open&statuses%5B%5D=done');
    expect(buildQueryString({ assignee: [7, 8] }, { assignee: 'comma' })).toBe('assignee=7%2C8');
  });
});

describe('RequestExecutor', () => {
  it('should send the token verbatim and return the decoded payload', async () => {
    const transport = createMockTransport({ status: 200, body: { id: 'abc', name: 'Task' } });
    const { executor } = createTestContext(transport);

    const payload = await executor.execute(lookupEndpoint('task'), { task_id: 'abc' }, { include_subtasks: true });

    expect(payload).toEqual({ id: 'abc', name: 'Task' });
    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0]).toMatchObject({
      method: 'GET',
      url: '/task/abc?include_subtasks=true',
      authorization: 'test-token',
      body: undefined,
    });
  });

  it('should use a per-call token override', async () => {
    const transport = createMockTransport({ status: 200, body: { user: {} } });
    const { executor } = createTestContext(transport);

    await executor.execute(lookupEndpoint('authorized-user'), {}, {}, { token: 'override-token' });

    expect(transport.requests[0]?.authorization).toBe('override-token');
  });

  it('should split query and body params for writes', async () => {
    const transport = createMockTransport({ status: 200, body: { id: 'new' } });
    const { executor } = createTestContext(transport);

    await executor.execute(
      lookupEndpoint('create-task'),
      { list_id: 9 },
      { name: 'Draft', priority: 2, team_id: '42', custom_task_ids: true }
    );

    const request = transport.requests[0];
    expect(request?.method).toBe('POST');
    expect(request?.url).toBe('/list/9/task?custom_task_ids=true&team_id=42');
    expect(request?.body).toEqual({ name: 'Draft', priority: 2 });
  });

  it('should send no body when no body param is set', async () => {
    const transport = createMockTransport({ status: 200, body: {} });
    const { executor } = createTestContext(transport);

    await executor.execute(lookupEndpoint('add-task-link'), { task_id: 'a1', links_to: 'b2' });

    expect(transport.requests[0]?.body).toBeUndefined();
  });

  it('should send a body whose only field is null', async () => {
    const transport = createMockTransport({ status: 200, body: {} });
    const { executor } = createTestContext(transport);

    await executor.execute(
      lookupEndpoint('edit-checklist-item'),
      { checklist_id: 'c1', checklist_item_id: 'i1' },
      { assignee: null }
    );

    expect(transport.requests[0]?.method).toBe('PUT');
    expect(transport.requests[0]?.body).toEqual({ assignee: null });
  });

  it('should return an empty object for an empty body', async () => {
    const transport = createMockTransport({ status: 204 });
    const { executor } = createTestContext(transport);

    await expect(executor.execute(lookupEndpoint('delete-comment'), { comment_id: 5 })).resolves.toEqual({});
  });

  it('should reject space_id with folder_id before any request', async () => {
    const transport = createMockTransport({ status: 200, body: { data: [] } });
    const { executor } = createTestContext(transport);

    await expect(
      executor.execute(lookupEndpoint('time-entries'), { team_id: 1 }, { space_id: '10', folder_id: '20' })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(transport.requests).toHaveLength(0);
  });

  it('should reject a one-element array locally and send a padded one', async () => {
    const transport = createMockTransport({ status: 200, body: { tasks: [] } });
    const { executor } = createTestContext(transport);
    const descriptor = lookupEndpoint('tasks');

    await expect(executor.execute(descriptor, { list_id: 9 }, { assignees: ['812'] })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(transport.requests).toHaveLength(0);

    await executor.execute(descriptor, { list_id: 9 }, { assignees: padArrayParam(['812']) });

    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0]?.url).toBe('/list/9/task?assignees%5B%5D=812&assignees%5B%5D=');
  });

  it('should classify an ECODE response', async () => {
    const transport = createMockTransport({
      status: 400,
      body: { err: 'Authorization header required', ECODE: 'OAUTH_017' },
    });
    const { executor } = createTestContext(transport);

    const error = await executor.execute(lookupEndpoint('authorized-user')).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ kind: 'auth', ecode: 'OAUTH_017', httpStatus: 400 });
  });

  it('should reject a non-object success body', async () => {
    const transport = createMockTransport({ status: 200, body: 'OK' });
    const { executor } = createTestContext(transport);

    await expect(executor.execute(lookupEndpoint('authorized-user'))).rejects.toBeInstanceOf(UnknownError);
  });

  it('should map a transport timeout to TimeoutError', async () => {
    const transport = createMockTransport({ fail: 'timeout' });
    const { executor } = createTestContext(transport);

    await expect(executor.execute(lookupEndpoint('authorized-user'))).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should map a connection failure to UnknownError', async () => {
    const transport = createMockTransport({ fail: 'network' });
    const { executor } = createTestContext(transport);

    await expect(executor.execute(lookupEndpoint('authorized-user'))).rejects.toThrow(
      'Transport failure: getaddrinfo ENOTFOUND clickup.test'
    );
  });

  it('should fail with TimeoutError when the caller aborts', async () => {
    const transport = createMockTransport({ hang: true });
    const { executor } = createTestContext(transport);
    const controller = new AbortController();

    const pending = executor.execute(lookupEndpoint('authorized-user'), {}, {}, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should issue exactly one request on a server error', async () => {
    const transport = createMockTransport({ status: 500, body: { err: 'boom', ECODE: 'ITEMV2_003' } }, { status: 200, body: {} });
    const { executor } = createTestContext(transport);

    await expect(executor.execute(lookupEndpoint('authorized-user'))).rejects.toMatchObject({ kind: 'server' });
    expect(transport.requests).toHaveLength(1);
    expect(transport.pending).toBe(1);
  });
});
