import { describe, it, expect } from 'vitest';
import { NotFoundError, UnknownError, ValidationError } from '@tasklink/errors';
import {
  formatWorktime,
  resolveTeamIds,
  toTimeEntryRecord,
  userTaskWorktime,
  userTasks,
  userWorktime,
} from '../src/aggregation.js';
import { createTestContext } from './helpers/context.js';
import { createMockTransport } from './helpers/mock-transport.js';

const RANGE = { startDate: 1_000, endDate: 2_000 };

function entry(userId: number, username: string, duration: number, extra: Record<string, unknown> = {}) {
  return { id: `e${userId}-${duration}`, user: { id: userId, username }, duration: String(duration), start: '1500', ...extra };
}

describe('toTimeEntryRecord', () => {
  it('should normalise string fields', () => {
    expect(
      toTimeEntryRecord({
        user: { id: 7, username: 'alice' },
        duration: '3600000',
        start: '1000',
        end: '3601000',
        billable: true,
        task: { id: 'abc' },
      })
    ).toEqual({
      userId: '7',
      userName: 'alice',
      durationMs: 3_600_000,
      taskId: 'abc',
      start: 1000,
      end: 3_601_000,
      billable: true,
    });
  });

  it('should reject a malformed entry', () => {
    expect(() => toTimeEntryRecord({ user: { id: 7 }, duration: 'soon' })).toThrow(UnknownError);
  });
});

describe('userWorktime', () => {
  it('should return an empty mapping when nothing matches', async () => {
    const transport = createMockTransport({ status: 200, body: { data: [entry(9, 'carol', 60_000)] } });
    const ctx = createTestContext(transport);

    await expect(userWorktime(ctx, { ...RANGE, teamId: '42', assignee: ['7', '8'] })).resolves.toEqual({});
  });

  it('should sum several entries of one user', async () => {
    const transport = createMockTransport({
      status: 200,
      body: { data: [entry(7, 'alice', 1_800_000), entry(7, 'alice', 5_400_000), entry(8, 'bob', 60_000)] },
    });
    const ctx = createTestContext(transport);

    const summary = await userWorktime(ctx, { ...RANGE, teamId: '42' });

    expect(summary).toEqual({ alice: 7_200_000, bob: 60_000 });
    expect(transport.requests[0]?.url).toBe('/team/42/time_entries?start_date=1000&end_date=2000');
  });

  it('should send the assignee filter comma-joined', async () => {
    const transport = createMockTransport({ status: 200, body: { data: [] } });
    const ctx = createTestContext(transport);

    await userWorktime(ctx, { ...RANGE, teamId: 42, assignee: [7, 8] });

    expect(transport.requests[0]?.query.get('assignee')).toBe('7,8');
  });

  it('should skip running timers and count non-billable entries as zero', async () => {
    const transport = createMockTransport({
      status: 200,
      body: {
        data: [
          entry(7, 'alice', 600_000, { billable: true }),
          entry(7, 'alice', -1_700_000_000_000, { billable: true }),
          entry(7, 'alice', 300_000, { billable: false }),
          entry(8, 'bob', 120_000),
        ],
      },
    });
    const ctx = createTestContext(transport);

    await expect(userWorktime(ctx, { ...RANGE, teamId: '42', onlyBillable: true })).resolves.toEqual({
      alice: 600_000,
      bob: 0,
    });
  });

  it('should discover workspaces with the base token when no team is given', async () => {
    const transport = createMockTransport(
      { status: 200, body: { teams: [{ id: 1, name: 'One' }, { id: '2', name: 'Two' }] } },
      { status: 200, body: { data: [entry(7, 'alice', 1_000)] } },
      { status: 200, body: { data: [entry(7, 'alice', 2_000)] } }
    );
    const ctx = createTestContext(transport, 'test-token', 'base-token');

    const summary = await userWorktime(ctx, RANGE);

    expect(summary).toEqual({ alice: 3_000 });
    expect(transport.requests.map((request) => [request.path, request.authorization])).toEqual([
      ['/team', 'base-token'],
      ['/team/1/time_entries', 'test-token'],
      ['/team/2/time_entries', 'test-token'],
    ]);
  });

  it('should reject a reversed range before any request', async () => {
    const transport = createMockTransport();
    const ctx = createTestContext(transport);

    await expect(userWorktime(ctx, { teamId: '42', startDate: 5_000, endDate: 1_000 })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('should default the range to the start of the month until now', async () => {
    const transport = createMockTransport({ status: 200, body: { data: [] } });
    const ctx = createTestContext(transport);
    const now = new Date(2024, 4, 17, 12, 0, 0);

    await userWorktime(ctx, { teamId: '42', now });

    expect(transport.requests[0]?.query.get('start_date')).toBe(String(new Date(2024, 4, 1).getTime()));
    expect(transport.requests[0]?.query.get('end_date')).toBe(String(now.getTime()));
  });

  it('should not return a partial summary when a workspace fails', async () => {
    const transport = createMockTransport(
      { status: 200, body: { data: [entry(7, 'alice', 1_000)] } },
      { status: 401, body: { err: 'Token invalid', ECODE: 'OAUTH_019' } }
    );
    const ctx = createTestContext(transport);

    await expect(userWorktime(ctx, { ...RANGE, teamId: ['1', '2'] })).rejects.toMatchObject({
      kind: 'auth',
      ecode: 'OAUTH_019',
    });
  });
});

describe('userTaskWorktime', () => {
  const design = { task: { id: 't1', name: 'Design', custom_id: 'DEV-1' } };

  it('should sum tracked time per task of one user', async () => {
    const transport = createMockTransport({
      status: 200,
      body: {
        data: [
          entry(7, 'alice', 1_800_000, design),
          entry(7, 'alice', 600_000, { task: { id: 't2', name: 'Review' } }),
          entry(7, 'alice', 1_200_000, design),
          entry(7, 'alice', -1_700_000_000_000, { task: { id: 't3' } }),
          entry(7, 'alice', 300_000),
          entry(8, 'bob', 900_000, design),
        ],
      },
    });
    const ctx = createTestContext(transport);

    const report = await userTaskWorktime(ctx, { ...RANGE, teamId: '42', userId: 7 });

    expect(report).toEqual({
      userId: '7',
      tasks: [
        { taskId: 't1', customId: 'DEV-1', taskName: 'Design', durationMs: 3_000_000 },
        { taskId: 't2', taskName: 'Review', durationMs: 600_000 },
      ],
    });
    expect(transport.requests[0]?.url).toBe('/team/42/time_entries?start_date=1000&end_date=2000&assignee=7');
  });

  it('should merge one task across workspaces', async () => {
    const transport = createMockTransport(
      { status: 200, body: { data: [entry(7, 'alice', 1_000, design)] } },
      { status: 200, body: { data: [entry(7, 'alice', 2_000, design)] } }
    );
    const ctx = createTestContext(transport);

    const report = await userTaskWorktime(ctx, { ...RANGE, teamId: ['1', '2'], userId: '7' });

    expect(report.tasks).toEqual([{ taskId: 't1', customId: 'DEV-1', taskName: 'Design', durationMs: 3_000 }]);
    expect(transport.requests.map((request) => request.path)).toEqual(['/team/1/time_entries', '/team/2/time_entries']);
  });

  it('should reject a reversed range before any request', async () => {
    const transport = createMockTransport();
    const ctx = createTestContext(transport);

    await expect(
      userTaskWorktime(ctx, { teamId: '42', userId: '7', startDate: 5_000, endDate: 1_000 })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(transport.requests).toHaveLength(0);
  });
});

describe('resolveTeamIds', () => {
  it('should fail when no workspace is authorized', async () => {
    const transport = createMockTransport({ status: 200, body: { teams: [] } });
    const ctx = createTestContext(transport);

    await expect(resolveTeamIds(ctx, undefined)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should use the given ids without a request', async () => {
    const transport = createMockTransport();
    const ctx = createTestContext(transport);

    await expect(resolveTeamIds(ctx, [1, '2'])).resolves.toEqual(['1', '2']);
    expect(transport.requests).toHaveLength(0);
  });
});

describe('formatWorktime', () => {
  it('should render each total', () => {
    expect(formatWorktime({ alice: 5_400_000, bob: 90_061_000 })).toEqual({
      alice: '1:30:00',
      bob: '1 day, 1:01:01',
    });
  });
});

describe('userTasks', () => {
  const alice = { id: 7, username: 'alice' };
  const bob = { id: 8, username: 'bob' };

  it('should list a shared task under every assignee', async () => {
    const transport = createMockTransport({
      status: 200,
      body: {
        tasks: [
          { id: 't1', name: 'Shared', assignees: [alice, bob] },
          { id: 't2', name: 'Solo', assignees: [bob] },
          { id: 't3', name: 'Nobody', assignees: [] },
        ],
      },
    });
    const ctx = createTestContext(transport);

    const summary = await userTasks(ctx, { ...RANGE, teamId: '42' });

    expect(Object.keys(summary)).toEqual(['alice', 'bob']);
    expect(summary['alice']?.map((task) => task.id)).toEqual(['t1']);
    expect(summary['bob']?.map((task) => task.id)).toEqual(['t1', 't2']);
  });

  it('should keep only the requested assignees', async () => {
    const transport = createMockTransport({
      status: 200,
      body: { tasks: [{ id: 't1', assignees: [alice, bob] }] },
    });
    const ctx = createTestContext(transport);

    const summary = await userTasks(ctx, { ...RANGE, teamId: '42', assignee: 8 });

    expect(Object.keys(summary)).toEqual(['bob']);
  });

  it('should filter on the chosen date field', async () => {
    const transport = createMockTransport({ status: 200, body: { tasks: [] } });
    const ctx = createTestContext(transport);

    await userTasks(ctx, { ...RANGE, teamId: '42', dateField: 'due_date', includeClosed: true });

    const query = transport.requests[0]?.query;
    expect(transport.requests[0]?.path).toBe('/team/42/task');
    expect(query?.get('due_date_gt')).toBe('1000');
    expect(query?.get('due_date_lt')).toBe('2000');
    expect(query?.get('include_closed')).toBe('true');
    expect(query?.get('page')).toBe('0');
    expect(query?.has('date_created_gt')).toBe(false);
  });

  it('should follow task pages across workspaces', async () => {
    const page = Array.from({ length: 100 }, (_, index) => ({ id: `a${index}`, assignees: [alice] }));
    const transport = createMockTransport(
      { status: 200, body: { tasks: page, last_page: false } },
      { status: 200, body: { tasks: [{ id: 'a100', assignees: [alice] }], last_page: true } },
      { status: 200, body: { tasks: [{ id: 'b0', assignees: [alice] }], last_page: true } }
    );
    const ctx = createTestContext(transport);

    const summary = await userTasks(ctx, { ...RANGE, teamId: ['1', '2'] });

    expect(summary['alice']).toHaveLength(102);
    expect(transport.requests).toHaveLength(3);
  });
});
