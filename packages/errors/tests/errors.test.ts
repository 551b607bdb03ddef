import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import {
  TaskLinkError,
  ConfigurationError,
  UnknownOperationError,
  ValidationError,
  AuthError,
  NotFoundError,
  ServerError,
  PlanRestrictionError,
  TimeoutError,
  UnknownError,
  InternalError,
  isTaskLinkError,
  isApiError,
  wrapError,
  createErrorResponse,
  ErrorCodes,
} from '../src/index.js';
import { errorHandler, notFoundHandler } from '../src/middleware.js';

describe('TaskLinkError', () => {
  it('should create a base error with defaults', () => {
    const error = new TaskLinkError('Test error', ErrorCodes.INTERNAL_ERROR, 'internal', 500);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.kind).toBe('internal');
    expect(error.statusCode).toBe(500);
    expect(error.retryable).toBe(false);
    expect(error.isOperational).toBe(true);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('should serialize to JSON', () => {
    const error = new AuthError('Token invalid', { ecode: 'OAUTH_019', httpStatus: 401 });
    const json = error.toJSON();

    expect(json.error.code).toBe('AUTH_ERROR');
    expect(json.error.kind).toBe('auth');
    expect(json.error.message).toBe('Token invalid');
    expect(json.error.ecode).toBe('OAUTH_019');
    expect(json.error.httpStatus).toBe(401);
    expect(json.error.timestamp).toBe(error.timestamp.toISOString());
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = new TimeoutError('Request timed out', { cause });
    expect(error.cause).toBe(cause);
  });
});

describe('ConfigurationError', () => {
  it('should be a non-operational 500', () => {
    const error = new ConfigurationError('No token configured');

    expect(error.code).toBe(ErrorCodes.CONFIGURATION_ERROR);
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(false);
    expect(error.name).toBe('ConfigurationError');
  });
});

describe('UnknownOperationError', () => {
  it('should carry the operation name', () => {
    const error = new UnknownOperationError('get-everything');

    expect(error.message).toBe("Unknown operation 'get-everything'");
    expect(error.operation).toBe('get-everything');
    expect(error.statusCode).toBe(404);
    expect(error.details).toEqual({ operation: 'get-everything' });
  });
});

describe('ValidationError', () => {
  it('should store field errors', () => {
    const error = new ValidationError('Invalid input', {
      assignees: ['must contain at least 2 elements'],
    });

    expect(error.statusCode).toBe(400);
    expect(error.kind).toBe('validation');
    expect(error.hasFieldError('assignees')).toBe(true);
    expect(error.hasFieldError('name')).toBe(false);
    expect(error.getFieldErrors('assignees')).toEqual(['must contain at least 2 elements']);
    expect(error.getFieldErrors('name')).toEqual([]);
  });

  it('should merge upstream details with field errors', () => {
    const error = new ValidationError('Rejected', {}, {
      ecode: 'INPUT_005',
      httpStatus: 400,
      details: { body: { err: 'bad' } },
    });

    expect(error.ecode).toBe('INPUT_005');
    expect(error.details).toEqual({ body: { err: 'bad' }, fieldErrors: {} });
  });
});

describe('API error classes', () => {
  it.each([
    [new AuthError(), 'auth', 401, false],
    [new NotFoundError(), 'not_found', 404, false],
    [new ServerError(), 'server', 502, true],
    [new PlanRestrictionError(), 'plan_restriction', 402, false],
    [new TimeoutError(), 'timeout', 504, false],
    [new UnknownError(), 'unknown', 502, false],
  ])('%s has kind, status and retryability', (error, kind, status, retryable) => {
    expect(error.kind).toBe(kind);
    expect(error.statusCode).toBe(status);
    expect(error.retryable).toBe(retryable);
  });
});

describe('isTaskLinkError', () => {
  it('should recognise tasklink errors only', () => {
    expect(isTaskLinkError(new NotFoundError())).toBe(true);
    expect(isTaskLinkError(new Error('plain'))).toBe(false);
    expect(isTaskLinkError('string')).toBe(false);
  });
});

describe('isApiError', () => {
  it('should accept API outcomes', () => {
    expect(isApiError(new AuthError())).toBe(true);
    expect(isApiError(new ValidationError())).toBe(true);
    expect(isApiError(new UnknownError())).toBe(true);
  });

  it('should reject programmer errors', () => {
    expect(isApiError(new ConfigurationError('missing'))).toBe(false);
    expect(isApiError(new UnknownOperationError('x'))).toBe(false);
    expect(isApiError(new InternalError())).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return tasklink errors unchanged', () => {
    const original = new ServerError();
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap standard errors', () => {
    const wrapped = wrapError(new TypeError('boom'));

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.details).toEqual({ originalError: 'TypeError' });
  });

  it('should wrap strings and other values', () => {
    expect(wrapError('oops').message).toBe('oops');
    expect(wrapError(42).details).toEqual({ originalValue: '42' });
  });
});

describe('createErrorResponse', () => {
  it('should pair status code and body', () => {
    const error = new PlanRestrictionError('Upgrade required');
    const response = createErrorResponse(error);

    expect(response.statusCode).toBe(402);
    expect(response.body.error.message).toBe('Upgrade required');
  });
});

describe('errorHandler', () => {
  function buildApp(thrown: unknown) {
    const app = new Hono();
    app.onError(errorHandler({ headers: { 'x-service': 'tasklink' } }));
    app.notFound(notFoundHandler());
    app.get('/fail', () => {
      throw thrown;
    });
    return app;
  }

  it('should render tasklink errors with their status', async () => {
    const app = buildApp(new AuthError('Token invalid', { ecode: 'OAUTH_019' }));
    const res = await app.request('/fail', { headers: { 'x-request-id': 'req-1' } });
    const body = await res.json();

    expect(res.status).toBe(401);
    expect(res.headers.get('x-service')).toBe('tasklink');
    expect(body.error.kind).toBe('auth');
    expect(body.error.ecode).toBe('OAUTH_019');
    expect(body.error.requestId).toBe('req-1');
  });

  it('should render unknown throwables as internal errors', async () => {
    const app = buildApp(new Error('boom'));
    const res = await app.request('/fail');
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body.error.code).toBe('INTERNAL_ERROR');
    expect(body.error.stack).toBeUndefined();
  });

  it('should answer unknown routes with 404', async () => {
    const app = buildApp(new Error('unused'));
    const res = await app.request('/missing');
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body.error.message).toBe('No route for GET /missing');
  });
});
