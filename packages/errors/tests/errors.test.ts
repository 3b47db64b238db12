import { describe, it, expect } from 'vitest';
import {
  TrellisError,
  ConfigurationError,
  NotSavedError,
  ValidationError,
  ApiError,
  NotFoundError,
  RateLimitError,
  InvalidAccessTokenError,
  TransportError,
  isTrellisError,
  fromStatusCode,
  ErrorCodes,
} from '../src/index.js';

describe('TrellisError', () => {
  it('should create a base error with defaults', () => {
    const error = new TrellisError('Test error', ErrorCodes.INTERNAL_ERROR);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.statusCode).toBeUndefined();
    expect(error.retryable).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new TrellisError('Wrapped', ErrorCodes.INTERNAL_ERROR, { cause });
    expect(error.cause).toBe(cause);
  });

  it('should serialize to JSON', () => {
    const error = new TrellisError('Test', ErrorCodes.API_ERROR, {
      statusCode: 500,
      details: { key: 'value' },
    });
    const json = error.toJSON();

    expect(json.code).toBe('API_ERROR');
    expect(json.message).toBe('Test');
    expect(json.statusCode).toBe(500);
    expect(json.details).toEqual({ key: 'value' });
    expect(typeof json.timestamp).toBe('string');
  });
});

describe('ConfigurationError', () => {
  it('should not be retryable', () => {
    const error = new ConfigurationError('Trello has not been configured');

    expect(error.code).toBe(ErrorCodes.CONFIGURATION_ERROR);
    expect(error.name).toBe('ConfigurationError');
    expect(error.retryable).toBe(false);
    expect(error).toBeInstanceOf(TrellisError);
  });
});

describe('NotSavedError', () => {
  it('should name the entity and operation', () => {
    const error = new NotSavedError('Card', 'delete');

    expect(error.message).toBe('Cannot delete a Card that has not been saved');
    expect(error.entity).toBe('Card');
    expect(error.code).toBe('NOT_SAVED');
  });
});

describe('ValidationError', () => {
  it('should store field errors', () => {
    const error = new ValidationError('Invalid Board', { name: ['Expected string'] });

    expect(error.getFieldErrors('name')).toEqual(['Expected string']);
    expect(error.getFieldErrors('desc')).toEqual([]);
  });
});

describe('ApiError', () => {
  it('should flag 5xx as retryable', () => {
    expect(new ApiError(503, 'Unavailable').retryable).toBe(true);
  });

  it('should flag 4xx as non-retryable', () => {
    expect(new ApiError(400, 'Bad request').retryable).toBe(false);
  });

  it('should truncate long bodies', () => {
    const error = new ApiError(500, 'Boom', 'x'.repeat(600));

    expect(error.body).toHaveLength(501);
    expect(error.body.endsWith('…')).toBe(true);
  });
});

describe('NotFoundError', () => {
  it('should be an ApiError with status 404', () => {
    const error = new NotFoundError('GET /boards/b9');

    expect(error.message).toBe('GET /boards/b9 not found');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('NOT_FOUND');
    expect(error).toBeInstanceOf(ApiError);
  });
});

describe('RateLimitError', () => {
  it('should carry the retry delay', () => {
    const error = new RateLimitError(2000);

    expect(error.retryAfterMs).toBe(2000);
    expect(error.statusCode).toBe(429);
    expect(error.retryable).toBe(true);
  });
});

describe('TransportError', () => {
  it('should record the failure reason', () => {
    const error = new TransportError('connect ECONNREFUSED', 'network');

    expect(error.reason).toBe('network');
    expect(error.retryable).toBe(true);
    expect(error.statusCode).toBeUndefined();
  });
});

describe('fromStatusCode', () => {
  it('should map 401 to InvalidAccessTokenError', () => {
    const error = fromStatusCode(401, 'GET /members/me', 'invalid token');

    expect(error).toBeInstanceOf(InvalidAccessTokenError);
    expect(error.message).toBe('Invalid or expired access token for GET /members/me');
  });

  it('should map 404 to NotFoundError', () => {
    expect(fromStatusCode(404, 'GET /cards/c1')).toBeInstanceOf(NotFoundError);
  });

  it('should map 429 to RateLimitError', () => {
    const error = fromStatusCode(429, 'GET /boards/b1', '', 1500);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfterMs).toBe(1500);
  });

  it('should map anything else to ApiError', () => {
    const error = fromStatusCode(400, 'PUT /cards/c1', 'invalid value for name');

    expect(error).toBeInstanceOf(ApiError);
    expect(error.message).toBe('Trello responded 400 to PUT /cards/c1');
    expect(error.statusCode).toBe(400);
  });
});

describe('isTrellisError', () => {
  it('should recognise the hierarchy only', () => {
    expect(isTrellisError(new NotSavedError('Board', 'refresh'))).toBe(true);
    expect(isTrellisError(new Error('plain'))).toBe(false);
  });
});
