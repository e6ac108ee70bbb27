import { describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  EngineConnectivityError,
  ErrorCode,
  InterceptorRejectedError,
  InternalError,
  InvalidPaginationError,
  QueryExecutionError,
  QueryTimeoutError,
  RequestCancelledError,
  RowMappingError,
  RowmuxError,
  UnknownPrioritySourceError,
  toErrorResponse,
  toRowmuxError,
} from '../index';

describe('Error classes', () => {
  describe('RowmuxError', () => {
    it('should create error with message and code', () => {
      const error = new RowmuxError('Test error', ErrorCode.INTERNAL);
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('INTERNAL');
      expect(error.name).toBe('RowmuxError');
    });

    it('should keep the cause', () => {
      const cause = new Error('Original error');
      const error = new RowmuxError('Test error', ErrorCode.INTERNAL, cause);
      expect(error.cause).toBe(cause);
    });

    it('should be an instance of Error', () => {
      expect(new RowmuxError('Test error', ErrorCode.INTERNAL)).toBeInstanceOf(Error);
    });
  });

  describe('EngineConnectivityError', () => {
    it('should carry the engine name and code', () => {
      const error = new EngineConnectivityError('Connection refused', 'mysql');
      expect(error.code).toBe('ENGINE_CONNECTIVITY');
      expect(error.engine).toBe('mysql');
      expect(error.name).toBe('EngineConnectivityError');
      expect(error).toBeInstanceOf(RowmuxError);
    });
  });

  describe('QueryTimeoutError', () => {
    it('should be a connectivity failure with its own code', () => {
      const error = new QueryTimeoutError('Too slow', 5000, 'postgresql');
      expect(error).toBeInstanceOf(EngineConnectivityError);
      expect(error.code).toBe('QUERY_TIMEOUT');
      expect(error.timeout).toBe(5000);
      expect(error.engine).toBe('postgresql');
    });
  });

  describe('QueryExecutionError', () => {
    it('should carry sql and params', () => {
      const error = new QueryExecutionError('Syntax error', 'SELEC 1', [1]);
      expect(error.code).toBe('QUERY_EXECUTION');
      expect(error.sql).toBe('SELEC 1');
      expect(error.params).toEqual([1]);
    });
  });

  describe('RowMappingError', () => {
    it('should carry the source, row index and issues', () => {
      const error = new RowMappingError('Bad row', 'archive', 2, ['title: Required']);
      expect(error.code).toBe('ROW_MAPPING');
      expect(error.sourceId).toBe('archive');
      expect(error.rowIndex).toBe(2);
      expect(error.issues).toEqual(['title: Required']);
    });
  });

  describe('InterceptorRejectedError', () => {
    it('should use the reason as message', () => {
      const error = new InterceptorRejectedError(401, 'Authentication required');
      expect(error.message).toBe('Authentication required');
      expect(error.status).toBe(401);
      expect(error.code).toBe('INTERCEPTOR_REJECTED');
    });
  });

  describe('UnknownPrioritySourceError', () => {
    it('should name the source', () => {
      const error = new UnknownPrioritySourceError('s9');
      expect(error.message).toBe('Unknown source in priority override: "s9"');
      expect(error.sourceId).toBe('s9');
      expect(error.code).toBe('UNKNOWN_PRIORITY_SOURCE');
    });
  });

  describe('InvalidPaginationError', () => {
    it('should name the field', () => {
      const error = new InvalidPaginationError('limit must be a non-negative integer, got -1', 'limit');
      expect(error.field).toBe('limit');
      expect(error.code).toBe('INVALID_PAGINATION');
    });
  });

  describe('RequestCancelledError', () => {
    it('should have a default message', () => {
      const error = new RequestCancelledError();
      expect(error.message).toBe('Request was cancelled');
      expect(error.code).toBe('REQUEST_CANCELLED');
    });
  });
});

describe('toRowmuxError', () => {
  it('should return rowmux errors unchanged', () => {
    const error = new ConfigurationError('Bad config', 'sources');
    expect(toRowmuxError(error)).toBe(error);
  });

  it('should wrap foreign errors in InternalError', () => {
    const cause = new TypeError('undefined is not a function');
    const error = toRowmuxError(cause);
    expect(error).toBeInstanceOf(InternalError);
    expect(error.message).toBe('undefined is not a function');
    expect(error.cause).toBe(cause);
  });

  it('should wrap thrown non-errors', () => {
    const error = toRowmuxError('boom');
    expect(error.code).toBe('INTERNAL');
    expect(error.message).toBe('boom');
  });
});

describe('toErrorResponse', () => {
  it('should map an error to code and message', () => {
    expect(toErrorResponse(new EngineConnectivityError('Source is down'))).toEqual({
      code: 'ENGINE_CONNECTIVITY',
      message: 'Source is down',
    });
  });

  it('should include the status of a rejected request', () => {
    expect(toErrorResponse(new InterceptorRejectedError(403, 'Access forbidden'))).toEqual({
      code: 'INTERCEPTOR_REJECTED',
      message: 'Access forbidden',
      status: 403,
    });
  });
});
