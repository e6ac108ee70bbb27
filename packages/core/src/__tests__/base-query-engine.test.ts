import { describe, it, expect, vi, beforeEach } from 'vitest';

import { BaseQueryEngine, isConnectivityFailure, toCount } from '../base-query-engine';
import {
  EngineConnectivityError,
  QueryExecutionError,
  QueryTimeoutError,
  RequestCancelledError,
} from '../errors';

import type { BaseQueryEngineOptions } from '../base-query-engine';
import type { Row, Scalar } from '../types';

class TestEngine extends BaseQueryEngine {
  readonly name = 'test';
  connect = vi.fn(async (): Promise<void> => undefined);
  disconnect = vi.fn(async (): Promise<void> => undefined);
  query = vi.fn(async (_query: string, _params: readonly Scalar[], _signal: AbortSignal): Promise<Row[]> => []);

  constructor(options: BaseQueryEngineOptions = {}) {
    super({ retryOptions: { maxRetries: 0 }, ...options });
  }

  protected doConnect(): Promise<void> {
    return this.connect();
  }

  protected doDisconnect(): Promise<void> {
    return this.disconnect();
  }

  protected doSelect(query: string, params: readonly Scalar[], signal: AbortSignal): Promise<Row[]> {
    return this.query(query, params, signal);
  }
}

const connectionRefused = (): Error => Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:3306'), { code: 'ECONNREFUSED' });

describe('BaseQueryEngine', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = new TestEngine();
  });

  describe('select', () => {
    it('should connect lazily on first use', async () => {
      engine.query.mockResolvedValue([{ id: 1 }]);

      expect(engine.isConnected).toBe(false);
      const rows = await engine.select('SELECT * FROM books', []);

      expect(rows).toEqual([{ id: 1 }]);
      expect(engine.isConnected).toBe(true);
      expect(engine.connect).toHaveBeenCalledTimes(1);
    });

    it('should share one connection attempt between concurrent calls', async () => {
      await Promise.all([engine.select('SELECT 1', []), engine.select('SELECT 2', [])]);

      expect(engine.connect).toHaveBeenCalledTimes(1);
    });

    it('should pass parameters through', async () => {
      await engine.select('SELECT * FROM books WHERE author = ? LIMIT ? OFFSET ?', ['le guin', 10, 0]);

      expect(engine.query).toHaveBeenCalledWith(
        'SELECT * FROM books WHERE author = ? LIMIT ? OFFSET ?',
        ['le guin', 10, 0],
        expect.any(AbortSignal),
      );
    });

    it('should reject empty SQL without calling the driver', async () => {
      await expect(engine.select('  ', [])).rejects.toBeInstanceOf(QueryExecutionError);
      expect(engine.query).not.toHaveBeenCalled();
    });

    it('should emit a query event', async () => {
      const listener = vi.fn();
      engine.on('query', listener);
      engine.query.mockResolvedValue([{ id: 1 }, { id: 2 }]);

      await engine.select('SELECT * FROM books', []);

      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ sql: 'SELECT * FROM books', params: [], rowCount: 2 }),
      );
    });
  });

  describe('error classification', () => {
    it('should report unreachable sources as connectivity failures', async () => {
      engine.connect.mockRejectedValue(connectionRefused());

      const error = await engine.select('SELECT 1', []).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EngineConnectivityError);
      expect(error).toMatchObject({ code: 'ENGINE_CONNECTIVITY', engine: 'test' });
    });

    it('should report lost connections during a query as connectivity failures', async () => {
      engine.query.mockRejectedValue(connectionRefused());

      await expect(engine.select('SELECT 1', [])).rejects.toMatchObject({ code: 'ENGINE_CONNECTIVITY' });
    });

    it('should report other driver errors as execution failures', async () => {
      engine.query.mockRejectedValue(new Error("Table 'books' doesn't exist"));

      const error = await engine.select('SELECT * FROM books', [1]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(QueryExecutionError);
      expect(error).toMatchObject({
        message: "Query failed: Table 'books' doesn't exist",
        sql: 'SELECT * FROM books',
        params: [1],
      });
    });

    it('should emit queryError and log failures', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      engine = new TestEngine({ logger });
      const listener = vi.fn();
      engine.on('queryError', listener);
      engine.query.mockRejectedValue(new Error('syntax error'));

      await expect(engine.select('SELEC 1', [])).rejects.toThrow('Query failed: syntax error');

      expect(listener).toHaveBeenCalledWith(expect.objectContaining({ sql: 'SELEC 1' }));
      expect(logger.error).toHaveBeenCalledWith('Query failed on test: Query failed: syntax error', {
        sql: 'SELEC 1',
        code: 'QUERY_EXECUTION',
      });
    });

    it('should retry the connection when configured', async () => {
      engine = new TestEngine({ retryOptions: { maxRetries: 2, retryDelay: 1 } });
      engine.connect.mockRejectedValueOnce(connectionRefused()).mockResolvedValueOnce(undefined);

      await engine.select('SELECT 1', []);

      expect(engine.connect).toHaveBeenCalledTimes(2);
    });
  });

  describe('timeouts and cancellation', () => {
    it('should time out slow queries', async () => {
      engine = new TestEngine({ queryTimeout: 10 });
      engine.query.mockImplementation(() => new Promise<Row[]>((resolve) => setTimeout(() => resolve([]), 200)));

      await expect(engine.select('SELECT SLEEP(1)', [])).rejects.toBeInstanceOf(QueryTimeoutError);
    });

    it('should not call the driver when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(engine.select('SELECT 1', [], { signal: controller.signal })).rejects.toBeInstanceOf(
        RequestCancelledError,
      );
      expect(engine.connect).not.toHaveBeenCalled();
      expect(engine.query).not.toHaveBeenCalled();
    });

    it('should abandon a running query when the signal aborts', async () => {
      const controller = new AbortController();
      engine.query.mockImplementation(() => new Promise<Row[]>((resolve) => setTimeout(() => resolve([]), 200)));

      const pending = engine.select('SELECT 1', [], { signal: controller.signal });
      setTimeout(() => controller.abort(), 5);

      await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    });

    it('should abort the driver signal when the caller cancels', async () => {
      const controller = new AbortController();
      engine.query.mockImplementation(() => new Promise<Row[]>((resolve) => setTimeout(() => resolve([]), 200)));

      const pending = engine.select('SELECT 1', [], { signal: controller.signal });
      setTimeout(() => controller.abort(), 5);
      await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);

      const driverSignal = engine.query.mock.calls[0]?.[2];
      expect(driverSignal?.aborted).toBe(true);
    });

    it('should abort the driver signal when the query times out', async () => {
      engine = new TestEngine({ queryTimeout: 10 });
      engine.query.mockImplementation(() => new Promise<Row[]>((resolve) => setTimeout(() => resolve([]), 200)));

      await expect(engine.select('SELECT SLEEP(1)', [])).rejects.toBeInstanceOf(QueryTimeoutError);

      expect(engine.query.mock.calls[0]?.[2]?.aborted).toBe(true);
    });

    it('should leave the driver signal alone after a successful query', async () => {
      const controller = new AbortController();

      await engine.select('SELECT 1', [], { signal: controller.signal });
      controller.abort();

      expect(engine.query.mock.calls[0]?.[2]?.aborted).toBe(false);
    });
  });

  describe('selectCount', () => {
    it('should read the first column of the first row', async () => {
      engine.query.mockResolvedValue([{ 'COUNT(*)': 12 }]);

      await expect(engine.selectCount('SELECT COUNT(*) FROM books', [])).resolves.toBe(12);
    });
  });

  describe('close', () => {
    it('should disconnect and emit once connected', async () => {
      const listener = vi.fn();
      engine.on('disconnect', listener);
      await engine.select('SELECT 1', []);

      await engine.close();

      expect(engine.disconnect).toHaveBeenCalledTimes(1);
      expect(engine.isConnected).toBe(false);
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should do nothing when never connected', async () => {
      await engine.close();

      expect(engine.disconnect).not.toHaveBeenCalled();
    });
  });
});

describe('toCount', () => {
  it('should accept numbers, bigints and numeric strings', () => {
    expect(toCount([{ total: 3 }])).toBe(3);
    expect(toCount([{ total: 4n }])).toBe(4);
    expect(toCount([{ count: '15' }])).toBe(15);
  });

  it('should treat an empty result as zero', () => {
    expect(toCount([])).toBe(0);
  });

  it('should reject non-numeric counts', () => {
    expect(() => toCount([{ total: 'many' }], 'SELECT COUNT(*) FROM books')).toThrow(
      'Count query must return a non-negative integer, got many',
    );
    expect(() => toCount([{ total: null }])).toThrow(QueryExecutionError);
  });
});

describe('isConnectivityFailure', () => {
  it('should recognize network error codes', () => {
    expect(isConnectivityFailure(connectionRefused())).toBe(true);
    expect(isConnectivityFailure(Object.assign(new Error('lost'), { code: 'PROTOCOL_CONNECTION_LOST' }))).toBe(true);
  });

  it('should recognize SQLSTATE connection exceptions', () => {
    expect(isConnectivityFailure(Object.assign(new Error('no connection'), { code: '08006' }))).toBe(true);
  });

  it('should not flag query errors', () => {
    expect(isConnectivityFailure(Object.assign(new Error('syntax'), { code: 'ER_PARSE_ERROR' }))).toBe(false);
    expect(isConnectivityFailure('ECONNREFUSED')).toBe(false);
  });
});
