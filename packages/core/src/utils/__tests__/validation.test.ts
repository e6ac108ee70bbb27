import { describe, it, expect } from 'vitest';

import { ConfigurationError, InvalidPaginationError, InvalidQueryError, QueryExecutionError } from '../../errors';
import { validateConnectionConfig, validateIdentifier, validatePagination, validateSQL } from '../validation';

describe('validateConnectionConfig', () => {
  it('should accept host and database', () => {
    expect(() => validateConnectionConfig({ host: 'localhost', database: 'library' })).not.toThrow();
  });

  it('should accept a connection string alone', () => {
    expect(() => validateConnectionConfig({ connectionString: 'postgresql://localhost/library' })).not.toThrow();
  });

  it('should require a host', () => {
    expect(() => validateConnectionConfig({ database: 'library' })).toThrow(
      new ConfigurationError('Host is required when connectionString is not provided', 'host'),
    );
  });

  it('should require a database', () => {
    expect(() => validateConnectionConfig({ host: 'localhost' })).toThrow(ConfigurationError);
  });

  it('should reject ports out of range', () => {
    expect(() => validateConnectionConfig({ host: 'localhost', database: 'library', port: 70000 })).toThrow(
      'Port must be a number between 1 and 65535',
    );
    expect(() => validateConnectionConfig({ host: 'localhost', database: 'library', port: 0 })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject negative timeouts', () => {
    expect(() =>
      validateConnectionConfig({ host: 'localhost', database: 'library', connectionTimeout: -1 }),
    ).toThrow('Connection timeout must be a non-negative number');
  });
});

describe('validateSQL', () => {
  it('should reject blank queries', () => {
    expect(() => validateSQL('')).toThrow(QueryExecutionError);
    expect(() => validateSQL(' \n ')).toThrow('SQL query must be a non-empty string');
  });
});

describe('validateIdentifier', () => {
  it('should return the trimmed identifier', () => {
    expect(validateIdentifier(' books_2024 ')).toBe('books_2024');
  });

  it('should reject anything but letters, digits and underscores', () => {
    expect(() => validateIdentifier('books;--')).toThrow(InvalidQueryError);
    expect(() => validateIdentifier('9lives')).toThrow(InvalidQueryError);
    expect(() => validateIdentifier(42, 'Table')).toThrow('Table must be a non-empty string');
  });
});

describe('validatePagination', () => {
  it('should accept zero', () => {
    expect(() => validatePagination(0, 0)).not.toThrow();
  });

  it('should reject negative or fractional values', () => {
    expect(() => validatePagination(-1, 0)).toThrow(
      new InvalidPaginationError('limit must be a non-negative integer, got -1', 'limit'),
    );
    expect(() => validatePagination(10, 2.5)).toThrow('offset must be a non-negative integer, got 2.5');
    expect(() => validatePagination(Number.NaN, 0)).toThrow(InvalidPaginationError);
  });
});
