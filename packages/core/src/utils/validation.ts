import { CONNECTION_DEFAULTS } from '../constants';
import {
  ConfigurationError,
  InvalidPaginationError,
  InvalidQueryError,
  QueryExecutionError,
} from '../errors';

import type { ConnectionConfig } from '../types';

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!config.connectionString) {
    if (!config.host) {
      throw new ConfigurationError('Host is required when connectionString is not provided', 'host');
    }

    if (!config.database) {
      throw new ConfigurationError(
        'Database name is required when connectionString is not provided',
        'database',
      );
    }
  }

  if (
    config.port !== undefined &&
    (!Number.isInteger(config.port) ||
      config.port < CONNECTION_DEFAULTS.MIN_PORT ||
      config.port > CONNECTION_DEFAULTS.MAX_PORT)
  ) {
    throw new ConfigurationError('Port must be a number between 1 and 65535', 'port');
  }

  if (config.connectionTimeout !== undefined && config.connectionTimeout < 0) {
    throw new ConfigurationError('Connection timeout must be a non-negative number', 'connectionTimeout');
  }

  if (config.idleTimeout !== undefined && config.idleTimeout < 0) {
    throw new ConfigurationError('Idle timeout must be a non-negative number', 'idleTimeout');
  }
}

export function validateSQL(sql: string): void {
  if (typeof sql !== 'string' || sql.trim().length === 0) {
    throw new QueryExecutionError('SQL query must be a non-empty string', sql);
  }
}

/**
 * Checks a dynamically supplied table or column name before it is spliced into
 * query text.
 */
export function validateIdentifier(identifier: unknown, label = 'Identifier'): string {
  if (typeof identifier !== 'string' || identifier.trim() === '') {
    throw new InvalidQueryError(`${label} must be a non-empty string`);
  }

  const trimmed = identifier.trim();
  if (!IDENTIFIER_PATTERN.test(trimmed)) {
    throw new InvalidQueryError(
      `${label} "${trimmed}" must start with a letter or underscore and contain only letters, numbers, and underscores`,
    );
  }
  return trimmed;
}

export function validatePagination(limit: number, offset: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidPaginationError(`limit must be a non-negative integer, got ${limit}`, 'limit');
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidPaginationError(`offset must be a non-negative integer, got ${offset}`, 'offset');
  }
}
