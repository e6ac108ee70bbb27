import { BaseQueryEngine, EngineConnectivityError } from '@rowmux/core';
import Database from 'better-sqlite3';

import { toQuestionMarkPlaceholders, toSQLiteValue } from '../utils/sqlite-utils';

import type { BaseQueryEngineOptions, Row, Scalar } from '@rowmux/core';

export interface SQLiteQueryEngineOptions extends BaseQueryEngineOptions {
  /** Database file; defaults to a private in-memory database */
  path?: string;
  readonly?: boolean;
  /** Fail instead of creating a missing database file */
  fileMustExist?: boolean;
  journalMode?: 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY' | 'WAL' | 'OFF';
  foreignKeys?: boolean;
  /** Runs once right after the database is opened, e.g. to create fixtures */
  setup?: (db: Database.Database) => void;
}

/**
 * Engine over a single better-sqlite3 connection. Statements run
 * synchronously, so concurrent calls are serialized by the event loop.
 */
export class SQLiteQueryEngine extends BaseQueryEngine {
  readonly name = 'sqlite';

  private db?: Database.Database;
  private readonly options: SQLiteQueryEngineOptions;

  constructor(options: SQLiteQueryEngineOptions = {}) {
    const { logger, queryTimeout, retryOptions } = options;
    super({ logger, queryTimeout, retryOptions });
    this.options = options;
  }

  get path(): string {
    return this.options.path ?? ':memory:';
  }

  protected async doConnect(): Promise<void> {
    const db = new Database(this.path, {
      readonly: this.options.readonly ?? false,
      fileMustExist: this.options.fileMustExist ?? false,
    });

    try {
      if (this.options.journalMode) {
        db.pragma(`journal_mode = ${this.options.journalMode}`);
      }
      if (this.options.foreignKeys) {
        db.pragma('foreign_keys = ON');
      }
      this.options.setup?.(db);
    } catch (error) {
      db.close();
      throw error;
    }

    this.db = db;
    this.logger?.debug('SQLite database opened', { path: this.path });
  }

  protected async doDisconnect(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = undefined;
    }
  }

  protected async doSelect(query: string, params: readonly Scalar[]): Promise<Row[]> {
    if (!this.db) {
      throw new EngineConnectivityError('SQLite database not open', this.name);
    }

    const statement = this.db.prepare<unknown[], Row>(toQuestionMarkPlaceholders(query));
    return statement.all(...params.map(toSQLiteValue));
  }
}
