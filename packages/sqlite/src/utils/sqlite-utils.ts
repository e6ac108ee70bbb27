import type { Scalar } from '@rowmux/core';

/** Values better-sqlite3 can bind */
export type SQLiteValue = string | number | bigint | Buffer | null;

export function toSQLiteValue(value: Scalar): SQLiteValue {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

/**
 * Rewrite `%s` placeholders to `?`, leaving quoted text untouched.
 */
export function toQuestionMarkPlaceholders(sql: string): string {
  let result = '';
  let quote: string | undefined;

  for (let index = 0; index < sql.length; index++) {
    const char = sql.charAt(index);

    if (quote) {
      result += char;
      if (char === quote) {
        quote = undefined;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      result += char;
    } else if (char === '%' && sql.charAt(index + 1) === 's') {
      result += '?';
      index += 1;
    } else {
      result += char;
    }
  }

  return result;
}
