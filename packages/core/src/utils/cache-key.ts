import { createHash } from 'node:crypto';

import { CACHE_DEFAULTS } from '../constants';

function serialize(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  return JSON.stringify(value, (_key, item: unknown) => {
    if (typeof item === 'bigint') {
      return `${item.toString()}n`;
    }
    return item;
  });
}

export function generateCacheKey(parts: readonly unknown[], prefix: string = CACHE_DEFAULTS.keyPrefix): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(serialize(part));
    hash.update('\u0000');
  }
  return `${prefix}${hash.digest('hex').slice(0, 32)}`;
}
