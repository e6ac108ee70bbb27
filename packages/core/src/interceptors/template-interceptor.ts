/**
 * Template Interceptor
 *
 * Fills `__name__` placeholders in the select and count query text with
 * identifiers derived from the request, e.g. a table chosen by a filter.
 * Only identifiers are spliced in; parameter values keep travelling as
 * bound parameters.
 *
 * @example
 * ```typescript
 * const interceptor = createTemplateInterceptor<{ table: string }>({
 *   placeholders: { table: (context) => context.filters.table },
 * });
 * // 'SELECT * FROM __table__ LIMIT ? OFFSET ?' -> 'SELECT * FROM books LIMIT ? OFFSET ?'
 * ```
 */

import { ConfigurationError } from '../errors';
import { validateIdentifier } from '../utils';

import type { Filters } from '../types';
import type { Interceptor, TemplateInterceptorOptions } from './types';

const PLACEHOLDER_NAME = /^[a-zA-Z][a-zA-Z0-9]*$/;

function replaceAll(text: string, token: string, value: string): string {
  return text.split(token).join(value);
}

export function createTemplateInterceptor<F extends Filters = Filters>(
  options: TemplateInterceptorOptions<F>,
): Interceptor<F> {
  const placeholders = Object.entries(options.placeholders);
  for (const [name] of placeholders) {
    if (!PLACEHOLDER_NAME.test(name)) {
      throw new ConfigurationError(`Invalid placeholder name "${name}"`, 'placeholders');
    }
  }

  return async (context, next) => {
    for (const [name, resolve] of placeholders) {
      const token = `__${name}__`;
      const identifier = validateIdentifier(resolve(context), `Placeholder ${token}`);

      context.selectQuery = replaceAll(context.selectQuery, token, identifier);
      if (context.countQuery !== null) {
        context.countQuery = replaceAll(context.countQuery, token, identifier);
      }
    }
    return next(context);
  };
}
