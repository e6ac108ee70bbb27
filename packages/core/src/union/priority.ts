import { ConfigurationError, UnknownPrioritySourceError } from '../errors';

/**
 * Request-level priority override: `"s3, s1"` or `['s3', 's1']`.
 */
export type PriorityOverride = string | readonly string[];

/**
 * Registered default order. Listed ids come first; ids left out follow in
 * registration order.
 */
export function resolveDefaultPriority(
  registered: readonly string[],
  sourcePriority?: readonly string[],
): string[] {
  if (!sourcePriority) {
    return [...registered];
  }

  const known = new Set(registered);
  const seen = new Set<string>();
  for (const sourceId of sourcePriority) {
    if (!known.has(sourceId)) {
      throw new ConfigurationError(`sourcePriority names unregistered source "${sourceId}"`, 'sourcePriority');
    }
    if (seen.has(sourceId)) {
      throw new ConfigurationError(`sourcePriority lists "${sourceId}" more than once`, 'sourcePriority');
    }
    seen.add(sourceId);
  }

  return [...sourcePriority, ...registered.filter((sourceId) => !seen.has(sourceId))];
}

/**
 * Split, trim and de-duplicate an override. Empty entries are ignored.
 */
export function parsePriorityOverride(override: PriorityOverride): string[] {
  const entries = typeof override === 'string' ? override.split(',') : override;
  const parsed: string[] = [];
  for (const entry of entries) {
    const sourceId = entry.trim();
    if (sourceId !== '' && !parsed.includes(sourceId)) {
      parsed.push(sourceId);
    }
  }
  return parsed;
}

/**
 * Final consultation order for one request. Without a usable override this is
 * the default priority; with one, ids it leaves out follow in registration
 * order.
 */
export function resolvePriority(
  registered: readonly string[],
  defaultPriority: readonly string[],
  override?: PriorityOverride,
): string[] {
  if (override === undefined) {
    return [...defaultPriority];
  }

  const requested = parsePriorityOverride(override);
  if (requested.length === 0) {
    return [...defaultPriority];
  }

  for (const sourceId of requested) {
    if (!registered.includes(sourceId)) {
      throw new UnknownPrioritySourceError(sourceId);
    }
  }

  return [...requested, ...registered.filter((sourceId) => !requested.includes(sourceId))];
}
