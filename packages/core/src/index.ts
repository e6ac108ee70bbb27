export * from './types';
export * from './interfaces';
export * from './errors';
export * from './utils';
export * from './constants';
export * from './base-query-engine';
export * from './query';
export * from './interceptors';
export * from './mapping/row-mapper';
export { MemoryCacheAdapter } from './cache/memory-cache-adapter';

// Execution
export { SingleSourceExecutor } from './executor/single-source-executor';
export type { ExecuteOptions } from './executor/single-source-executor';

// Union pagination
export { planUnionWindows, sumTotals } from './union/pagination';
export type { SourceTotal } from './union/pagination';
export { parsePriorityOverride, resolveDefaultPriority, resolvePriority } from './union/priority';
export type { PriorityOverride } from './union/priority';
export { UnionCoordinator } from './union/union-coordinator';
export type {
  UnionCoordinatorOptions,
  UnionOutcome,
  UnionRequest,
  UnknownTotalPolicy,
} from './union/union-coordinator';

// Registration
export { registerSingle, registerUnion, resolveContextualValues } from './register';
export type {
  ContextualProvider,
  ContextualProviders,
  HandlerRequest,
  RegisterSingleOptions,
  RegisterUnionOptions,
  SingleHandler,
  UnionHandler,
  UnionHandlerRequest,
} from './register';
