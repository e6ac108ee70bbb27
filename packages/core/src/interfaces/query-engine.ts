import type { Row, Scalar } from '../types';

export interface EngineCallOptions {
  signal?: AbortSignal;
}

/**
 * One storage technology behind a uniform read-only capability. An engine
 * owns its connection lifecycle and only ever returns its own rows.
 */
export interface QueryEngine {
  readonly name: string;

  select(query: string, params: readonly Scalar[], options?: EngineCallOptions): Promise<Row[]>;

  selectCount(query: string, params: readonly Scalar[], options?: EngineCallOptions): Promise<number>;

  close(): Promise<void>;
}
