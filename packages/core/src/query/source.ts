import type { Interceptor } from '../interceptors/types';
import type { QueryEngine } from '../interfaces';
import type { Filters, Scalar } from '../types';

/**
 * Query text, fixed or built from the filters. A builder must be pure:
 * same filters, same text.
 */
export type QueryText<F extends Filters> = string | ((filters: F) => string);

/**
 * Names of filter fields whose values become positional parameters.
 */
export type FilterFields<F extends Filters> = readonly (keyof F & string)[];

export type SelectParamSpec<F extends Filters> =
  | ((filters: F, limit: number, offset: number) => Scalar[])
  | FilterFields<F>;

export type ParamSpec<F extends Filters> = ((filters: F) => Scalar[]) | FilterFields<F>;

/**
 * One (engine, query template) pair. Frozen once registered.
 */
export interface SourceDefinition<F extends Filters = Filters> {
  engine: QueryEngine;
  selectQuery: QueryText<F>;
  /** Defaults to `params` followed by limit and offset */
  selectParams?: SelectParamSpec<F>;
  /** Without it the total is reported as unknown */
  countQuery?: QueryText<F>;
  /** Defaults to `params` */
  countParams?: ParamSpec<F>;
  /** Parameters shared by both queries */
  params?: ParamSpec<F>;
  /** Run after the registration-level interceptors */
  interceptors?: readonly Interceptor<F>[];
}
