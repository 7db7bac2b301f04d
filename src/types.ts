import type { Logger } from 'pino';
import type { ExtraPolicy } from './query/types.js';

/** One physical page as returned by the query service. */
export interface QueryPage<T> {
  items: T[];
  count: number;
  hasMore: boolean;
  offset: number;
  totalResults: number;
  links?: unknown[];
}

/**
 * One logical result set, merged from every fetched page. `offset` is always
 * 0 and `count` is the number of merged items.
 */
export type QueryResult<T> = QueryPage<T>;

export interface ExecOptions {
  /** Policy for keys the response shape does not declare. Never defaulted. */
  extra: ExtraPolicy;
  signal?: AbortSignal;
}

export interface TransportOptions {
  signal?: AbortSignal;
}

/**
 * The single capability the library needs from its HTTP collaborator:
 * run query text at a limit and offset and hand back the raw JSON page.
 * Authentication, retries and rate limiting belong to the implementation.
 */
export interface QueryTransport {
  execute(query: string, limit: number, offset: number, options?: TransportOptions): Promise<unknown>;
}

/** What a builder chain needs from the client that started it. */
export interface ExecutionContext {
  readonly transport: QueryTransport;
  readonly logger: Logger;
  readonly pageSize: number;
}
