import type { AttributeMap } from '../entity/attributes.js';
import type { EntityRecord } from '../entity/entity.js';
import { InvalidResponseError, InvalidStageError, QueryTransportError, UsageError } from '../errors.js';
import { createMaterializer } from '../materialize/schema.js';
import type { PageDecoder } from '../materialize/schema.js';
import type { ExecOptions, ExecutionContext, QueryPage, QueryResult } from '../types.js';
import { compileSelectQuery } from './compiler.js';
import { resolveJoin } from './join.js';
import { combineConditions } from './operators.js';
import type { Comparison, Condition } from './operators.js';
import { paginate } from './paginator.js';
import { EXTRA_POLICIES } from './types.js';
import type { ExtraPolicy, JoinDirection, JoinKind, QueryStage, QueryState } from './types.js';

const OPEN_STAGES: readonly QueryStage[] = ['built', 'joined'];
const EXECUTABLE_STAGES: readonly QueryStage[] = ['built', 'joined', 'filtered'];

function assertStage(state: QueryState, operation: string, allowed: readonly QueryStage[]): void {
  if (!allowed.includes(state.stage)) {
    throw new InvalidStageError(operation, state.stage);
  }
}

function isAbort(err: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted === true && err === signal.reason) return true;
  return err instanceof Error && err.name === 'AbortError';
}

interface Execution<A extends AttributeMap> {
  sql: string;
  decode: PageDecoder<EntityRecord<A>>;
}

/**
 * Terminal operations shared by every stage. All stages of one chain share
 * the same state object, so a stage left behind cannot be reused.
 */
abstract class ExecutableQuery<A extends AttributeMap> {
  constructor(
    protected readonly state: QueryState,
    protected readonly context: ExecutionContext,
  ) {}

  get stage(): QueryStage {
    return this.state.stage;
  }

  /** Compiled query text, for inspection. Does not advance the stage. */
  toSQL(extra: ExtraPolicy): string {
    return compileSelectQuery(this.state, extra).sql;
  }

  /** Every matching record, fetched page by page. */
  async all(options: ExecOptions): Promise<QueryResult<EntityRecord<A>>> {
    const execution = this.begin('all', options.extra);
    return this.collect(execution, this.context.pageSize, null, options.signal);
  }

  /** At most `n` records. */
  async limit(n: number, options: ExecOptions): Promise<QueryResult<EntityRecord<A>>> {
    if (!Number.isInteger(n) || n < 1) {
      throw new UsageError(`limit() needs a positive integer, got ${n}`);
    }
    const execution = this.begin('limit', options.extra);
    return this.collect(execution, Math.min(n, this.context.pageSize), n, options.signal);
  }

  /** A single page holding the first record, if any. */
  async first(options: ExecOptions): Promise<QueryResult<EntityRecord<A>>> {
    const execution = this.begin('first', options.extra);
    return this.collect(execution, 1, 1, options.signal);
  }

  /**
   * The only matching record, or null when there is none. A service that
   * reports further rows makes the result ambiguous and is rejected.
   */
  async one(options: ExecOptions): Promise<EntityRecord<A> | null> {
    const execution = this.begin('one', options.extra);
    options.signal?.throwIfAborted();
    const page = await this.fetchPage(execution, 1, 0, options.signal);
    if (page.hasMore || page.items.length > 1) {
      throw new InvalidResponseError(
        `one() expected at most one "${this.state.entity.name}" record, but the service returned ${page.items.length}${page.hasMore ? ' and reports more' : ''}`,
      );
    }
    return page.items[0] ?? null;
  }

  private begin(operation: string, extra: ExtraPolicy): Execution<A> {
    assertStage(this.state, operation, EXECUTABLE_STAGES);
    if (!EXTRA_POLICIES.includes(extra)) {
      throw new UsageError(
        `${operation}() requires extra to be one of ${EXTRA_POLICIES.join(', ')}, got ${String(extra)}`,
      );
    }
    this.state.stage = 'executed';
    const { sql, shape } = compileSelectQuery(this.state, extra);
    this.context.logger.debug({ operation, extra, sql }, 'compiled query');
    return { sql, decode: createMaterializer<A>(shape, extra) };
  }

  private async collect(
    execution: Execution<A>,
    pageSize: number,
    maxResults: number | null,
    signal: AbortSignal | undefined,
  ): Promise<QueryResult<EntityRecord<A>>> {
    const result = await paginate(
      (limit, offset) => this.fetchPage(execution, limit, offset, signal),
      { pageSize, maxResults, ...(signal !== undefined ? { signal } : {}) },
    );
    this.context.logger.debug(
      { entity: this.state.entity.name, count: result.count, totalResults: result.totalResults },
      'query complete',
    );
    return result;
  }

  private async fetchPage(
    execution: Execution<A>,
    limit: number,
    offset: number,
    signal: AbortSignal | undefined,
  ): Promise<QueryPage<EntityRecord<A>>> {
    const { transport, logger } = this.context;
    let payload: unknown;
    try {
      payload = signal !== undefined
        ? await transport.execute(execution.sql, limit, offset, { signal })
        : await transport.execute(execution.sql, limit, offset);
    } catch (err) {
      if (isAbort(err, signal)) throw err;
      throw new QueryTransportError(`Failed to execute query: ${String(err)}`, execution.sql, err);
    }
    const page = execution.decode(payload);
    logger.debug({ limit, offset, items: page.items.length, hasMore: page.hasMore }, 'fetched page');
    return page;
  }
}

/** Filter fixed; only execution remains. */
export class SuiteQLWhere<A extends AttributeMap> extends ExecutableQuery<A> {}

abstract class FilterableQuery<A extends AttributeMap> extends ExecutableQuery<A> {
  /**
   * Adds a join through a field-to-field `eq` predicate. The joined entity's
   * columns decode into a sub-record under the base join field's name.
   */
  join(predicate: Comparison, kind: JoinKind = 'OUTER', direction: JoinDirection = 'LEFT'): SuiteQLJoin<A> {
    assertStage(this.state, 'join', OPEN_STAGES);
    this.state.joins.push(resolveJoin(this.state.entity, predicate, kind, direction));
    this.state.stage = 'joined';
    return new SuiteQLJoin<A>(this.state, this.context);
  }

  /**
   * Fixes the filter. Several comparisons are AND'ed; a single and()/or()
   * node is taken as is.
   */
  where(...conditions: Condition[]): SuiteQLWhere<A> {
    assertStage(this.state, 'where', OPEN_STAGES);
    this.state.where = combineConditions(conditions, 'where');
    this.state.stage = 'filtered';
    return new SuiteQLWhere<A>(this.state, this.context);
  }
}

/** One or more joins added. */
export class SuiteQLJoin<A extends AttributeMap> extends FilterableQuery<A> {}

/** Columns fixed; joins and a filter may follow. */
export class SuiteQLSelect<A extends AttributeMap> extends FilterableQuery<A> {}
