import type { Logger } from 'pino';
import type { AttributeMap } from './entity/attributes.js';
import { Entity } from './entity/entity.js';
import type { FieldDescriptor } from './entity/field.js';
import { resolveConfig } from './config.js';
import type { ClientConfig } from './config.js';
import { createLogger } from './logger.js';
import { SuiteQLSelect } from './query/builder.js';
import type { ExecutionContext, QueryTransport } from './types.js';

export type Column = FieldDescriptor | Entity<AttributeMap>;

/** Entry point for queries against one entity. */
export class Collection<A extends AttributeMap> {
  constructor(
    readonly entity: Entity<A>,
    private readonly context: ExecutionContext,
  ) {}

  /**
   * Starts a query. With no columns every field the query service can read
   * is selected; an entity argument stands for all of its fields.
   */
  select(...columns: Column[]): SuiteQLSelect<A> {
    const fields = columns.flatMap((c) => (c instanceof Entity ? c.allFields() : [c]));
    return new SuiteQLSelect<A>(
      { entity: this.entity, columns: fields, joins: [], where: null, stage: 'built' },
      this.context,
    );
  }
}

/**
 * Compiles and runs SuiteQL queries through a caller-supplied transport.
 *
 * @example
 * const client = new SuiteQLClient({ transport });
 * const customers = await client
 *   .collection(Customer)
 *   .select()
 *   .join(Customer.fields.salesRep.eq(Employee.fields.id))
 *   .where(Customer.fields.id.eq('100'))
 *   .all({ extra: 'forbid' });
 */
export class SuiteQLClient {
  readonly transport: QueryTransport;
  readonly logger: Logger;
  readonly pageSize: number;

  constructor(config: ClientConfig) {
    const resolved = resolveConfig(config);
    this.transport = resolved.transport;
    this.logger = resolved.logger ?? createLogger(resolved.logLevel);
    this.pageSize = resolved.pageSize;
  }

  collection<A extends AttributeMap>(entity: Entity<A>): Collection<A> {
    return new Collection(entity, {
      transport: this.transport,
      logger: this.logger,
      pageSize: this.pageSize,
    });
  }
}
