import type { Attribute, Dialect, FieldContext } from './attributes.js';
import type { AnyEntity } from './entity.js';
import { Comparison } from '../query/operators.js';
import type { CompareValue } from '../query/operators.js';
import { ConfigurationError } from '../errors.js';

/**
 * Typed handle to one entity attribute. Carries alias resolution per dialect
 * and resolves the physical table through its owning entity on demand.
 *
 * @example
 * Customer.fields.companyName.startsWith('Acme')
 * Customer.fields.salesRep.eq(Employee.fields.id)   // join predicate
 */
export class FieldDescriptor<V extends CompareValue = CompareValue> {
  readonly kind = 'field' as const;

  constructor(
    readonly entity: AnyEntity,
    readonly name: string,
    readonly attribute: Attribute,
  ) {}

  get context(): FieldContext {
    return this.attribute.options.context ?? 'base';
  }

  /**
   * Wire name of the attribute. Query-service aliases are lowercased to
   * match the casing the service returns; REST aliases keep their casing.
   */
  alias(dialect: Dialect): string {
    const { alias, aliasQl, aliasRest } = this.attribute.options;
    if (dialect === 'ql') {
      return (aliasQl ?? alias ?? this.name).toLowerCase();
    }
    return aliasRest ?? alias ?? this.name;
  }

  get table(): string {
    const table = this.entity.table;
    if (table.trim() === '') {
      throw new ConfigurationError(
        `Field "${this.name}" has no resolvable table: entity "${this.entity.name}" has none`,
      );
    }
    return table;
  }

  eq(value: V | null | FieldDescriptor): Comparison {
    return new Comparison(this, value, 'eq');
  }

  ne(value: V | null | FieldDescriptor): Comparison {
    return new Comparison(this, value, 'ne');
  }

  gt(value: V | FieldDescriptor): Comparison {
    return new Comparison(this, value, 'gt');
  }

  ge(value: V | FieldDescriptor): Comparison {
    return new Comparison(this, value, 'ge');
  }

  lt(value: V | FieldDescriptor): Comparison {
    return new Comparison(this, value, 'lt');
  }

  le(value: V | FieldDescriptor): Comparison {
    return new Comparison(this, value, 'le');
  }

  contains(value: string): Comparison {
    return new Comparison(this, value, 'contains');
  }

  startsWith(value: string): Comparison {
    return new Comparison(this, value, 'startswith');
  }

  endsWith(value: string): Comparison {
    return new Comparison(this, value, 'endswith');
  }

  like(pattern: string): Comparison {
    return new Comparison(this, pattern, 'like');
  }

  toString(): string {
    return `${this.entity.name}.${this.name}`;
  }
}
