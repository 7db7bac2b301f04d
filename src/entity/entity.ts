import type {
  Attribute,
  AttributeMap,
  AttributeOptions,
  BooleanAttribute,
  DateAttribute,
  Dialect,
  LiteralAttribute,
  NumberAttribute,
  ReferenceAttribute,
} from './attributes.js';
import { isVisibleIn } from './attributes.js';
import { FieldDescriptor } from './field.js';
import type { Comparison } from '../query/operators.js';
import { ConfigurationError } from '../errors.js';

/** Value a field descriptor of this attribute accepts in comparisons. */
export type CompareOf<T extends Attribute> =
  T extends LiteralAttribute<infer V> ? V
  : T extends NumberAttribute ? number
  : T extends BooleanAttribute ? boolean
  : T extends DateAttribute ? Date | string
  : string;

/** Decoded value of an attribute in a query result. */
export type ValueOf<T extends Attribute> =
  T extends LiteralAttribute<infer V> ? V
  : T extends ReferenceAttribute<infer E> ? string | RecordOf<E>
  : T extends NumberAttribute ? number
  : T extends BooleanAttribute ? boolean
  : string;

/**
 * Decoded record of an entity. Every attribute is optional: which ones are
 * present depends on the columns the query selected.
 */
export type EntityRecord<A extends AttributeMap> = {
  [K in keyof A]?: ValueOf<A[K]> | null;
};

export type RecordOf<E> = E extends Entity<infer A> ? EntityRecord<A> : never;

export type FieldMap<A extends AttributeMap> = {
  readonly [K in keyof A & string]: FieldDescriptor<CompareOf<A[K]>>;
};

export interface EntityDefinition<A extends AttributeMap> {
  readonly name: string;
  /** Backing table. Defaults to the parent's table, then the lowercase name. */
  readonly table?: string;
  readonly attributes: A;
}

export interface EntityExtension<B extends AttributeMap> {
  readonly name?: string;
  readonly table?: string;
  readonly attributes: B;
}

export type AnyEntity = Entity<AttributeMap>;

const ENTITY_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]{0,127}$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function validateDefinition(def: EntityDefinition<AttributeMap>): void {
  if (!ENTITY_NAME_PATTERN.test(def.name)) {
    throw new ConfigurationError(`defineEntity: name "${def.name}" must match ${ENTITY_NAME_PATTERN}`);
  }
  if (def.table !== undefined && !IDENTIFIER_PATTERN.test(def.table)) {
    throw new ConfigurationError(`defineEntity: "${def.name}" has an invalid table name "${def.table}"`);
  }
  const names = Object.keys(def.attributes);
  if (names.length === 0) {
    throw new ConfigurationError(`defineEntity: "${def.name}" must declare at least one attribute`);
  }
  for (const name of names) {
    if (!IDENTIFIER_PATTERN.test(name)) {
      throw new ConfigurationError(`defineEntity: "${def.name}" has an invalid attribute name "${name}"`);
    }
    const options: AttributeOptions = def.attributes[name]?.options ?? {};
    const { alias, aliasQl, aliasRest } = options;
    for (const candidate of [alias, aliasQl, aliasRest]) {
      // Dots separate the join prefix from the column alias in result rows.
      if (candidate !== undefined && !IDENTIFIER_PATTERN.test(candidate)) {
        throw new ConfigurationError(
          `defineEntity: "${def.name}.${name}" has an invalid alias "${candidate}"`,
        );
      }
    }
  }
}

/**
 * A named record type backed by a remote table. Field descriptors are built
 * once, here, and reached through `fields`.
 */
export class Entity<A extends AttributeMap = AttributeMap> {
  readonly name: string;
  readonly table: string;
  readonly attributes: A;
  readonly fields: FieldMap<A>;
  private readonly descriptors: ReadonlyMap<string, FieldDescriptor>;

  constructor(
    definition: EntityDefinition<A>,
    readonly parent: AnyEntity | null = null,
  ) {
    validateDefinition(definition);
    this.name = definition.name;
    this.table = definition.table ?? parent?.table ?? definition.name.toLowerCase();
    this.attributes = definition.attributes;

    const descriptors = new Map<string, FieldDescriptor>();
    for (const [name, attribute] of Object.entries(definition.attributes)) {
      descriptors.set(name, new FieldDescriptor(this, name, attribute));
    }
    this.descriptors = descriptors;
    // Safe: one descriptor per attribute key; cast needed to express the keyed map type
    this.fields = Object.fromEntries(descriptors) as FieldMap<A>;
  }

  /** True for this entity and every entity it was extended from. */
  isA(other: AnyEntity): boolean {
    let current: AnyEntity | null = this;
    while (current !== null) {
      if (current === other) return true;
      current = current.parent;
    }
    return false;
  }

  field(name: string): FieldDescriptor | undefined {
    return this.descriptors.get(name);
  }

  /** Field descriptors readable through a dialect, in declaration order. */
  fieldsIn(dialect: Dialect): FieldDescriptor[] {
    return [...this.descriptors.values()].filter((f) => isVisibleIn(f.attribute, dialect));
  }

  allFields(): FieldDescriptor[] {
    return [...this.descriptors.values()];
  }

  /**
   * Equality predicates for every query-visible literal attribute. They
   * restrict a shared table to this entity's rows.
   */
  discriminators(): Comparison[] {
    const conditions: Comparison[] = [];
    for (const field of this.fieldsIn('ql')) {
      if (field.attribute.kind === 'literal') {
        conditions.push(field.eq(field.attribute.value));
      }
    }
    return conditions;
  }

  /**
   * Derives an entity with additional attributes, e.g. custom fields on a
   * standard record. The child keeps the parent's table unless given one.
   */
  extend<B extends AttributeMap>(extension: EntityExtension<B>): Entity<A & B> {
    const attributes = { ...this.attributes, ...extension.attributes };
    return new Entity<A & B>(
      {
        name: extension.name ?? this.name,
        ...(extension.table !== undefined ? { table: extension.table } : {}),
        attributes,
      },
      this,
    );
  }

  toString(): string {
    return this.name;
  }
}

export function defineEntity<A extends AttributeMap>(definition: EntityDefinition<A>): Entity<A> {
  return new Entity(definition);
}
