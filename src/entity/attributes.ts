/**
 * Query surfaces an attribute can be read through. `base` attributes are
 * visible to both.
 */
export type FieldContext = 'base' | 'ql' | 'rest';

/** The two rendering targets: SuiteQL text and REST record-search filters. */
export type Dialect = 'ql' | 'rest';

export interface AttributeOptions {
  /** Name on the wire for both dialects. Defaults to the attribute name. */
  readonly alias?: string;
  readonly aliasQl?: string;
  readonly aliasRest?: string;
  readonly context?: FieldContext;
}

export interface StringAttribute {
  readonly kind: 'string';
  readonly options: AttributeOptions;
}

export interface NumberAttribute {
  readonly kind: 'number';
  readonly options: AttributeOptions;
}

export interface BooleanAttribute {
  readonly kind: 'boolean';
  readonly options: AttributeOptions;
}

export interface DateAttribute {
  readonly kind: 'date';
  readonly options: AttributeOptions;
}

/** Fixed-value attribute. Becomes a discriminator predicate in every query. */
export interface LiteralAttribute<V extends string = string> {
  readonly kind: 'literal';
  readonly value: V;
  readonly options: AttributeOptions;
}

/**
 * Attribute holding the id of another record. Decodes to the id, or to a
 * nested record when the query joins through it.
 */
export interface ReferenceAttribute<T = unknown> {
  readonly kind: 'reference';
  readonly target: () => T;
  readonly options: AttributeOptions;
}

export type Attribute =
  | StringAttribute
  | NumberAttribute
  | BooleanAttribute
  | DateAttribute
  | LiteralAttribute
  | ReferenceAttribute;

export type AttributeKind = Attribute['kind'];

export type AttributeMap = Record<string, Attribute>;

export function string(options: AttributeOptions = {}): StringAttribute {
  return { kind: 'string', options };
}

export function number(options: AttributeOptions = {}): NumberAttribute {
  return { kind: 'number', options };
}

export function boolean(options: AttributeOptions = {}): BooleanAttribute {
  return { kind: 'boolean', options };
}

export function date(options: AttributeOptions = {}): DateAttribute {
  return { kind: 'date', options };
}

export function literal<V extends string>(value: V, options: AttributeOptions = {}): LiteralAttribute<V> {
  return { kind: 'literal', value, options };
}

export function reference<T>(target: () => T, options: AttributeOptions = {}): ReferenceAttribute<T> {
  return { kind: 'reference', target, options };
}

/** Attribute builders, used as `attr.string({ alias: 'companyName' })`. */
export const attr = { string, number, boolean, date, literal, reference };

/** Whether an attribute is read by the given dialect. */
export function isVisibleIn(attribute: Attribute, dialect: Dialect): boolean {
  const context = attribute.options.context ?? 'base';
  return context === 'base' || context === dialect;
}
