import type { Attribute } from '../entity/attributes.js';
import type { AnyEntity } from '../entity/entity.js';

/** One decoded attribute: `key` is the column alias in result rows. */
export interface ShapeField {
  readonly name: string;
  readonly key: string;
  readonly attribute: Attribute;
}

/** Nested sub-record produced by a join, keyed by the base join field. */
export interface ShapeJoin {
  readonly name: string;
  /** Prefix of the dotted keys that belong to this sub-record. */
  readonly key: string;
  readonly entity: AnyEntity;
  readonly fields: readonly ShapeField[];
}

/**
 * Record type a compiled query decodes into. Derived from the selected columns
 * and joins; never declared by hand.
 */
export interface ResponseShape {
  readonly entity: AnyEntity;
  readonly fields: readonly ShapeField[];
  readonly joins: readonly ShapeJoin[];
}
