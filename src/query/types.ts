import type { AnyEntity } from '../entity/entity.js';
import type { FieldDescriptor } from '../entity/field.js';
import type { Condition } from './operators.js';

export type JoinKind = 'OUTER' | 'INNER' | 'CROSS';
export type JoinDirection = 'LEFT' | 'RIGHT';

/**
 * What the decoder does with keys the response shape does not declare:
 * `forbid` rejects the row, `ignore` drops them, `allow` keeps them untyped.
 */
export type ExtraPolicy = 'allow' | 'ignore' | 'forbid';

export const EXTRA_POLICIES: readonly ExtraPolicy[] = ['allow', 'ignore', 'forbid'];

export type QueryStage = 'built' | 'joined' | 'filtered' | 'executed';

export interface JoinSpec {
  /** Join field on the selected entity; carries the nested sub-record. */
  readonly base: FieldDescriptor;
  /** Join field on the joined entity. */
  readonly joined: FieldDescriptor;
  readonly kind: JoinKind;
  readonly direction: JoinDirection;
}

/**
 * Mutable state behind one builder chain. Owned by a single call stack and
 * discarded once the query executes.
 */
export interface QueryState {
  readonly entity: AnyEntity;
  readonly columns: readonly FieldDescriptor[];
  readonly joins: JoinSpec[];
  where: Condition | null;
  stage: QueryStage;
}
