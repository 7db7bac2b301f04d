import type { AnyEntity } from '../entity/entity.js';
import { ConfigurationError, UsageError } from '../errors.js';
import { isFieldDescriptor } from './operators.js';
import type { Comparison } from './operators.js';
import type { JoinDirection, JoinKind, JoinSpec } from './types.js';

/**
 * Splits a field-to-field predicate into the side belonging to the selected
 * entity and the side belonging to the entity being joined.
 */
export function resolveJoin(
  entity: AnyEntity,
  predicate: Comparison,
  kind: JoinKind,
  direction: JoinDirection,
): JoinSpec {
  const left = predicate.field;
  const right = predicate.compare;

  if (!isFieldDescriptor(right)) {
    throw new UsageError(
      `join() needs a field-to-field predicate, got ${left.toString()} compared with a ${predicate.valueType} value`,
    );
  }
  if (predicate.operator !== 'eq') {
    throw new UsageError(`join() predicates must use eq(), got ${predicate.operator}()`);
  }

  if (entity.isA(left.entity)) {
    return { base: left, joined: right, kind, direction };
  }
  if (entity.isA(right.entity)) {
    return { base: right, joined: left, kind, direction };
  }
  throw new ConfigurationError(
    `join() predicate ${left.toString()} = ${right.toString()} does not reference the selected entity "${entity.name}"`,
  );
}
