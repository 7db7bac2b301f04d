import { combineConditions } from './operators.js';
import type { Condition } from './operators.js';

/**
 * Renders conditions as the `q` parameter of a REST record search, with the
 * same list rules as `where()`. Returns null when there is nothing to filter.
 *
 * @example
 * compileRestFilter(Employee.fields.email.eq(null), Employee.fields.firstName.startsWith('Jo'))
 * // => '(email EMPTY AND firstName START_WITH "Jo")'
 */
export function compileRestFilter(...conditions: Condition[]): string | null {
  if (conditions.length === 0) return null;
  return combineConditions(conditions, 'compileRestFilter').render('rest');
}
