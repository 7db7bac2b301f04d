import type { AnyEntity } from '../entity/entity.js';
import type { FieldDescriptor } from '../entity/field.js';
import { ConfigurationError } from '../errors.js';
import type { ResponseShape, ShapeField, ShapeJoin } from '../materialize/shape.js';
import { And } from './operators.js';
import type { Condition } from './operators.js';
import type { ExtraPolicy, JoinSpec, QueryState } from './types.js';

export interface CompiledSelect {
  sql: string;
  shape: ResponseShape;
}

/**
 * A field is selected when nothing was requested explicitly, or when a
 * requested field has its name and belongs to its entity or an ancestor.
 */
function isRequested(field: FieldDescriptor, columns: readonly FieldDescriptor[]): boolean {
  if (columns.length === 0) return true;
  return columns.some((c) => c.name === field.name && field.entity.isA(c.entity));
}

function toShapeField(field: FieldDescriptor): ShapeField {
  return { name: field.name, key: field.alias('ql'), attribute: field.attribute };
}

function baseColumn(field: FieldDescriptor): string {
  const alias = field.alias('ql');
  return `${field.table}.${alias} AS "${alias}"`;
}

function joinedColumn(field: FieldDescriptor, prefix: string): string {
  const alias = field.alias('ql');
  return `${field.table}.${alias} AS "${prefix}.${alias}"`;
}

function compileJoin(join: JoinSpec): string {
  const table = join.joined.table;
  if (join.kind === 'CROSS') {
    return `CROSS JOIN ${table}`;
  }
  const on = `ON ${table}.${join.joined.alias('ql')} = ${join.base.table}.${join.base.alias('ql')}`;
  if (join.kind === 'INNER') {
    return `INNER JOIN ${table} ${on}`;
  }
  return `${join.direction} OUTER JOIN ${table} ${on}`;
}

function assertDistinctTables(entity: AnyEntity, joins: readonly JoinSpec[]): void {
  const seen = new Set<string>([entity.table]);
  for (const join of joins) {
    const table = join.joined.table;
    if (seen.has(table)) {
      throw new ConfigurationError(
        `Cannot join "${table}" more than once, or onto itself, in a query on "${entity.name}"`,
      );
    }
    seen.add(table);
  }
}

function compileWhere(state: QueryState): string | null {
  const conditions: Condition[] = [];
  if (state.where !== null) conditions.push(state.where);
  conditions.push(...state.entity.discriminators());
  for (const join of state.joins) {
    conditions.push(...join.joined.entity.discriminators());
  }
  if (conditions.length === 0) return null;
  return `WHERE ${new And(conditions).render('ql')}`;
}

/**
 * Compiles the builder state into SuiteQL text and the shape its rows decode
 * into. Throws ConfigurationError before anything reaches the transport.
 */
export function compileSelectQuery(state: QueryState, extra: ExtraPolicy): CompiledSelect {
  const { entity, columns, joins } = state;
  assertDistinctTables(entity, joins);

  const carriers = new Set(joins.map((j) => j.base.name));
  const baseFields = entity
    .fieldsIn('ql')
    .filter((f) => !carriers.has(f.name) && isRequested(f, columns));

  const shapeJoins: ShapeJoin[] = [];
  const selectList: string[] = baseFields.map(baseColumn);

  for (const join of joins) {
    const prefix = join.base.alias('ql');
    const joinedFields = join.joined.entity.fieldsIn('ql').filter((f) => isRequested(f, columns));
    selectList.push(...joinedFields.map((f) => joinedColumn(f, prefix)));
    shapeJoins.push({
      name: join.base.name,
      key: prefix,
      entity: join.joined.entity,
      fields: joinedFields.map(toShapeField),
    });
  }

  const wildcard = columns.length === 0 && joins.length === 0 && extra === 'allow';
  if (!wildcard && selectList.length === 0) {
    throw new ConfigurationError(
      `Query on "${entity.name}" selects no columns readable by the query service`,
    );
  }

  const where = compileWhere(state);
  const parts = [
    `SELECT ${wildcard ? '*' : selectList.join(', ')}`,
    `FROM ${entity.table}`,
    ...joins.map(compileJoin),
    ...(where !== null ? [where] : []),
  ];

  return {
    sql: parts.join(' '),
    shape: { entity, fields: baseFields.map(toShapeField), joins: shapeJoins },
  };
}
