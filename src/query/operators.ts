import type { Dialect } from '../entity/attributes.js';
import type { FieldDescriptor } from '../entity/field.js';
import { MismatchConditionsError, UnsupportedOperatorError } from '../errors.js';

export type Operator =
  | 'eq'
  | 'ne'
  | 'gt'
  | 'ge'
  | 'lt'
  | 'le'
  | 'contains'
  | 'startswith'
  | 'endswith'
  | 'like';

/** Literal values a field can be compared against. */
export type CompareValue = string | number | boolean | Date | null;

export type ValueType = 'null' | 'string' | 'number' | 'boolean' | 'date' | 'field';

type TokenMap = Partial<Record<Operator, string>>;

interface DialectTokens {
  readonly byType: Partial<Record<ValueType, TokenMap>>;
  readonly fallback: TokenMap;
}

// REST tokens follow the record-search `q` syntax of the REST record service.
export const OPERATOR_TOKENS: Readonly<Record<Dialect, DialectTokens>> = {
  rest: {
    byType: {
      null: { eq: 'EMPTY', ne: 'EMPTY_NOT' },
      string: {
        eq: 'IS',
        ne: 'IS_NOT',
        startswith: 'START_WITH',
        endswith: 'END_WITH',
        contains: 'CONTAIN',
      },
      boolean: { eq: 'IS', ne: 'IS_NOT' },
      date: {
        eq: 'ON',
        ne: 'ON_NOT',
        gt: 'AFTER',
        ge: 'ON_OR_AFTER',
        lt: 'BEFORE',
        le: 'ON_OR_BEFORE',
      },
      number: {
        eq: 'EQUAL',
        ne: 'EQUAL_NOT',
        gt: 'GREATER',
        ge: 'GREATER_OR_EQUAL',
        lt: 'LESS',
        le: 'LESS_OR_EQUAL',
      },
    },
    fallback: { eq: 'EQUAL', ne: 'EQUAL_NOT' },
  },
  ql: {
    byType: {
      null: { eq: 'IS NULL', ne: 'IS NOT NULL' },
    },
    fallback: {
      eq: '=',
      ne: '!=',
      gt: '>',
      ge: '>=',
      lt: '<',
      le: '<=',
      like: 'LIKE',
    },
  },
};

const PRESENCE_TOKENS = new Set(['EMPTY', 'EMPTY_NOT', 'IS NULL', 'IS NOT NULL']);

export function valueTypeOf(value: CompareValue | FieldDescriptor): ValueType {
  if (value === null) return 'null';
  if (value instanceof Date) return 'date';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  return 'field';
}

export function isFieldDescriptor(value: CompareValue | FieldDescriptor): value is FieldDescriptor {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

/** Formats a date as m/d/yyyy without zero padding, from its UTC calendar fields. */
export function formatDate(value: Date): string {
  return `${value.getUTCMonth() + 1}/${value.getUTCDate()}/${value.getUTCFullYear()}`;
}

function qlLiteral(value: string | number | boolean | Date): string {
  if (value instanceof Date) return `'${formatDate(value)}'`;
  if (typeof value === 'boolean') return value ? `'T'` : `'F'`;
  return `'${String(value).replace(/'/g, "''")}'`;
}

function restLiteral(value: string | number | boolean | Date): string {
  if (value instanceof Date) return `"${formatDate(value)}"`;
  return `"${String(value)}"`;
}

/**
 * A single predicate: a field compared against a literal, or against another
 * field (a join predicate). Rendering is deferred until a dialect is chosen.
 */
export class Comparison {
  readonly kind = 'comparison' as const;

  constructor(
    readonly field: FieldDescriptor,
    readonly compare: CompareValue | FieldDescriptor,
    readonly operator: Operator,
  ) {}

  get valueType(): ValueType {
    return valueTypeOf(this.compare);
  }

  get isJoinPredicate(): boolean {
    return this.valueType === 'field';
  }

  /**
   * Resolves the dialect token for this operator: first by value type, then
   * by dialect alone.
   */
  operatorToken(dialect: Dialect): string {
    const tokens = OPERATOR_TOKENS[dialect];
    const valueType = this.valueType;
    const token = tokens.byType[valueType]?.[this.operator] ?? tokens.fallback[this.operator];
    if (token === undefined) {
      throw new UnsupportedOperatorError(this.operator, dialect, valueType);
    }
    return token;
  }

  render(dialect: Dialect): string {
    return dialect === 'ql' ? this.renderQl() : this.renderRest();
  }

  toString(): string {
    return this.render('ql');
  }

  private renderQl(): string {
    const token = this.operatorToken('ql');
    const column = `${this.field.table}.${this.field.alias('ql')}`;
    const compare = this.compare;

    if (PRESENCE_TOKENS.has(token)) {
      return `${column} ${token}`;
    }
    if (compare === null) {
      throw new UnsupportedOperatorError(this.operator, 'ql', 'null');
    }
    if (isFieldDescriptor(compare)) {
      return `${column} ${token} ${compare.table}.${compare.alias('ql')}`;
    }
    return `${column} ${token} ${qlLiteral(compare)}`;
  }

  private renderRest(): string {
    const compare = this.compare;
    if (isFieldDescriptor(compare)) {
      throw new UnsupportedOperatorError(
        this.operator,
        'rest',
        'field',
        'Field-to-field comparisons cannot be rendered as a REST filter',
      );
    }

    const token = this.operatorToken('rest');
    const name = this.field.alias('rest');

    if (PRESENCE_TOKENS.has(token)) {
      return `${name} ${token}`;
    }
    if (compare === null) {
      throw new UnsupportedOperatorError(this.operator, 'rest', 'null');
    }
    // The `q` syntax has no escape for a double quote inside a value.
    if (typeof compare === 'string' && compare.includes('"')) {
      throw new UnsupportedOperatorError(
        this.operator,
        'rest',
        'string',
        `REST filter values cannot contain double quotes: ${JSON.stringify(compare)}`,
      );
    }
    return `${name} ${token} ${restLiteral(compare)}`;
  }
}

abstract class LogicalExpression {
  abstract readonly kind: 'and' | 'or';
  protected abstract readonly keyword: string;

  constructor(readonly conditions: readonly Condition[]) {
    if (conditions.length === 0) {
      throw new MismatchConditionsError(`${new.target.name} requires at least one condition`);
    }
  }

  /** A single child renders bare; otherwise children are joined and parenthesized. */
  render(dialect: Dialect): string {
    if (this.conditions.length === 1) {
      const [only] = this.conditions;
      if (only !== undefined) return only.render(dialect);
    }
    const parts = this.conditions.map((c) => c.render(dialect));
    return `(${parts.join(` ${this.keyword} `)})`;
  }

  toString(): string {
    return this.render('ql');
  }
}

export class And extends LogicalExpression {
  override readonly kind = 'and' as const;
  protected override readonly keyword = 'AND';
}

export class Or extends LogicalExpression {
  override readonly kind = 'or' as const;
  protected override readonly keyword = 'OR';
}

export type Condition = Comparison | And | Or;

/**
 * Sibling conditions in one call must all be comparisons or all be compound
 * nodes.
 */
export function assertHomogeneous(conditions: readonly Condition[], caller: string): void {
  if (conditions.length === 0) {
    throw new MismatchConditionsError(`${caller}() requires at least one condition`);
  }
  const leaves = conditions.filter((c) => c.kind === 'comparison').length;
  if (leaves !== 0 && leaves !== conditions.length) {
    throw new MismatchConditionsError(
      `${caller}() received both comparisons and compound conditions; nest them explicitly instead`,
    );
  }
}

export function and(...conditions: Condition[]): And {
  assertHomogeneous(conditions, 'and');
  return new And(conditions);
}

export function or(...conditions: Condition[]): Or {
  assertHomogeneous(conditions, 'or');
  return new Or(conditions);
}

/**
 * Folds a condition list the way `where()` accepts it: several comparisons are
 * AND'ed, a single compound node is taken as is.
 */
export function combineConditions(conditions: readonly Condition[], caller: string): Condition {
  assertHomogeneous(conditions, caller);
  const [first] = conditions;
  if (first === undefined || first.kind === 'comparison') {
    return new And(conditions);
  }
  if (conditions.length > 1) {
    throw new MismatchConditionsError(
      `${caller}() accepts a single compound condition; nest them with and()/or() instead`,
    );
  }
  return first;
}
