import type {
  FilterOperator,
  FilterValue,
  JoinKind,
  LiteralValue,
  LogicOperator,
  OperandArity,
  SortDirection,
} from './types.js';

export const FILTER_OPERATORS = [
  'EQUALS',
  'NOT_EQUALS',
  'GREATER',
  'LESS',
  'GREATER_EQUAL',
  'LESS_EQUAL',
  'IN',
  'NOT_IN',
  'LIKE',
  'NOT_LIKE',
  'BETWEEN',
  'IS_NULL',
  'IS_NOT_NULL',
  'REGEXP',
] as const satisfies readonly FilterOperator[];

export const JOIN_KINDS = ['INNER', 'LEFT', 'RIGHT', 'FULL_OUTER'] as const satisfies readonly JoinKind[];

export const LOGIC_OPERATORS = ['AND', 'OR'] as const satisfies readonly LogicOperator[];

export const SORT_DIRECTIONS = ['ASC', 'DESC'] as const satisfies readonly SortDirection[];

export const OPERATOR_TOKENS: Record<FilterOperator, string> = {
  EQUALS: '=',
  NOT_EQUALS: '!=',
  GREATER: '>',
  LESS: '<',
  GREATER_EQUAL: '>=',
  LESS_EQUAL: '<=',
  IN: 'IN',
  NOT_IN: 'NOT IN',
  LIKE: 'LIKE',
  NOT_LIKE: 'NOT LIKE',
  BETWEEN: 'BETWEEN',
  IS_NULL: 'IS NULL',
  IS_NOT_NULL: 'IS NOT NULL',
  REGEXP: 'REGEXP',
};

export const JOIN_TOKENS: Record<JoinKind, string> = {
  INNER: 'INNER JOIN',
  LEFT: 'LEFT JOIN',
  RIGHT: 'RIGHT JOIN',
  FULL_OUTER: 'FULL OUTER JOIN',
};

export function operandArity(op: FilterOperator): OperandArity {
  switch (op) {
    case 'IS_NULL':
    case 'IS_NOT_NULL':
      return 'none';
    case 'BETWEEN':
      return 'pair';
    case 'IN':
    case 'NOT_IN':
      return 'list';
    default:
      return 'single';
  }
}

export function isValueList(value: FilterValue): value is readonly LiteralValue[] {
  return Array.isArray(value);
}

/** Text as-is, anything else through String(). No quoting. */
export function rawValue(value: FilterValue): string {
  if (value === null || value === undefined) return 'NULL';
  if (isValueList(value)) return value.map((v) => rawValue(v)).join(', ');
  return String(value);
}

/**
 * Strings are wrapped in single quotes, everything else is raw.
 * Embedded quotes are NOT escaped: `O'Brien` renders as `'O'Brien'`.
 */
export function literal(value: FilterValue): string {
  if (typeof value === 'string') return `'${value}'`;
  if (isValueList(value)) return value.map((v) => literal(v)).join(', ');
  return rawValue(value);
}
