import type { FilterCondition, FilterOperator, FilterValue, JoinKind, SortDirection, SortSpec } from '../ir/types.js';
import { isValueList, operandArity } from '../ir/operators.js';

export const JOIN_LABELS: Record<JoinKind, string> = {
  INNER: 'inner join',
  LEFT: 'left join',
  RIGHT: 'right join',
  FULL_OUTER: 'full outer join',
};

export const OPERATOR_LABELS: Record<FilterOperator, string> = {
  EQUALS: 'equals',
  NOT_EQUALS: 'does not equal',
  GREATER: 'is greater than',
  LESS: 'is less than',
  GREATER_EQUAL: 'is at least',
  LESS_EQUAL: 'is at most',
  IN: 'is one of',
  NOT_IN: 'is not one of',
  LIKE: 'matches',
  NOT_LIKE: 'does not match',
  BETWEEN: 'is between',
  IS_NULL: 'is empty',
  IS_NOT_NULL: 'is not empty',
  REGEXP: 'matches the regular expression',
};

export const DIRECTION_LABELS: Record<SortDirection, string> = {
  ASC: 'ascending',
  DESC: 'descending',
};

function display(value: FilterValue): string {
  if (value === null || value === undefined) return 'NULL';
  if (isValueList(value)) return value.map((v) => display(v)).join(', ');
  return String(value);
}

/** `p.price is between 10 and 20`; values are shown unquoted. */
export function conditionText(c: FilterCondition): string {
  const subject = `${c.tableAlias}.${c.field} ${OPERATOR_LABELS[c.operator]}`;
  switch (operandArity(c.operator)) {
    case 'none':
      return subject;
    case 'pair': {
      const range = isValueList(c.value) ? c.value : [c.value];
      return `${subject} ${display(range[0])} and ${display(range[1])}`;
    }
    default:
      return c.value === null || c.value === undefined ? subject : `${subject} ${display(c.value)}`;
  }
}

export function sortText(s: SortSpec): string {
  return `${s.tableAlias}.${s.field} ${DIRECTION_LABELS[s.direction]}`;
}

export function plural(n: number, one: string, many: string): string {
  return `${n} ${n === 1 ? one : many}`;
}
