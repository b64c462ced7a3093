import type { FilterCondition, QueryState } from '../ir/types.js';
import { OPERATOR_TOKENS, isValueList, operandArity } from '../ir/operators.js';
import { queryLogger } from '../utils/logger.js';

export type Severity = 'error' | 'warning';

export type ProblemCode =
  | 'NO_TABLES'
  | 'EMPTY_SELECT_LIST'
  | 'DUPLICATE_ALIAS'
  | 'UNKNOWN_ALIAS'
  | 'OPERAND_ARITY'
  | 'IGNORED_VALUE'
  | 'WINDOW_FIELD'
  | 'MISSING_ALIAS'
  | 'EMPTY_CASE'
  | 'EMPTY_GROUP_BY'
  | 'INVALID_PAGINATION'
  | 'OFFSET_WITHOUT_LIMIT';

export interface ConsistencyProblem {
  severity: Severity;
  code: ProblemCode;
  message: string;
  /** Location in the query state, e.g. `filters[1]` or `groupBy.havingConditions[0]`. */
  path: string;
}

const AGGREGATE_FUNCTIONS = new Set(['SUM', 'AVG', 'COUNT', 'MIN', 'MAX']);
const RANKING_FUNCTIONS = new Set(['ROW_NUMBER', 'RANK', 'DENSE_RANK', 'PERCENT_RANK', 'CUME_DIST']);

function arityProblems(c: FilterCondition, path: string): ConsistencyProblem[] {
  const op = OPERATOR_TOKENS[c.operator];
  const v = c.value;
  const missing = v === null || v === undefined;
  const problem = (severity: Severity, code: ProblemCode, message: string): ConsistencyProblem[] => [
    { severity, code, message, path },
  ];

  switch (operandArity(c.operator)) {
    case 'none':
      return missing ? [] : problem('warning', 'IGNORED_VALUE', `${op} ignores its value`);
    case 'pair':
      if (!isValueList(v) || v.length < 2) return problem('error', 'OPERAND_ARITY', `${op} needs two values`);
      if (v.length > 2) return problem('warning', 'IGNORED_VALUE', `${op} uses only the first two values`);
      return [];
    case 'list':
      if (missing) return problem('error', 'OPERAND_ARITY', `${op} needs at least one value`);
      if (!isValueList(v)) return problem('warning', 'OPERAND_ARITY', `${op} value is not a list and is inserted as-is`);
      if (v.length === 0) return problem('error', 'OPERAND_ARITY', `${op} needs at least one value`);
      return [];
    case 'single':
      if (missing) return problem('error', 'OPERAND_ARITY', `${op} needs a value`);
      if (isValueList(v)) return problem('error', 'OPERAND_ARITY', `${op} expects a single value, got a list`);
      return [];
  }
}

/**
 * Pre-render check of the things mutations deliberately accept: alias
 * references, operand shapes and the other gaps that would otherwise only
 * show up as odd SQL. Never throws.
 */
export function checkConsistency(q: QueryState): ConsistencyProblem[] {
  const problems: ConsistencyProblem[] = [];
  const aliases = new Set<string>();

  if (!q.tables.length) {
    problems.push({ severity: 'error', code: 'NO_TABLES', message: 'No tables: the FROM clause will be missing', path: 'tables' });
  }

  const selected = q.tables.reduce((n, t) => n + t.selectedFields.length, 0) + q.caseWhens.length + q.windowFunctions.length;
  if (selected === 0) {
    problems.push({ severity: 'error', code: 'EMPTY_SELECT_LIST', message: 'Nothing is selected', path: 'tables' });
  }

  q.tables.forEach((t, i) => {
    if (aliases.has(t.alias)) {
      problems.push({
        severity: 'error',
        code: 'DUPLICATE_ALIAS',
        message: `Alias '${t.alias}' is used by more than one table`,
        path: `tables[${i}]`,
      });
    }
    aliases.add(t.alias);
  });

  const checkAlias = (alias: string, path: string) => {
    if (!aliases.has(alias)) {
      problems.push({ severity: 'error', code: 'UNKNOWN_ALIAS', message: `Unknown table alias '${alias}'`, path });
    }
  };
  // qualified fields without a dot are taken to be expressions
  const checkQualified = (field: string, path: string) => {
    const dot = field.indexOf('.');
    if (dot > 0) checkAlias(field.slice(0, dot), path);
  };
  const checkCondition = (c: FilterCondition, path: string) => {
    checkAlias(c.tableAlias, path);
    problems.push(...arityProblems(c, path));
  };

  q.joins.forEach((j, i) => checkAlias(j.leftAlias, `joins[${i}]`));
  q.filters.forEach((f, i) => checkCondition(f, `filters[${i}]`));

  q.caseWhens.forEach((c, i) => {
    const path = `caseWhens[${i}]`;
    if (!c.alias) problems.push({ severity: 'warning', code: 'MISSING_ALIAS', message: 'CASE column has no alias', path });
    if (!c.branches.length) problems.push({ severity: 'error', code: 'EMPTY_CASE', message: 'CASE has no WHEN branch', path });
    c.branches.forEach((b, j) => checkCondition(b.condition, `${path}.branches[${j}]`));
  });

  q.windowFunctions.forEach((w, i) => {
    const path = `windowFunctions[${i}]`;
    const fn = w.functionName.toUpperCase();
    if (!w.alias) problems.push({ severity: 'warning', code: 'MISSING_ALIAS', message: `${fn} column has no alias`, path });
    if (w.field) {
      checkAlias(w.tableAlias, path);
      if (RANKING_FUNCTIONS.has(fn)) {
        problems.push({ severity: 'warning', code: 'WINDOW_FIELD', message: `${fn} takes no argument`, path });
      }
    } else if (AGGREGATE_FUNCTIONS.has(fn)) {
      problems.push({ severity: 'error', code: 'WINDOW_FIELD', message: `${fn} needs a field`, path });
    }
    w.partitionBy.forEach((p, j) => checkQualified(p, `${path}.partitionBy[${j}]`));
    w.orderBy.forEach((s, j) => checkAlias(s.tableAlias, `${path}.orderBy[${j}]`));
  });

  if (q.groupBy) {
    if (!q.groupBy.fields.length) {
      problems.push({ severity: 'error', code: 'EMPTY_GROUP_BY', message: 'GROUP BY has no fields', path: 'groupBy' });
    }
    q.groupBy.fields.forEach((f, i) => checkQualified(f, `groupBy.fields[${i}]`));
    q.groupBy.havingConditions.forEach((h, i) => checkCondition(h, `groupBy.havingConditions[${i}]`));
  }

  q.orderBy.forEach((s, i) => checkAlias(s.tableAlias, `orderBy[${i}]`));

  for (const [key, value] of [['limit', q.limit], ['offset', q.offset]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      problems.push({ severity: 'error', code: 'INVALID_PAGINATION', message: `${key} must be a non-negative integer`, path: key });
    }
  }
  if (q.offset !== undefined && q.offset > 0 && !(q.limit !== undefined && q.limit > 0)) {
    problems.push({
      severity: 'warning',
      code: 'OFFSET_WITHOUT_LIMIT',
      message: 'OFFSET is dropped without a positive LIMIT',
      path: 'offset',
    });
  }

  queryLogger.debug('Consistency check finished', { problems: problems.length });
  return problems;
}
