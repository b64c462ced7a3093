import type { CaseWhenSpec, FilterCondition, JoinSpec, QueryState, SortSpec, TableReference, WindowFunctionSpec } from '../ir/types.js';
import { JOIN_TOKENS, OPERATOR_TOKENS, isValueList, literal, operandArity, rawValue } from '../ir/operators.js';

const INDENT = '  ';

export function qualify(alias: string, field: string): string {
  return `${alias}.${field}`;
}

function qualifiedFields(t: TableReference): string[] {
  return t.selectedFields.map((f) => qualify(t.alias, f));
}

/**
 * Predicate text for WHERE, HAVING and CASE WHEN. The condition's own logic
 * operator is not part of it.
 */
export function renderPredicate(c: FilterCondition): string {
  const field = qualify(c.tableAlias, c.field);
  const token = OPERATOR_TOKENS[c.operator];

  switch (operandArity(c.operator)) {
    case 'none':
      return `${field} ${token}`;
    case 'list': {
      // a scalar goes in raw so callers can pass a pre-built list such as "1, 2, 3"
      const values = isValueList(c.value) ? c.value.map((v) => literal(v)).join(', ') : rawValue(c.value);
      return `${field} ${token} (${values})`;
    }
    case 'pair': {
      const range = isValueList(c.value) ? c.value : [c.value];
      return `${field} BETWEEN ${rawValue(range[0])} AND ${rawValue(range[1])}`;
    }
    case 'single':
      if (c.operator === 'REGEXP') return `${field} REGEXP '${rawValue(c.value)}'`;
      return `${field} ${token} ${literal(c.value)}`;
  }
}

export function renderSort(s: SortSpec): string {
  return `${qualify(s.tableAlias, s.field)} ${s.direction}`;
}

export function renderJoin(j: JoinSpec): string {
  const right = j.rightTable;
  return (
    `${JOIN_TOKENS[j.joinKind]} ${right.name} AS ${right.alias} ` +
    `ON ${qualify(j.leftAlias, j.leftField)} = ${qualify(right.alias, j.rightField)}`
  );
}

/**
 * Multi-line CASE block. The first line carries no indentation because the
 * select list prefixes every item; following lines are indented relative to
 * `indent`.
 */
export function renderCaseWhen(c: CaseWhenSpec, indent = INDENT): string {
  const lines = ['CASE'];
  for (const b of c.branches) {
    lines.push(`${indent}${INDENT}WHEN ${renderPredicate(b.condition)} THEN ${literal(b.thenValue)}`);
  }
  if (c.elseValue !== undefined && c.elseValue !== null) {
    lines.push(`${indent}${INDENT}ELSE ${literal(c.elseValue)}`);
  }
  lines.push(c.alias ? `${indent}END AS ${c.alias}` : `${indent}END`);
  return lines.join('\n');
}

export function renderWindowFunction(w: WindowFunctionSpec): string {
  const arg = w.field ? qualify(w.tableAlias, w.field) : '';
  const over: string[] = [];
  if (w.partitionBy.length) over.push(`PARTITION BY ${w.partitionBy.join(', ')}`);
  if (w.orderBy.length) over.push(`ORDER BY ${w.orderBy.map(renderSort).join(', ')}`);
  const expr = `${w.functionName}(${arg}) OVER (${over.join(' ')})`;
  return w.alias ? `${expr} AS ${w.alias}` : expr;
}

export function selectItems(q: QueryState): string[] {
  return [
    ...q.tables.flatMap(qualifiedFields),
    ...q.caseWhens.map((c) => renderCaseWhen(c)),
    ...q.windowFunctions.map(renderWindowFunction),
  ];
}

/**
 * Renders the whole statement. Never throws: a query without tables simply has
 * no FROM clause, an empty select list leaves an empty indented line.
 */
export function generateSQL(q: QueryState): string {
  const lines: string[] = [q.distinct ? 'SELECT DISTINCT' : 'SELECT'];
  lines.push(INDENT + selectItems(q).join(`,\n${INDENT}`));

  const driving = q.tables[0];
  if (driving) lines.push(`FROM ${driving.name} AS ${driving.alias}`);

  for (const j of q.joins) lines.push(renderJoin(j));

  if (q.filters.length) {
    lines.push('WHERE');
    q.filters.forEach((f, i) => {
      const prefix = i === 0 ? '' : `${f.logicOperator} `;
      lines.push(`${INDENT}${prefix}${renderPredicate(f)}`);
    });
  }

  if (q.groupBy) {
    const { fields, havingConditions } = q.groupBy;
    lines.push(fields.length ? `GROUP BY ${fields.join(', ')}` : 'GROUP BY');
    if (havingConditions.length) {
      // always AND: a having condition's own logic operator is not consulted
      lines.push(`HAVING ${havingConditions.map(renderPredicate).join(' AND ')}`);
    }
  }

  if (q.orderBy.length) lines.push(`ORDER BY ${q.orderBy.map(renderSort).join(', ')}`);

  if (q.limit !== undefined && q.limit > 0) {
    const offset = q.offset !== undefined && q.offset > 0 ? ` OFFSET ${q.offset}` : '';
    lines.push(`LIMIT ${q.limit}${offset}`);
  }

  return lines.join('\n') + ';';
}
