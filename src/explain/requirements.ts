import type { QueryState } from '../ir/types.js';
import { JOIN_LABELS, conditionText, plural, sortText } from './labels.js';

const HEADER = 'I need a SQL query with the following requirements:';
const CLOSING = 'Please write the SQL query that satisfies these requirements.';

/**
 * The query state restated as requirements, for handing to an external tool.
 * Same sections, order and omission rule as {@link explain}.
 */
export function toRequirements(q: QueryState): string {
  const sections: string[] = [];

  if (q.distinct) sections.push('**Deduplication**: the result rows must be distinct');

  if (q.tables.length) {
    const items = q.tables.map((t, i) => {
      let item = `\n- ${i === 0 ? 'Primary table' : 'Related table'}: ${t.name} (alias: ${t.alias})`;
      if (t.selectedFields.length) item += `\n  Fields needed: ${t.selectedFields.join(', ')}`;
      return item;
    });
    sections.push('**Data sources**:' + items.join(''));
  }

  if (q.joins.length) {
    const items = q.joins.map(
      (j) =>
        `\n- ${j.leftAlias} ${JOIN_LABELS[j.joinKind]} ${j.rightTable.alias}` +
        `\n  Join condition: ${j.leftAlias}.${j.leftField} = ${j.rightTable.alias}.${j.rightField}`,
    );
    sections.push('**Table relationships**:' + items.join(''));
  }

  if (q.filters.length) {
    const items = q.filters.map((f, i) => `\n- ${i === 0 ? '' : `${f.logicOperator} `}${conditionText(f)}`);
    sections.push('**Filter conditions**:' + items.join(''));
  }

  if (q.groupBy) {
    const { fields, havingConditions } = q.groupBy;
    let grouping = `**Grouping**: group by ${fields.length ? fields.join(', ') : '(no fields)'}`;
    for (const h of havingConditions) grouping += `\n- Having ${conditionText(h)}`;
    sections.push(grouping);
  }

  if (q.caseWhens.length) {
    const items = q.caseWhens.map((c) => {
      let item = `\n- Create column ${c.alias} assigned by these conditions:`;
      c.branches.forEach((b, j) => {
        item += `\n  Condition ${j + 1}: if ${conditionText(b.condition)}, the value is ${String(b.thenValue)}`;
      });
      if (c.elseValue !== undefined && c.elseValue !== null) item += `\n  Otherwise the value is ${String(c.elseValue)}`;
      return item;
    });
    sections.push('**Computed columns**:' + items.join(''));
  }

  if (q.windowFunctions.length) {
    const items = q.windowFunctions.map((w) => {
      let item = `\n- Compute ${w.functionName}`;
      if (w.field) item += `(${w.tableAlias}.${w.field})`;
      if (w.alias) item += `, named ${w.alias}`;
      if (w.partitionBy.length) item += `\n  Partition by ${w.partitionBy.join(', ')}`;
      if (w.orderBy.length) item += `\n  Order by ${w.orderBy.map(sortText).join(', ')}`;
      return item;
    });
    sections.push('**Window functions**:' + items.join(''));
  }

  if (q.orderBy.length) {
    sections.push(`**Result ordering**:\n- by ${q.orderBy.map(sortText).join(', ')}`);
  }

  if (q.limit !== undefined && q.limit > 0) {
    let limit = `**Row limit**: return only ${plural(q.limit, 'row', 'rows')}`;
    if (q.offset !== undefined && q.offset > 0) limit += `, skipping the first ${q.offset}`;
    sections.push(limit);
  }

  return [HEADER, ...sections, CLOSING].join('\n\n');
}
