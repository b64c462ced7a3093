import type { QueryState } from '../ir/types.js';
import { JOIN_LABELS, conditionText, plural, sortText } from './labels.js';

/**
 * Markdown description of what the query asks for, built from the query state
 * rather than from its SQL. Sections without content are left out.
 */
export function explain(q: QueryState): string {
  let intro = q.distinct ? 'Query distinct rows' : 'Query data';
  const driving = q.tables[0];
  if (driving) {
    intro += `, from **${driving.name}**`;
    if (driving.selectedFields.length) intro += ` (fields: ${driving.selectedFields.join(', ')})`;
  }
  for (const j of q.joins) {
    const right = j.rightTable;
    intro += `, ${JOIN_LABELS[j.joinKind]} **${right.name}** (ON ${j.leftAlias}.${j.leftField} = ${right.alias}.${j.rightField})`;
  }

  const sections: string[] = [intro + '.'];

  if (q.filters.length) {
    const items = q.filters.map((f, i) => `\n- ${i === 0 ? '' : `**${f.logicOperator}** `}${conditionText(f)}`);
    sections.push('**Filters**:' + items.join(''));
  }

  if (q.groupBy) {
    const { fields, havingConditions } = q.groupBy;
    let grouping = `**Grouping**: by ${fields.length ? fields.join(', ') : '(no fields)'}`;
    if (havingConditions.length) grouping += `, having ${havingConditions.map(conditionText).join(' and ')}`;
    sections.push(grouping);
  }

  if (q.caseWhens.length) {
    const items = q.caseWhens.map((c) => `\n- ${c.alias} (${plural(c.branches.length, 'branch', 'branches')})`);
    sections.push('**Computed columns**:' + items.join(''));
  }

  if (q.windowFunctions.length) {
    const items = q.windowFunctions.map((w) => {
      let item = `\n- ${w.alias || '(unnamed)'}: ${w.functionName}`;
      if (w.field) item += ` of ${w.tableAlias}.${w.field}`;
      if (w.partitionBy.length) item += ` partitioned by ${w.partitionBy.join(', ')}`;
      if (w.orderBy.length) item += ` ordered by ${w.orderBy.map(sortText).join(', ')}`;
      return item;
    });
    sections.push('**Window functions**:' + items.join(''));
  }

  if (q.orderBy.length) {
    sections.push(`**Ordering**: by ${q.orderBy.map(sortText).join(', ')}`);
  }

  if (q.limit !== undefined && q.limit > 0) {
    let limit = `**Limit**: return ${plural(q.limit, 'row', 'rows')}`;
    if (q.offset !== undefined && q.offset > 0) limit += `, skipping the first ${q.offset}`;
    sections.push(limit);
  }

  return sections.join('\n\n');
}
