import { z } from 'zod';
import { QueryAssembly, filterCondition, sortSpec } from '../QueryAssembly.js';
import type { FilterCondition, SortSpec } from '../ir/types.js';
import { FILTER_OPERATORS, JOIN_KINDS, LOGIC_OPERATORS, SORT_DIRECTIONS, isValueList } from '../ir/operators.js';

const LiteralSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const FilterSchema = z.object({
  tableAlias: z.string(),
  field: z.string(),
  operator: z.enum(FILTER_OPERATORS),
  value: z.union([LiteralSchema, z.array(LiteralSchema)]).optional(),
  logic: z.enum(LOGIC_OPERATORS).default('AND'),
});

const SortSchema = z.object({
  tableAlias: z.string(),
  field: z.string(),
  direction: z.enum(SORT_DIRECTIONS).default('ASC'),
});

export const QueryConfigSchema = z.object({
  tables: z
    .array(
      z.object({
        name: z.string(),
        alias: z.string(),
        fields: z.array(z.string()).default([]),
        // joins added before this table; keeps interleaved order on reload
        afterJoins: z.number().int().nonnegative().optional(),
      }),
    )
    .default([]),
  joins: z
    .array(
      z.object({
        leftAlias: z.string(),
        rightTable: z.string(),
        rightAlias: z.string(),
        joinType: z.enum(JOIN_KINDS).default('LEFT'),
        onLeft: z.string(),
        onRight: z.string(),
        rightFields: z.array(z.string()).default([]),
      }),
    )
    .default([]),
  filters: z.array(FilterSchema).default([]),
  caseWhens: z
    .array(
      z.object({
        alias: z.string(),
        conditions: z.array(z.object({ condition: FilterSchema, then: LiteralSchema })),
        elseValue: LiteralSchema.optional(),
      }),
    )
    .default([]),
  orderBys: z.array(SortSchema).default([]),
  distinct: z.boolean().default(false),
  limitConfig: z
    .object({
      limit: z.number().nullable().default(null),
      offset: z.number().nullable().default(null),
    })
    .default({}),
  groupBy: z
    .object({
      fields: z.array(z.string()).default([]),
      having: z.array(FilterSchema).default([]),
    })
    .nullable()
    .default(null),
  windowFunctions: z
    .array(
      z.object({
        function: z.string(),
        tableAlias: z.string(),
        field: z.string().optional(),
        partitionBy: z.array(z.string()).default([]),
        orderBy: z.array(SortSchema).default([]),
        alias: z.string().default(''),
      }),
    )
    .default([]),
});

export type QueryConfig = z.infer<typeof QueryConfigSchema>;
export type QueryConfigInput = z.input<typeof QueryConfigSchema>;
type FilterConfig = z.infer<typeof FilterSchema>;
type SortConfig = z.infer<typeof SortSchema>;

function filterToConfig(f: FilterCondition): FilterConfig {
  return {
    tableAlias: f.tableAlias,
    field: f.field,
    operator: f.operator,
    value: isValueList(f.value) ? [...f.value] : f.value ?? null,
    logic: f.logicOperator,
  };
}

function filterFromConfig(f: FilterConfig): FilterCondition {
  return filterCondition(f.tableAlias, f.field, f.operator, f.value, f.logic);
}

function sortToConfig(s: SortSpec): SortConfig {
  return { tableAlias: s.tableAlias, field: s.field, direction: s.direction };
}

/** Serializable form of a query: the only thing that outlives a QueryAssembly. */
export function configFromQuery(query: QueryAssembly): QueryConfig {
  const q = query.state;
  const placement = query.tablePlacement();

  return {
    tables: q.tables.flatMap((t, i) => {
      const afterJoins = placement[i];
      if (afterJoins === undefined) return []; // comes back through its join
      return [{ name: t.name, alias: t.alias, fields: [...t.selectedFields], ...(afterJoins > 0 ? { afterJoins } : {}) }];
    }),
    joins: q.joins.map((j) => ({
      leftAlias: j.leftAlias,
      rightTable: j.rightTable.name,
      rightAlias: j.rightTable.alias,
      joinType: j.joinKind,
      onLeft: j.leftField,
      onRight: j.rightField,
      rightFields: [...j.rightTable.selectedFields],
    })),
    filters: q.filters.map(filterToConfig),
    caseWhens: q.caseWhens.map((c) => ({
      alias: c.alias,
      conditions: c.branches.map((b) => ({ condition: filterToConfig(b.condition), then: b.thenValue })),
      ...(c.elseValue !== undefined ? { elseValue: c.elseValue } : {}),
    })),
    orderBys: q.orderBy.map(sortToConfig),
    distinct: q.distinct,
    limitConfig: { limit: q.limit ?? null, offset: q.offset ?? null },
    groupBy: q.groupBy ? { fields: [...q.groupBy.fields], having: q.groupBy.havingConditions.map(filterToConfig) } : null,
    windowFunctions: q.windowFunctions.map((w) => ({
      function: w.functionName,
      tableAlias: w.tableAlias,
      ...(w.field ? { field: w.field } : {}),
      partitionBy: [...w.partitionBy],
      orderBy: w.orderBy.map(sortToConfig),
      alias: w.alias,
    })),
  };
}

/**
 * Rebuilds a query by replaying the mutation operations in document order.
 * Throws a ZodError when the document does not match {@link QueryConfigSchema}.
 */
export function queryFromConfig(doc: unknown): QueryAssembly {
  const config = QueryConfigSchema.parse(doc);
  const query = new QueryAssembly();

  let nextTable = 0;
  const addTables = (joinsDone: number) => {
    while (nextTable < config.tables.length) {
      const t = config.tables[nextTable];
      if ((t.afterJoins ?? 0) > joinsDone) break;
      query.addTable(t.name, t.alias, t.fields);
      nextTable++;
    }
  };

  addTables(0);
  config.joins.forEach((j, i) => {
    query.addJoin(j.leftAlias, j.rightTable, j.rightAlias, j.onLeft, j.onRight, j.joinType, j.rightFields);
    addTables(i + 1);
  });
  addTables(Number.POSITIVE_INFINITY);

  for (const f of config.filters) {
    query.addFilter(f.tableAlias, f.field, f.operator, f.value, f.logic);
  }
  for (const c of config.caseWhens) {
    const branches = c.conditions.map((b) => ({ condition: filterFromConfig(b.condition), thenValue: b.then }));
    query.addCaseWhen(c.alias, branches, c.elseValue);
  }
  for (const s of config.orderBys) {
    query.addOrderBy(s.tableAlias, s.field, s.direction);
  }
  query.setDistinct(config.distinct);

  const { limit, offset } = config.limitConfig;
  if (limit !== null || offset !== null) query.setLimit(limit ?? undefined, offset ?? undefined);

  if (config.groupBy) {
    query.setGroupBy(config.groupBy.fields, config.groupBy.having.map(filterFromConfig));
  }
  for (const w of config.windowFunctions) {
    const orderBy = w.orderBy.map((s) => sortSpec(s.tableAlias, s.field, s.direction));
    query.addWindowFunction(w.function, w.tableAlias, w.field, w.partitionBy, orderBy, w.alias);
  }
  return query;
}
