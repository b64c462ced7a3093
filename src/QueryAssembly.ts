import type {
  CaseBranch,
  CaseWhenSpec,
  FilterCondition,
  FilterOperator,
  FilterValue,
  GroupBySpec,
  JoinKind,
  JoinSpec,
  LiteralValue,
  LogicOperator,
  QueryState,
  SortDirection,
  SortSpec,
  TableReference,
  WindowFunctionSpec,
} from './ir/types.js';
import { generateSQL } from './generator/sql.js';
import { validateSQL, type ValidationResult } from './validator/validate.js';
import { DefaultSqlTokenizer, type SqlTokenizer } from './validator/tokenizer.js';
import { explain } from './explain/explainer.js';
import { toRequirements } from './explain/requirements.js';
import { checkConsistency, type ConsistencyProblem } from './analysis/consistency.js';

/**
 * The aggregate a query is assembled in.
 *
 * Two order-dependent rules are part of the rendered output and must not be
 * "normalized" away:
 * - the first table added (directly or through a join) drives the FROM clause;
 * - a filter's logic operator links it to the filter before it, so the first
 *   filter's operator never shows up in the SQL.
 *
 * Mutations accept anything. Malformed input renders as malformed SQL and is
 * reported by {@link validate} or {@link checkConsistency}, never thrown.
 */
export class QueryAssembly {
  private readonly tables: TableReference[] = [];
  private readonly joins: JoinSpec[] = [];
  private readonly filters: FilterCondition[] = [];
  private readonly caseWhens: CaseWhenSpec[] = [];
  private readonly windowFunctions: WindowFunctionSpec[] = [];
  private readonly orderBy: SortSpec[] = [];
  private groupBy?: GroupBySpec;
  private distinct = false;
  private limit?: number;
  private offset?: number;
  // positions in `tables` that were introduced by addJoin
  private readonly joinedTables = new Set<number>();

  addTable(name: string, alias: string, fields: readonly string[] = []): TableReference {
    const table: TableReference = { name, alias, selectedFields: [...fields] };
    this.tables.push(table);
    return table;
  }

  addJoin(
    leftAlias: string,
    rightTableName: string,
    rightAlias: string,
    leftField: string,
    rightField: string,
    kind: JoinKind = 'LEFT',
    rightFields: readonly string[] = [],
  ): JoinSpec {
    const rightTable = this.addTable(rightTableName, rightAlias, rightFields);
    this.joinedTables.add(this.tables.length - 1);
    const join: JoinSpec = { leftAlias, rightTable, joinKind: kind, leftField, rightField };
    this.joins.push(join);
    return join;
  }

  addFilter(
    tableAlias: string,
    field: string,
    operator: FilterOperator,
    value?: FilterValue,
    logic: LogicOperator = 'AND',
  ): FilterCondition {
    const condition = filterCondition(tableAlias, field, operator, value, logic);
    this.filters.push(condition);
    return condition;
  }

  addCaseWhen(alias: string, branches: readonly CaseBranch[], elseValue?: LiteralValue): CaseWhenSpec {
    const spec: CaseWhenSpec = elseValue === undefined
      ? { alias, branches: [...branches] }
      : { alias, branches: [...branches], elseValue };
    this.caseWhens.push(spec);
    return spec;
  }

  addWindowFunction(
    functionName: string,
    tableAlias: string,
    field?: string,
    partitionBy: readonly string[] = [],
    orderBy: readonly SortSpec[] = [],
    alias = '',
  ): WindowFunctionSpec {
    const spec: WindowFunctionSpec = {
      functionName,
      tableAlias,
      ...(field ? { field } : {}),
      partitionBy: [...partitionBy],
      orderBy: [...orderBy],
      alias,
    };
    this.windowFunctions.push(spec);
    return spec;
  }

  /** Replaces any previous grouping. */
  setGroupBy(fields: readonly string[], having: readonly FilterCondition[] = []): GroupBySpec {
    this.groupBy = { fields: [...fields], havingConditions: [...having] };
    return this.groupBy;
  }

  addOrderBy(tableAlias: string, field: string, direction: SortDirection = 'ASC'): SortSpec {
    const sort: SortSpec = { tableAlias, field, direction };
    this.orderBy.push(sort);
    return sort;
  }

  setLimit(limit?: number, offset?: number): void {
    this.limit = limit;
    this.offset = offset;
  }

  setDistinct(distinct = true): void {
    this.distinct = distinct;
  }

  get state(): QueryState {
    return {
      tables: [...this.tables],
      joins: [...this.joins],
      filters: [...this.filters],
      caseWhens: [...this.caseWhens],
      windowFunctions: [...this.windowFunctions],
      orderBy: [...this.orderBy],
      ...(this.groupBy ? { groupBy: this.groupBy } : {}),
      distinct: this.distinct,
      ...(this.limit !== undefined ? { limit: this.limit } : {}),
      ...(this.offset !== undefined ? { offset: this.offset } : {}),
    };
  }

  /**
   * Number of joins added before each table, `undefined` for tables that came
   * in through a join. Used to keep interleaved insertion order when the
   * query is serialized.
   */
  tablePlacement(): (number | undefined)[] {
    let joinsSoFar = 0;
    return this.tables.map((_, i) => {
      if (this.joinedTables.has(i)) {
        joinsSoFar++;
        return undefined;
      }
      return joinsSoFar;
    });
  }

  toSQL(): string {
    return generateSQL(this.state);
  }

  validate(sql: string = this.toSQL(), tokenizer: SqlTokenizer = new DefaultSqlTokenizer()): ValidationResult {
    return validateSQL(sql, tokenizer);
  }

  describe(): string {
    return explain(this.state);
  }

  toRequirements(): string {
    return toRequirements(this.state);
  }

  checkConsistency(): ConsistencyProblem[] {
    return checkConsistency(this.state);
  }
}

export function filterCondition(
  tableAlias: string,
  field: string,
  operator: FilterOperator,
  value?: FilterValue,
  logic: LogicOperator = 'AND',
): FilterCondition {
  return { tableAlias, field, operator, value, logicOperator: logic };
}

export function sortSpec(tableAlias: string, field: string, direction: SortDirection = 'ASC'): SortSpec {
  return { tableAlias, field, direction };
}
