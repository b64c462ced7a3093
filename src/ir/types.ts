export type JoinKind = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL_OUTER';

export type FilterOperator =
  | 'EQUALS'
  | 'NOT_EQUALS'
  | 'GREATER'
  | 'LESS'
  | 'GREATER_EQUAL'
  | 'LESS_EQUAL'
  | 'IN'
  | 'NOT_IN'
  | 'LIKE'
  | 'NOT_LIKE'
  | 'BETWEEN'
  | 'IS_NULL'
  | 'IS_NOT_NULL'
  | 'REGEXP';

export type OperandArity = 'none' | 'single' | 'pair' | 'list';

export type LogicOperator = 'AND' | 'OR';

export type SortDirection = 'ASC' | 'DESC';

export type LiteralValue = string | number | boolean | null;

// Shape is not checked against the operator; see OperandArity.
export type FilterValue = LiteralValue | readonly LiteralValue[] | undefined;

export interface TableReference {
  readonly name: string;
  readonly alias: string;
  readonly selectedFields: readonly string[];
}

export interface JoinSpec {
  readonly leftAlias: string;
  readonly rightTable: TableReference;
  readonly joinKind: JoinKind;
  readonly leftField: string;
  readonly rightField: string;
}

export interface FilterCondition {
  readonly tableAlias: string;
  readonly field: string;
  readonly operator: FilterOperator;
  readonly value: FilterValue;
  /** How this condition combines with the one before it. Ignored on the first condition. */
  readonly logicOperator: LogicOperator;
}

export interface SortSpec {
  readonly tableAlias: string;
  readonly field: string;
  readonly direction: SortDirection;
}

export interface WindowFunctionSpec {
  readonly functionName: string;
  readonly tableAlias: string;
  readonly field?: string; // absent for ranking functions such as ROW_NUMBER
  readonly partitionBy: readonly string[]; // qualified fields
  readonly orderBy: readonly SortSpec[];
  readonly alias: string;
}

export interface CaseBranch {
  readonly condition: FilterCondition;
  readonly thenValue: LiteralValue;
}

export interface CaseWhenSpec {
  readonly alias: string;
  readonly branches: readonly CaseBranch[];
  readonly elseValue?: LiteralValue;
}

export interface GroupBySpec {
  readonly fields: readonly string[]; // qualified fields
  readonly havingConditions: readonly FilterCondition[];
}

/**
 * Read-only view of a query under assembly.
 *
 * `tables[0]` is the driving table of the FROM clause. Order is load-bearing in
 * every sequence: it is the order of the select list, the join lines, the WHERE
 * lines and the ORDER BY items.
 */
export interface QueryState {
  readonly tables: readonly TableReference[];
  readonly joins: readonly JoinSpec[];
  readonly filters: readonly FilterCondition[];
  readonly caseWhens: readonly CaseWhenSpec[];
  readonly windowFunctions: readonly WindowFunctionSpec[];
  readonly orderBy: readonly SortSpec[];
  readonly groupBy?: GroupBySpec;
  readonly distinct: boolean;
  readonly limit?: number;
  readonly offset?: number;
}
