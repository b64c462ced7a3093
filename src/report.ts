import type { QueryAssembly } from './QueryAssembly.js';
import type { ValidationResult } from './validator/validate.js';
import type { ConsistencyProblem } from './analysis/consistency.js';
import { DefaultSqlTokenizer, type SqlTokenizer } from './validator/tokenizer.js';
import { queryLogger } from './utils/logger.js';

export interface QueryStats {
  lines: number;
  tables: number;
  joins: number;
  filters: number;
  caseWhens: number;
  orderBys: number;
}

export interface QueryReport {
  sql: string;
  validation: ValidationResult;
  description: string;
  requirements: string;
  problems: ConsistencyProblem[];
  stats: QueryStats;
}

/** Everything a front end shows for one query: SQL, diagnostics, and both summaries. */
export function buildReport(query: QueryAssembly, tokenizer: SqlTokenizer = new DefaultSqlTokenizer()): QueryReport {
  const started = Date.now();
  const sql = query.toSQL();
  const validation = query.validate(sql, tokenizer);
  const state = query.state;

  const report: QueryReport = {
    sql,
    validation,
    description: query.describe(),
    requirements: query.toRequirements(),
    problems: query.checkConsistency(),
    stats: {
      lines: sql.split('\n').length,
      tables: state.tables.length,
      joins: state.joins.length,
      filters: state.filters.length,
      caseWhens: state.caseWhens.length,
      orderBys: state.orderBy.length,
    },
  };

  queryLogger.info('Query rendered', {
    valid: validation.valid,
    problems: report.problems.length,
    executionTime: Date.now() - started,
  });
  return report;
}
