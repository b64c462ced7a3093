export * from './ir/types.js';
export {
  FILTER_OPERATORS,
  JOIN_KINDS,
  LOGIC_OPERATORS,
  SORT_DIRECTIONS,
  OPERATOR_TOKENS,
  JOIN_TOKENS,
  operandArity,
  literal,
  rawValue,
} from './ir/operators.js';
export { QueryAssembly, filterCondition, sortSpec } from './QueryAssembly.js';
export { generateSQL, renderPredicate, renderCaseWhen, renderWindowFunction } from './generator/sql.js';
export { validateSQL, type ValidationResult } from './validator/validate.js';
export { DefaultSqlTokenizer, SqlToken, lexSql, type SqlAnalysis, type SqlTokenizer, type TokenKind } from './validator/tokenizer.js';
export { explain } from './explain/explainer.js';
export { toRequirements } from './explain/requirements.js';
export { checkConsistency, type ConsistencyProblem, type ProblemCode, type Severity } from './analysis/consistency.js';
export {
  QueryConfigSchema,
  configFromQuery,
  queryFromConfig,
  type QueryConfig,
  type QueryConfigInput,
} from './persistence/config.js';
export {
  FileTemplateStore,
  InMemoryTemplateStore,
  safeTemplateName,
  type TemplateStore,
  type TemplateSummary,
} from './persistence/template-store.js';
export { sampleConfig } from './persistence/sample.js';
export { buildReport, type QueryReport, type QueryStats } from './report.js';
