import type { SqlAnalysis, SqlToken, SqlTokenizer } from './tokenizer.js';
import { validationLogger } from '../utils/logger.js';

export interface ValidationResult {
  valid: boolean;
  formatted: string;
  errors: string[];
  warnings: string[];
}

export const MESSAGES = {
  unparsable: 'Unable to parse SQL statement',
  parseError: (reason: string) => `Parse error: ${reason}`,
  unbalancedParens: 'Unbalanced parentheses',
  nonSelect: (kind: string) => `Non-SELECT statement detected: ${kind}`,
  oddQuotes: 'Possible unclosed single quote',
  selectStar: 'SELECT * is used; list the columns explicitly',
} as const;

/** Stops at the first `)` without a matching `(`. */
export function parenthesesBalanced(tokens: readonly SqlToken[]): boolean {
  let depth = 0;
  for (const t of tokens) {
    if (t.matches('punctuation', '(')) depth++;
    else if (t.matches('punctuation', ')')) depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

/**
 * Structural checks on rendered SQL text. Only an unparsable statement or
 * unbalanced parentheses make the result invalid; everything else is a warning.
 * Nothing here throws, including a failing tokenizer.
 */
export function validateSQL(sql: string, tokenizer: SqlTokenizer): ValidationResult {
  const result: ValidationResult = { valid: true, formatted: '', errors: [], warnings: [] };

  let analysis: SqlAnalysis | undefined;
  try {
    analysis = tokenizer.analyze(sql);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    validationLogger.warn('Tokenizer failed', { error: reason });
    result.valid = false;
    result.errors.push(MESSAGES.parseError(reason));
    return result;
  }

  if (!analysis) {
    result.valid = false;
    result.errors.push(MESSAGES.unparsable);
    return result;
  }

  result.formatted = analysis.formatted;

  if (analysis.statementKind !== 'SELECT') {
    result.warnings.push(MESSAGES.nonSelect(analysis.statementKind));
  }

  if (!parenthesesBalanced(analysis.tokens)) {
    result.valid = false;
    result.errors.push(MESSAGES.unbalancedParens);
  }

  // character count, not a lexical scan: escaped quotes ('') can skew it
  const quotes = sql.split("'").length - 1;
  if (quotes % 2 !== 0) {
    result.warnings.push(MESSAGES.oddQuotes);
  }

  const lower = sql.toLowerCase();
  if (lower.includes('select *') || lower.includes('select  *')) {
    result.warnings.push(MESSAGES.selectStar);
  }

  validationLogger.debug('SQL validated', {
    valid: result.valid,
    errors: result.errors.length,
    warnings: result.warnings.length,
  });
  return result;
}
