import { format } from 'sql-formatter';
import { validationLogger } from '../utils/logger.js';

export type TokenKind =
  | 'whitespace'
  | 'comment'
  | 'string'
  | 'quoted-identifier'
  | 'number'
  | 'keyword'
  | 'identifier'
  | 'operator'
  | 'punctuation'
  | 'unknown';

export class SqlToken {
  constructor(
    readonly kind: TokenKind,
    readonly text: string,
  ) {}

  /** Kind test, optionally with the exact text (case-insensitive for keywords). */
  matches(kind: TokenKind, text?: string): boolean {
    if (this.kind !== kind) return false;
    if (text === undefined) return true;
    return kind === 'keyword' ? this.text.toUpperCase() === text.toUpperCase() : this.text === text;
  }

  get significant(): boolean {
    return this.kind !== 'whitespace' && this.kind !== 'comment';
  }
}

export interface SqlAnalysis {
  /** Reindented text with uppercase keywords. */
  formatted: string;
  /** Coarse statement type of the first statement, e.g. SELECT, INSERT or UNKNOWN. */
  statementKind: string;
  /** Flattened tokens of the first statement, terminating `;` included. */
  tokens: readonly SqlToken[];
}

/**
 * Collaborator used by validation. `undefined` means the text could not be
 * parsed at all; a thrown error is a fault of the tokenizer itself.
 */
export interface SqlTokenizer {
  analyze(sql: string): SqlAnalysis | undefined;
}

export const STATEMENT_KEYWORDS = [
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'CREATE', 'DROP', 'ALTER', 'TRUNCATE', 'MERGE', 'REPLACE',
];

const CLAUSE_KEYWORDS = [
  'DISTINCT', 'FROM', 'WHERE', 'AND', 'OR', 'NOT', 'IN', 'IS', 'NULL', 'LIKE', 'BETWEEN', 'REGEXP',
  'AS', 'ON', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'GROUP', 'BY', 'HAVING', 'ORDER',
  'ASC', 'DESC', 'LIMIT', 'OFFSET', 'CASE', 'WHEN', 'THEN', 'ELSE', 'END', 'OVER', 'PARTITION', 'WITH',
];

const KEYWORDS = new Set([...STATEMENT_KEYWORDS, ...CLAUSE_KEYWORDS]);

// Order matters: comments before operators, numbers before the `.` punctuation.
// A quote without its closing partner is a lone `unknown` token, so the
// parentheses after it are still counted.
const RULES: [TokenKind, RegExp][] = [
  ['whitespace', /\s+/y],
  ['comment', /--[^\n]*|\/\*[\s\S]*?(?:\*\/|$)/y],
  ['string', /'(?:[^']|'')*'/y],
  ['quoted-identifier', /"(?:[^"]|"")*"|`[^`]*`/y],
  ['number', /\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+/y],
  ['identifier', /[A-Za-z_][\w$]*/y],
  ['operator', /<>|!=|>=|<=|\|\||::|[=<>+\-*/%^~!|&]/y],
  ['punctuation', /[(),;.]/y],
  ['unknown', /[\s\S]/y],
];

export function lexSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let pos = 0;
  while (pos < sql.length) {
    for (const [kind, re] of RULES) {
      re.lastIndex = pos;
      const m = re.exec(sql);
      if (!m) continue;
      const text = m[0];
      const resolved = kind === 'identifier' && KEYWORDS.has(text.toUpperCase()) ? 'keyword' : kind;
      tokens.push(new SqlToken(resolved, text));
      pos += text.length;
      break;
    }
  }
  return tokens;
}

export function firstStatement(tokens: readonly SqlToken[]): SqlToken[] {
  const end = tokens.findIndex((t) => t.matches('punctuation', ';'));
  return end === -1 ? [...tokens] : tokens.slice(0, end + 1);
}

export function statementKind(tokens: readonly SqlToken[]): string {
  const significant = tokens.filter((t) => t.significant);
  const first = significant[0];
  if (!first || first.kind !== 'keyword') return 'UNKNOWN';

  const word = first.text.toUpperCase();
  if (STATEMENT_KEYWORDS.includes(word)) return word;
  if (word !== 'WITH') return 'UNKNOWN';

  // WITH ... resolves to the first statement keyword outside the CTE bodies
  let depth = 0;
  for (const t of significant.slice(1)) {
    if (t.matches('punctuation', '(')) depth++;
    else if (t.matches('punctuation', ')')) depth--;
    else if (depth === 0 && t.kind === 'keyword' && STATEMENT_KEYWORDS.includes(t.text.toUpperCase())) {
      return t.text.toUpperCase();
    }
  }
  return 'UNKNOWN';
}

export class DefaultSqlTokenizer implements SqlTokenizer {
  constructor(private readonly indentWidth = 2) {}

  analyze(sql: string): SqlAnalysis | undefined {
    if (!sql.trim()) return undefined;

    const tokens = lexSql(sql);
    const statement = firstStatement(tokens);
    return {
      formatted: this.format(sql, tokens),
      statementKind: statementKind(statement),
      tokens: statement,
    };
  }

  private format(sql: string, tokens: readonly SqlToken[]): string {
    try {
      return format(sql, { language: 'sql', keywordCase: 'upper', tabWidth: this.indentWidth });
    } catch (error) {
      validationLogger.debug('sql-formatter rejected input, falling back to token output', {
        error: error instanceof Error ? error.message : String(error),
      });
      return tokens.map((t) => (t.kind === 'keyword' ? t.text.toUpperCase() : t.text)).join('');
    }
  }
}
