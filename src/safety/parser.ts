/**
 * Lexical SQL analysis used by the read-only validator. Works on the raw text
 * so it can reject statements the AST parser would not even accept.
 */

export interface StatementAnalysis {
  /** SQL with comments removed and literals/quoted identifiers blanked. */
  normalized: string;
  statements: string[];
  leadingKeyword: string | null;
  mutationKeywords: string[];
}

export const MUTATION_KEYWORDS = [
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'TRUNCATE',
  'MERGE', 'CREATE', 'EXEC', 'EXECUTE', 'GRANT', 'REVOKE'
] as const;

// Literals, quoted identifiers and comments, matched left to right so a
// comment marker inside a literal stays part of the literal.
const SQL_TOKEN = /N?'(?:[^']|'')*'|\[[^\]]*\]|"(?:[^"]|"")*"|--[^\r\n]*|\/\*[\s\S]*?\*\//g;

function isComment(token: string): boolean {
  return token.startsWith('--') || token.startsWith('/*');
}

export class QueryParser {

  static analyze(query: string): StatementAnalysis {
    const normalized = this.normalize(query);
    const statements = normalized
      .split(';')
      .map((statement) => statement.trim())
      .filter((statement) => statement.length > 0);

    const leading = /^\s*\(*\s*([a-zA-Z]+)/.exec(normalized);

    return {
      normalized,
      statements,
      leadingKeyword: leading ? leading[1].toUpperCase() : null,
      mutationKeywords: this.findMutationKeywords(normalized)
    };
  }

  /**
   * Blank out comments, string literals and quoted identifiers so a value
   * such as 'Deleted' or a column [Update] is not read as a keyword.
   */
  static normalize(query: string): string {
    return query
      .replace(SQL_TOKEN, (token) => {
        if (isComment(token)) return ' ';
        if (token.startsWith('[')) return '[_]';
        if (token.startsWith('"')) return '"_"';
        return "''";
      })
      .trim();
  }

  /** Drop comments only; literals and quoted identifiers are kept as written. */
  static stripComments(query: string): string {
    return query.replace(SQL_TOKEN, (token) => (isComment(token) ? ' ' : token));
  }

  private static findMutationKeywords(normalized: string): string[] {
    const found: string[] = [];
    for (const keyword of MUTATION_KEYWORDS) {
      if (new RegExp(`\\b${keyword}\\b`, 'i').test(normalized)) {
        found.push(keyword);
      }
    }
    return found;
  }
}
