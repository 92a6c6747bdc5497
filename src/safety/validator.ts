import { QueryParser } from './parser';

export interface SafetyValidation {
  isValid: boolean;
  errors: string[];
}

/**
 * Query Validator - keeps generated SQL on the read path
 */
export class QueryValidator {

  /**
   * A statement is accepted only if it is a single SELECT (or CTE feeding a
   * SELECT) and contains no mutating keyword anywhere outside literals.
   */
  static validateReadOnly(query: string): SafetyValidation {
    const errors: string[] = [];
    const analysis = QueryParser.analyze(query);

    if (analysis.statements.length === 0) {
      return { isValid: false, errors: ['Query is empty'] };
    }

    if (analysis.statements.length > 1) {
      errors.push('Multiple SQL statements are not allowed');
    }

    if (analysis.leadingKeyword !== 'SELECT' && analysis.leadingKeyword !== 'WITH') {
      errors.push('Only SELECT queries are allowed for data analysis');
    }

    for (const keyword of analysis.mutationKeywords) {
      errors.push(`${keyword} operations are not allowed`);
    }

    if (/\bxp_cmdshell\b|\bsp_executesql\b/i.test(analysis.normalized)) {
      errors.push('Dynamic SQL execution is not allowed');
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /**
   * Remove comments and stray semicolons the model tends to append
   */
  static sanitizeQuery(query: string): string {
    return QueryParser.stripComments(query)
      // Drop trailing semicolons
      .replace(/;+\s*$/, '')
      .trim();
  }
}
