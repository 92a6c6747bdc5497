/**
 * Checks generated SQL against the SchemaDescriptor using the Transact-SQL
 * grammar of node-sql-parser.
 */

import { Parser } from 'node-sql-parser';
import { SchemaDescriptor } from '../types';

const PARSE_OPTIONS = { database: 'TransactSQL' };
const STAR = '(.*)';

export interface SchemaCheck {
  isValid: boolean;
  errors: string[];
  tables: string[];
}

function unquote(identifier: string): string {
  return identifier.replace(/^[[\]"`]+|[[\]"`]+$/g, '').toLowerCase();
}

function lastSegment(qualified: string): string {
  const parts = qualified.split('.');
  return unquote(parts[parts.length - 1]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface DefinedNames {
  /** Select-list aliases, which ORDER BY and outer queries may reference. */
  columns: Set<string>;
  /** CTE names, which FROM clauses may reference. */
  tables: Set<string>;
  /** FROM-clause alias to table name. */
  tableAliases: Map<string, string>;
  /** Aliases of subqueries in FROM clauses. */
  derivedTables: Set<string>;
}

/**
 * Collect the names the query defines itself so they are not mistaken for
 * schema references.
 */
function collectDefinedNames(node: unknown, names: DefinedNames): void {
  if (Array.isArray(node)) {
    node.forEach((child) => collectDefinedNames(child, names));
    return;
  }
  if (!isRecord(node)) {
    return;
  }

  if (typeof node.as === 'string' && 'expr' in node) {
    names.columns.add(unquote(node.as));
  } else if (typeof node.as === 'string' && typeof node.table === 'string') {
    names.tableAliases.set(unquote(node.as), lastSegment(node.table));
  }

  if (Array.isArray(node.from)) {
    for (const source of node.from) {
      if (isRecord(source) && typeof source.as === 'string' && typeof source.table !== 'string' && isRecord(source.expr)) {
        names.derivedTables.add(unquote(source.as));
      }
    }
  }

  if (Array.isArray(node.with)) {
    for (const cte of node.with) {
      if (!isRecord(cte)) continue;
      const name = cte.name;
      if (typeof name === 'string') {
        names.tables.add(unquote(name));
      } else if (isRecord(name) && typeof name.value === 'string') {
        names.tables.add(unquote(name.value));
      }
    }
  }

  Object.values(node).forEach((child) => collectDefinedNames(child, names));
}

export class SchemaGuard {
  private readonly parser = new Parser();
  private readonly columnsByTable: Map<string, Set<string>>;
  private readonly allColumns: Set<string>;

  constructor(schema: SchemaDescriptor) {
    this.columnsByTable = new Map();
    this.allColumns = new Set();

    for (const [table, columns] of schema) {
      const names = new Set(columns.map((column) => column.name.toLowerCase()));
      this.columnsByTable.set(table.toLowerCase(), names);
      names.forEach((name) => this.allColumns.add(name));
    }
  }

  check(sql: string): SchemaCheck {
    let parsed: ReturnType<Parser['parse']>;
    try {
      parsed = this.parser.parse(sql, PARSE_OPTIONS);
    } catch (error) {
      return {
        isValid: false,
        errors: [`SQL could not be parsed: ${error instanceof Error ? error.message : 'Unknown error'}`],
        tables: []
      };
    }

    const statements = Array.isArray(parsed.ast) ? parsed.ast : [parsed.ast];
    if (statements.length !== 1 || statements[0].type !== 'select') {
      return { isValid: false, errors: ['Expected exactly one SELECT statement'], tables: [] };
    }

    const defined: DefinedNames = {
      columns: new Set(),
      tables: new Set(),
      tableAliases: new Map(),
      derivedTables: new Set()
    };
    collectDefinedNames(parsed.ast, defined);

    const errors: string[] = [];
    const tables = new Set<string>();

    // Entries look like "select::<schema|null>::<table>"
    for (const entry of parsed.tableList) {
      const table = lastSegment(entry.split('::').slice(2).join('::'));
      if (defined.tables.has(table) || defined.derivedTables.has(table)) continue;
      if (!this.columnsByTable.has(table)) {
        errors.push(`Unknown table: ${table}`);
      } else {
        tables.add(table);
      }
    }

    // Unqualified columns must come from a table the query reads
    const readable = new Set<string>();
    for (const table of tables) {
      this.columnsByTable.get(table)?.forEach((column) => readable.add(column));
    }

    // Entries look like "select::<table|alias|null>::<column>"
    for (const entry of parsed.columnList) {
      const [, qualifier, ...rest] = entry.split('::');
      const column = unquote(rest.join('::'));
      if (column === STAR || defined.columns.has(column)) continue;

      if (!qualifier || qualifier === 'null') {
        if (!readable.has(column)) {
          errors.push(`Unknown column: ${column}`);
        }
        continue;
      }

      const named = lastSegment(qualifier);
      const owner = defined.tableAliases.get(named) ?? named;

      if (defined.tables.has(owner) || defined.derivedTables.has(owner)) {
        // CTE and subquery outputs are built from schema columns or aliases
        if (!this.allColumns.has(column)) {
          errors.push(`Unknown column: ${owner}.${column}`);
        }
        continue;
      }

      if (!tables.has(owner)) {
        // An alias of an unknown table is already reported above
        if (!defined.tableAliases.has(named)) {
          errors.push(`Unknown table or alias: ${named}`);
        }
        continue;
      }

      if (!this.columnsByTable.get(owner)?.has(column)) {
        errors.push(`Unknown column: ${owner}.${column}`);
      }
    }

    return {
      isValid: errors.length === 0,
      errors: Array.from(new Set(errors)),
      tables: Array.from(tables)
    };
  }
}
