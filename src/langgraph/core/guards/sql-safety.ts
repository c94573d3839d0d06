import type { CatalogProvider } from "../collaborators/types.js";
import { errorFields, noopLogger, type Logger } from "../../../observability/logger.js";

export type SqlValidation = { ok: true; reason: null } | { ok: false; reason: string };

export const DANGEROUS_KEYWORDS = ["DROP", "DELETE", "UPDATE", "INSERT", "ALTER", "CREATE", "TRUNCATE"] as const;

const ALLOWED_PREFIXES = ["SELECT", "WITH"] as const;

const TABLE_PATTERNS: RegExp[] = [
  /\bfrom\s+((?:[a-z_][a-z0-9_]*\.)?[a-z_][a-z0-9_]*)\b/g,
  /\bjoin\s+((?:[a-z_][a-z0-9_]*\.)?[a-z_][a-z0-9_]*)\b/g,
  /\binner\s+join\s+((?:[a-z_][a-z0-9_]*\.)?[a-z_][a-z0-9_]*)\b/g,
  /\bleft\s+join\s+((?:[a-z_][a-z0-9_]*\.)?[a-z_][a-z0-9_]*)\b/g,
  /\bright\s+join\s+((?:[a-z_][a-z0-9_]*\.)?[a-z_][a-z0-9_]*)\b/g,
];

const NON_TABLE_WORDS = new Set([
  "select", "from", "where", "group", "order", "by", "having", "union", "with", "as",
  "lateral", "unnest", "generate_series",
]);

// FROM inside these calls names a column or string, not a table.
const FROM_ARGUMENT_CALL_RE = /\b(?:extract|substring|trim|overlay|position)\s*\([^()]*\)/g;

const CTE_NAME_RE = /(?:\bwith\s+(?:recursive\s+)?|,\s*)([a-z_][a-z0-9_]*)\s*(?:\([^)]*\)\s*)?as\s*\(/g;

/**
 * Table identifiers referenced after FROM/JOIN, lowercased, minus keywords and CTE names.
 */
export function extractTableNames(sql: string): string[] {
  const lower = sql.replace(/\s+/g, " ").trim().toLowerCase().replace(FROM_ARGUMENT_CALL_RE, " ");
  const cteNames = new Set<string>();
  for (const match of lower.matchAll(CTE_NAME_RE)) cteNames.add(match[1]);

  const found = new Set<string>();
  for (const pattern of TABLE_PATTERNS) {
    for (const match of lower.matchAll(pattern)) {
      // Schema-qualified references are checked by their bare table name.
      const name = match[1].slice(match[1].lastIndexOf(".") + 1);
      if (NON_TABLE_WORDS.has(name) || cteNames.has(name)) continue;
      found.add(name);
    }
  }
  return [...found];
}

/**
 * Read-only gate for generated SQL. One instance per turn: the table catalog
 * is fetched at most once and reused for every `validate` call on it.
 */
export class SqlSafetyValidator {
  private catalog: Promise<Set<string> | null> | null = null;

  constructor(
    private readonly catalogProvider: CatalogProvider | null = null,
    private readonly logger: Logger = noopLogger
  ) {}

  async validate(sql: string): Promise<SqlValidation> {
    const upper = sql.toUpperCase();

    for (const keyword of DANGEROUS_KEYWORDS) {
      if (upper.includes(keyword)) {
        return { ok: false, reason: `SQL contains potentially dangerous keyword: ${keyword}` };
      }
    }

    const trimmed = upper.trim();
    if (!ALLOWED_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
      return { ok: false, reason: "Only SELECT queries and CTEs (WITH clauses) are allowed" };
    }

    const tables = await this.loadCatalog();
    if (!tables || tables.size === 0) return { ok: true, reason: null };

    const referenced = extractTableNames(sql);
    for (const table of referenced) {
      if (!tables.has(table)) {
        return { ok: false, reason: `Table '${table}' does not exist in the database` };
      }
    }
    // No extractable tables (nested CTEs, subqueries): accept rather than reject a query we cannot parse.
    return { ok: true, reason: null };
  }

  private loadCatalog(): Promise<Set<string> | null> {
    if (!this.catalog) this.catalog = this.fetchCatalog();
    return this.catalog;
  }

  private async fetchCatalog(): Promise<Set<string> | null> {
    if (!this.catalogProvider) return null;
    try {
      const names = await this.catalogProvider.listTables();
      return new Set(names.map((name) => name.toLowerCase()));
    } catch (error) {
      // Catalog unavailable: keyword and shape gates still apply.
      this.logger.warn("catalog lookup failed, schema gate skipped", errorFields(error));
      return null;
    }
  }
}
