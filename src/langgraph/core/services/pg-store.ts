import pg from "pg";
import type {
  CatalogProvider,
  RawQueryOutput,
  SchemaCollaborator,
  SqlExecutionCollaborator,
} from "../collaborators/types.js";
import { errorFields, noopLogger, type Logger } from "../../../observability/logger.js";

export type PgQueryResultLike = {
  rows: Record<string, unknown>[];
  fields?: { name: string }[];
};

export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<PgQueryResultLike>;
  release(): void;
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
}

export type PgSqlStoreOptions = {
  schema?: string;
  statementTimeoutMs?: number;
  maxRows?: number;
  logger?: Logger;
};

export function createPgPool(connectionString: string): pg.Pool {
  return new pg.Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000,
  });
}

/**
 * True when `sql` contains a `;` outside quoted literals, quoted identifiers and
 * comments. Dollar-quoted bodies are not recognized, so a `;` inside one counts.
 */
export function hasStatementSeparator(sql: string): boolean {
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === ";") return true;
    if (ch === "'" || ch === '"') {
      // Doubled quotes escape themselves, so a literal ends at an unpaired quote.
      i++;
      while (i < sql.length) {
        if (sql[i] === ch && sql[i + 1] === ch) i += 2;
        else if (sql[i] === ch) break;
        else i++;
      }
      i++;
    } else if (ch === "-" && sql[i + 1] === "-") {
      const end = sql.indexOf("\n", i);
      i = end === -1 ? sql.length : end + 1;
    } else if (ch === "/" && sql[i + 1] === "*") {
      const end = sql.indexOf("*/", i + 2);
      i = end === -1 ? sql.length : end + 2;
    } else {
      i++;
    }
  }
  return false;
}

/**
 * Second line of defense, independent of the pipeline's validator:
 * one statement, starting with SELECT or WITH.
 */
export function assertReadOnlyStatement(sql: string): string {
  const statement = sql.trim().replace(/;\s*$/, "");
  if (!statement) throw new Error("Refusing to execute an empty statement");
  if (hasStatementSeparator(statement)) throw new Error("Refusing to execute multiple statements");
  if (!/^(?:select|with)\b/i.test(statement)) throw new Error("Only SELECT statements can be executed");
  return statement;
}

const COLUMNS_QUERY = `
  SELECT c.table_name, c.column_name, c.data_type, c.is_nullable
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.table_name = c.table_name AND t.table_schema = c.table_schema
  WHERE c.table_schema = $1 AND t.table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY c.table_name, c.ordinal_position
`;

const TABLES_QUERY = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1 AND table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY table_name
`;

/**
 * Postgres-backed schema lookup, table catalog and read-only execution.
 */
export class PgSqlStore implements SchemaCollaborator, SqlExecutionCollaborator, CatalogProvider {
  private readonly schema: string;
  private readonly statementTimeoutMs: number;
  private readonly maxRows: number;
  private readonly logger: Logger;

  constructor(private readonly pool: PgPoolLike, options: PgSqlStoreOptions = {}) {
    this.schema = options.schema ?? "public";
    this.statementTimeoutMs = options.statementTimeoutMs ?? 15000;
    this.maxRows = options.maxRows ?? 1000;
    this.logger = options.logger ?? noopLogger;
  }

  async describeSchema(): Promise<string> {
    const result = await this.withClient((client) => client.query(COLUMNS_QUERY, [this.schema]));
    const tables = new Map<string, string[]>();
    for (const row of result.rows) {
      const table = String(row.table_name);
      const nullable = row.is_nullable === "YES" ? "" : ", not null";
      const columns = tables.get(table) ?? [];
      columns.push(`${String(row.column_name)} (${String(row.data_type)}${nullable})`);
      tables.set(table, columns);
    }
    if (tables.size === 0) return `No tables found in schema '${this.schema}'`;
    return [...tables.entries()].map(([table, columns]) => `Table ${table}: ${columns.join(", ")}`).join("\n");
  }

  async listTables(): Promise<string[]> {
    const result = await this.withClient((client) => client.query(TABLES_QUERY, [this.schema]));
    return result.rows.map((row) => String(row.table_name));
  }

  async execute(sql: string): Promise<RawQueryOutput> {
    const statement = assertReadOnlyStatement(sql);
    const timeout = Math.max(1, Math.floor(this.statementTimeoutMs));

    return this.withClient(async (client) => {
      await client.query("BEGIN READ ONLY");
      try {
        await client.query(`SET LOCAL statement_timeout = ${timeout}`);
        const result = await client.query(statement);
        const columns = result.fields?.map((field) => field.name) ?? Object.keys(result.rows[0] ?? {});
        if (result.rows.length > this.maxRows) {
          this.logger.warn("result truncated", { rows: result.rows.length, maxRows: this.maxRows });
        }
        return { columns, rows: result.rows.slice(0, this.maxRows) };
      } finally {
        await this.rollback(client);
      }
    });
  }

  private async rollback(client: PgClientLike): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (error) {
      this.logger.warn("rollback failed", errorFields(error));
    }
  }

  private async withClient<T>(work: (client: PgClientLike) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }
}
