import { PgSqlStore, assertReadOnlyStatement, hasStatementSeparator, type PgClientLike, type PgPoolLike, type PgQueryResultLike } from "../core/services/pg-store.js";

type Responder = (text: string, values?: unknown[]) => PgQueryResultLike;

class FakePool implements PgPoolLike {
  readonly statements: { text: string; values?: unknown[] }[] = [];
  released = 0;

  constructor(private readonly respond: Responder) {}

  async connect(): Promise<PgClientLike> {
    return {
      query: async (text, values) => {
        this.statements.push({ text, values });
        return this.respond(text, values);
      },
      release: () => {
        this.released++;
      },
    };
  }
}

const EMPTY: PgQueryResultLike = { rows: [] };

describe("assertReadOnlyStatement", () => {
  it("accepts a single SELECT or WITH and drops the trailing semicolon", () => {
    expect(assertReadOnlyStatement(" SELECT 1; ")).toBe("SELECT 1");
    expect(assertReadOnlyStatement("with t as (select 1) select * from t")).toBe("with t as (select 1) select * from t");
  });

  it("accepts semicolons inside literals, quoted identifiers and comments", () => {
    expect(assertReadOnlyStatement("SELECT * FROM notes WHERE note = 'a;b';")).toBe(
      "SELECT * FROM notes WHERE note = 'a;b'"
    );
    expect(assertReadOnlyStatement(`SELECT "odd;name", 'it''s; fine' FROM t`)).toBe(
      `SELECT "odd;name", 'it''s; fine' FROM t`
    );
    expect(assertReadOnlyStatement("SELECT 1 -- first; second\nFROM t /* a; b */")).toBe(
      "SELECT 1 -- first; second\nFROM t /* a; b */"
    );
  });

  it("finds separators after a closed literal", () => {
    expect(hasStatementSeparator("SELECT 'a;b'")).toBe(false);
    expect(hasStatementSeparator("SELECT 'a''b'; DROP TABLE t")).toBe(true);
    expect(() => assertReadOnlyStatement("SELECT 'x'; DELETE FROM t")).toThrow("Refusing to execute multiple statements");
  });

  it("refuses anything else", () => {
    expect(() => assertReadOnlyStatement("  ")).toThrow("Refusing to execute an empty statement");
    expect(() => assertReadOnlyStatement("SELECT 1; SELECT 2")).toThrow("Refusing to execute multiple statements");
    expect(() => assertReadOnlyStatement("VACUUM")).toThrow("Only SELECT statements can be executed");
  });
});

describe("PgSqlStore", () => {
  it("describes the schema one table per line", async () => {
    const pool = new FakePool(() => ({
      rows: [
        { table_name: "orders", column_name: "id", data_type: "integer", is_nullable: "NO" },
        { table_name: "orders", column_name: "total", data_type: "numeric", is_nullable: "YES" },
        { table_name: "regions", column_name: "name", data_type: "text", is_nullable: "YES" },
      ],
    }));
    const store = new PgSqlStore(pool, { schema: "sales" });

    await expect(store.describeSchema()).resolves.toBe(
      "Table orders: id (integer, not null), total (numeric)\nTable regions: name (text)"
    );
    expect(pool.statements[0].values).toEqual(["sales"]);
    expect(pool.released).toBe(1);
  });

  it("reports an empty schema", async () => {
    const store = new PgSqlStore(new FakePool(() => EMPTY));
    await expect(store.describeSchema()).resolves.toBe("No tables found in schema 'public'");
  });

  it("lists table names", async () => {
    const store = new PgSqlStore(new FakePool(() => ({ rows: [{ table_name: "orders" }, { table_name: "regions" }] })));
    await expect(store.listTables()).resolves.toEqual(["orders", "regions"]);
  });

  it("runs queries in a read-only transaction with a timeout and row cap", async () => {
    const pool = new FakePool((text) =>
      text.startsWith("SELECT id")
        ? { rows: [{ id: 1 }, { id: 2 }, { id: 3 }], fields: [{ name: "id" }] }
        : EMPTY
    );
    const store = new PgSqlStore(pool, { statementTimeoutMs: 5000, maxRows: 2 });

    await expect(store.execute("SELECT id FROM orders;")).resolves.toEqual({ columns: ["id"], rows: [{ id: 1 }, { id: 2 }] });
    expect(pool.statements.map((s) => s.text)).toEqual([
      "BEGIN READ ONLY",
      "SET LOCAL statement_timeout = 5000",
      "SELECT id FROM orders",
      "ROLLBACK",
    ]);
    expect(pool.released).toBe(1);
  });

  it("rolls back and releases the client when the query fails", async () => {
    const pool = new FakePool((text) => {
      if (text.startsWith("SELECT")) throw new Error("column \"bad\" does not exist");
      return EMPTY;
    });
    const store = new PgSqlStore(pool);

    await expect(store.execute("SELECT bad FROM orders")).rejects.toThrow("column \"bad\" does not exist");
    expect(pool.statements.map((s) => s.text)).toContain("ROLLBACK");
    expect(pool.released).toBe(1);
  });

  it("refuses write statements before connecting", async () => {
    const pool = new FakePool(() => EMPTY);
    await expect(new PgSqlStore(pool).execute("UPDATE orders SET total = 0")).rejects.toThrow(
      "Only SELECT statements can be executed"
    );
    expect(pool.statements).toHaveLength(0);
  });
});
