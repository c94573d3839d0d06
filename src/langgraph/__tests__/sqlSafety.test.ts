import { jest } from "@jest/globals";
import { SqlSafetyValidator, extractTableNames } from "../core/guards/sql-safety.js";
import type { CatalogProvider } from "../core/collaborators/types.js";

function catalogOf(...tables: string[]) {
  const listTables = jest.fn(async () => tables);
  const provider: CatalogProvider = { listTables };
  return { provider, listTables };
}

describe("extractTableNames", () => {
  it("collects FROM and JOIN targets", () => {
    const sql = "SELECT o.id FROM orders o JOIN customers c ON c.id = o.customer_id LEFT JOIN regions r ON r.id = c.region_id";
    expect(extractTableNames(sql).sort()).toEqual(["customers", "orders", "regions"]);
  });

  it("reduces schema-qualified names to the table name", () => {
    expect(extractTableNames("select * from public.Orders")).toEqual(["orders"]);
  });

  it("skips CTE names and FROM inside EXTRACT", () => {
    const sql =
      "WITH monthly AS (SELECT EXTRACT(MONTH FROM placed_at) AS m FROM orders) SELECT m FROM monthly";
    expect(extractTableNames(sql)).toEqual(["orders"]);
  });

  it("returns nothing for a query without tables", () => {
    expect(extractTableNames("SELECT 1")).toEqual([]);
  });
});

describe("SqlSafetyValidator", () => {
  it("rejects dangerous keywords before anything else", async () => {
    const validator = new SqlSafetyValidator();
    await expect(validator.validate("DROP TABLE customers")).resolves.toEqual({
      ok: false,
      reason: "SQL contains potentially dangerous keyword: DROP",
    });
  });

  it("matches keywords case-insensitively anywhere in the statement", async () => {
    const validator = new SqlSafetyValidator();
    const verdict = await validator.validate("select 1; delete from orders");
    expect(verdict).toEqual({ ok: false, reason: "SQL contains potentially dangerous keyword: DELETE" });
  });

  it("rejects statements that are not SELECT or WITH", async () => {
    const validator = new SqlSafetyValidator();
    await expect(validator.validate("EXPLAIN SELECT 1")).resolves.toEqual({
      ok: false,
      reason: "Only SELECT queries and CTEs (WITH clauses) are allowed",
    });
  });

  it("accepts SELECT and WITH without a catalog", async () => {
    const validator = new SqlSafetyValidator();
    await expect(validator.validate("  select * from anything")).resolves.toEqual({ ok: true, reason: null });
    await expect(validator.validate("WITH t AS (SELECT 1) SELECT * FROM t")).resolves.toEqual({
      ok: true,
      reason: null,
    });
  });

  it("rejects tables missing from the catalog", async () => {
    const { provider } = catalogOf("orders");
    const validator = new SqlSafetyValidator(provider);
    await expect(validator.validate("SELECT * FROM orders JOIN ghosts ON true")).resolves.toEqual({
      ok: false,
      reason: "Table 'ghosts' does not exist in the database",
    });
  });

  it("compares catalog names case-insensitively", async () => {
    const { provider } = catalogOf("Orders");
    const validator = new SqlSafetyValidator(provider);
    await expect(validator.validate("SELECT COUNT(*) FROM ORDERS")).resolves.toEqual({ ok: true, reason: null });
  });

  it("fetches the catalog once per validator instance", async () => {
    const { provider, listTables } = catalogOf("orders");
    const validator = new SqlSafetyValidator(provider);
    await validator.validate("SELECT * FROM orders");
    await validator.validate("SELECT id FROM orders");
    expect(listTables).toHaveBeenCalledTimes(1);
  });

  it("skips the schema gate when the catalog cannot be read", async () => {
    const provider: CatalogProvider = {
      listTables: async () => {
        throw new Error("connection refused");
      },
    };
    const validator = new SqlSafetyValidator(provider);
    await expect(validator.validate("SELECT * FROM ghosts")).resolves.toEqual({ ok: true, reason: null });
    await expect(validator.validate("DROP TABLE ghosts")).resolves.toEqual({
      ok: false,
      reason: "SQL contains potentially dangerous keyword: DROP",
    });
  });

  it("never accepts without a catalog what it rejects on keywords with one", async () => {
    const samples = ["DELETE FROM orders", "UPDATE orders SET total = 0", "SELECT * FROM orders; TRUNCATE orders"];
    const { provider } = catalogOf("orders");
    for (const sql of samples) {
      const withCatalog = await new SqlSafetyValidator(provider).validate(sql);
      const withoutCatalog = await new SqlSafetyValidator().validate(sql);
      expect(withCatalog.ok).toBe(false);
      expect(withoutCatalog).toEqual(withCatalog);
    }
  });

  it("keeps accepting without a catalog what passed with one", async () => {
    const samples = ["SELECT * FROM orders", "WITH x AS (SELECT id FROM orders) SELECT * FROM x"];
    const { provider } = catalogOf("orders");
    for (const sql of samples) {
      expect((await new SqlSafetyValidator(provider).validate(sql)).ok).toBe(true);
      expect((await new SqlSafetyValidator().validate(sql)).ok).toBe(true);
    }
  });
});
