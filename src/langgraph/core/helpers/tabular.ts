import type { CellValue, PiiFinding, TabularResult } from "../../state.js";
import type { PiiRedactor, RawQueryOutput, RawRecord } from "../collaborators/types.js";

const SCALAR_COLUMN = "value";

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString("base64");
  return JSON.stringify(value) ?? String(value);
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isTuple(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function fromRecords(records: RawRecord[], columns?: string[]): TabularResult {
  const cols = columns ?? collectColumns(records);
  const rows = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const col of cols) row[col] = toCellValue(record[col]);
    return row;
  });
  return { columns: cols, rows, shape: [rows.length, cols.length] };
}

function fromPositional(values: unknown[][], columns: string[]): TabularResult {
  const rows = values.map((tuple) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((col, i) => {
      row[col] = toCellValue(tuple[i]);
    });
    return row;
  });
  return { columns, rows, shape: [rows.length, columns.length] };
}

function collectColumns(records: RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

function scalar(value: unknown): TabularResult {
  return { columns: [SCALAR_COLUMN], rows: [{ [SCALAR_COLUMN]: toCellValue(value) }], shape: [1, 1] };
}

function fromList(values: unknown[], columns?: string[]): TabularResult {
  if (values.length === 0) return { columns: columns ?? [], rows: [], shape: [0, columns?.length ?? 0] };
  if (values.every(isRecord)) return fromRecords(values.filter(isRecord), columns);
  if (values.every(isTuple)) {
    const tuples = values.filter(isTuple);
    const width = tuples.reduce((widest, tuple) => Math.max(widest, tuple.length), 0);
    const cols = columns ?? Array.from({ length: width }, (_, i) => `column_${i + 1}`);
    return fromPositional(tuples, cols);
  }
  // Bare list of scalars: one row per value.
  const rows = values.map((value) => ({ [SCALAR_COLUMN]: toCellValue(value) }));
  return { columns: [SCALAR_COLUMN], rows, shape: [rows.length, 1] };
}

/**
 * Reduce whatever the execution collaborator returned to a single tabular shape.
 * `null`/`undefined` mean "no result"; scalars become a one-cell table.
 */
export function normalizeExecutionResult(raw: RawQueryOutput): TabularResult | null {
  if (raw === null || raw === undefined) return null;
  if (Array.isArray(raw)) return fromList(raw);
  if (typeof raw === "object") return fromList(raw.rows, raw.columns);
  return scalar(raw);
}

export function hasRows(result: TabularResult | null): boolean {
  return result !== null && result.rows.length > 0;
}

/**
 * Run every string cell through the redactor. Findings are grouped by column.
 */
export function redactTabularResult(
  result: TabularResult,
  redactor: PiiRedactor
): { result: TabularResult; findings: Record<string, PiiFinding[]> } {
  const findings: Record<string, PiiFinding[]> = {};
  const rows = result.rows.map((row) => {
    const next: Record<string, CellValue> = {};
    for (const [col, value] of Object.entries(row)) {
      if (typeof value !== "string") {
        next[col] = value;
        continue;
      }
      const outcome = redactor.redact(value);
      next[col] = outcome.value;
      if (outcome.findings.length > 0) {
        findings[col] = [...(findings[col] ?? []), ...outcome.findings];
      }
    }
    return next;
  });
  return { result: { ...result, rows }, findings };
}

/**
 * Plain-text preview used in model prompts: header line plus up to `limit` rows.
 */
export function formatResultPreview(result: TabularResult | null, limit = 10): string {
  if (!result) return "(no result)";
  if (result.rows.length === 0) return `${result.columns.join(" | ")}\n(0 rows)`;
  const lines = [result.columns.join(" | ")];
  for (const row of result.rows.slice(0, limit)) {
    lines.push(result.columns.map((col) => formatCell(row[col])).join(" | "));
  }
  if (result.rows.length > limit) lines.push(`... (${result.rows.length - limit} more rows)`);
  return lines.join("\n");
}

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "NULL";
  return String(value);
}
