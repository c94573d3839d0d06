// Text helpers for model output and SQL explanations.

const FENCE_RE = /```(?:sql|json)?\s*([\s\S]*?)```/i;

export function stripSqlFences(text: string): string {
  const fenced = FENCE_RE.exec(text);
  const body = fenced ? fenced[1] : text;
  return body.trim().replace(/;\s*$/, "").trim();
}

/**
 * Pull the first balanced `{...}` object out of a model reply and JSON.parse it.
 * Returns null when nothing parseable is found.
 */
export function extractJsonObject(text: string): unknown {
  const source = FENCE_RE.exec(text)?.[1] ?? text;
  const start = source.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) {
        try {
          return JSON.parse(source.slice(start, i + 1));
        } catch {
          return null;
        }
      }
    }
  }
  return null;
}

type ClauseMatcher = {
  label: string;
  pattern: RegExp;
  explain: (body: string) => string;
};

const CLAUSES: ClauseMatcher[] = [
  {
    label: "SELECT",
    pattern: /\bSELECT\s+([\s\S]+?)\s+FROM\b/i,
    explain: (body) => {
      const upper = body.toUpperCase();
      if (upper.includes("COUNT(")) return "Counts the records that match the criteria.";
      if (upper.includes("SUM(")) return "Adds up the selected values into totals.";
      if (upper.includes("AVG(")) return "Calculates averages for the selected values.";
      if (upper.includes("MAX(") || upper.includes("MIN(")) return "Finds the extreme values of the selected columns.";
      return "Retrieves the listed columns.";
    },
  },
  {
    label: "FROM",
    pattern: /\bFROM\s+([A-Za-z_][\w.]*)/i,
    explain: (body) => `Reads from the ${body} table.`,
  },
  {
    label: "JOIN",
    pattern: /\bJOIN\s+([A-Za-z_][\w.]*)/i,
    explain: (body) => `Combines rows with the ${body} table.`,
  },
  {
    label: "WHERE",
    pattern: /\bWHERE\s+([\s\S]+?)(?=\s+(?:GROUP\s+BY|ORDER\s+BY|HAVING|LIMIT)\b|$)/i,
    explain: () => "Keeps only the rows that satisfy the filter.",
  },
  {
    label: "GROUP BY",
    pattern: /\bGROUP\s+BY\s+([\s\S]+?)(?=\s+(?:ORDER\s+BY|HAVING|LIMIT)\b|$)/i,
    explain: (body) => `Groups the rows by ${body}.`,
  },
  {
    label: "ORDER BY",
    pattern: /\bORDER\s+BY\s+([\s\S]+?)(?=\s+LIMIT\b|$)/i,
    explain: (body) => (/\bDESC\b/i.test(body) ? "Sorts the results from highest to lowest." : "Sorts the results."),
  },
  {
    label: "LIMIT",
    pattern: /\bLIMIT\s+(\d+)/i,
    explain: (body) => `Returns at most ${body} rows.`,
  },
];

/**
 * Clause-by-clause markdown explanation of a query, used when no model summary is available.
 */
export function describeSqlClauses(sql: string, executed: boolean): string {
  const flat = sql.replace(/\s+/g, " ").trim();
  const lines = [
    "**Explanation of the Query**",
    "",
    "| Clause | Code | Explanation |",
    "|--------|------|-------------|",
  ];

  let step = 1;
  for (const clause of CLAUSES) {
    const match = clause.pattern.exec(flat);
    if (!match) continue;
    const body = match[1].trim();
    lines.push(`| ${step}. ${clause.label} | ${clause.label} ${body} | ${clause.explain(body)} |`);
    step++;
  }
  if (step === 1) lines.push(`| 1. QUERY | ${flat} | Runs the query as written. |`);

  lines.push("", `**Execution Status:** ${executed ? "Successfully executed" : "Failed to execute"}`);
  return lines.join("\n");
}
