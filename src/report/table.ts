import { REPORT_COLUMNS, type ReportRow } from "./types.js";

/** Fixed-width text table: text columns left-aligned, counts right-aligned. */
export function formatTable(rows: readonly ReportRow[]): string {
  const widths = REPORT_COLUMNS.map((column) =>
    Math.max(column.length, ...rows.map((row) => String(row[column]).length))
  );
  const cell = (value: string | number, i: number) =>
    typeof value === "number" ? String(value).padStart(widths[i]) : value.padEnd(widths[i]);

  const header = REPORT_COLUMNS.map((column, i) => column.padEnd(widths[i])).join("  ");
  const body = rows.map((row) =>
    REPORT_COLUMNS.map((column, i) => cell(row[column], i)).join("  ").trimEnd()
  );
  return [header.trimEnd(), ...body].join("\n");
}
