import { REPORT_COLUMNS, type ReportRow } from "./types.js";

function escapeCell(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function formatCsv(rows: readonly ReportRow[]): string {
  const lines = [REPORT_COLUMNS.map(escapeCell).join(",")];
  for (const row of rows) {
    lines.push(REPORT_COLUMNS.map((column) => escapeCell(row[column])).join(","));
  }
  return lines.join("\n") + "\n";
}
