import type { Classification } from "../core/types.js";
import type { AttendanceReport, ReportRow, SessionLabels } from "./types.js";

export function formatLocalDate(at: Date): string {
  const y = at.getFullYear();
  const m = String(at.getMonth() + 1).padStart(2, "0");
  const d = String(at.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export interface BuildReportInput {
  id: string;
  startedAt: number;
  stoppedAt: number;
  thresholdRatio: number;
  scanIntervalMs: number;
  labels?: SessionLabels;
  classifications: readonly Classification[];
}

export function buildReport(input: BuildReportInput): AttendanceReport {
  const totalScans = input.classifications[0]?.totalScans ?? 0;
  return {
    id: input.id,
    date: formatLocalDate(new Date(input.stoppedAt)),
    startedAt: input.startedAt,
    stoppedAt: input.stoppedAt,
    thresholdRatio: input.thresholdRatio,
    scanIntervalMs: input.scanIntervalMs,
    totalScans,
    labels: { ...input.labels },
    results: input.classifications.map((c) => ({
      identifier: c.identity.identifier,
      displayName: c.identity.displayName,
      detectionCount: c.detectionCount,
      totalScans: c.totalScans,
      requiredDetections: c.requiredDetections,
      present: c.present,
    })),
  };
}

export function toReportRows(report: AttendanceReport): ReportRow[] {
  return report.results.map((r) => ({
    Name: r.displayName,
    "Beacon ID": r.identifier,
    Date: report.date,
    Status: r.present ? "Present" : "Absent",
    "Total Detections": r.detectionCount,
    "Total Scans": r.totalScans,
    "Required Detections": r.requiredDetections,
  }));
}

function slug(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** `attendance_<date>.csv`, with the session labels appended when present. */
export function reportFileName(report: AttendanceReport): string {
  const { semester, batch, period } = report.labels;
  const parts = [semester, batch, period]
    .filter((v): v is string => typeof v === "string" && v.trim() !== "")
    .map(slug)
    .filter(Boolean);
  const suffix = parts.length ? `_${parts.join("_")}` : "";
  return `attendance_${report.date}${suffix}.csv`;
}
