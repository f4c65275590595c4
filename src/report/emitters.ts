import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { log } from "../shared/logging.js";
import { reportFileName, toReportRows } from "./build.js";
import { formatCsv } from "./csv.js";
import { formatTable } from "./table.js";
import type { AttendanceReport, ReportEmitter } from "./types.js";

/** Writes `attendance_<date>[_labels].csv` into `dir`. */
export function createCsvFileEmitter(dir: string): ReportEmitter & {
  pathFor(report: AttendanceReport): string;
} {
  return {
    name: "csv",
    pathFor(report: AttendanceReport): string {
      return path.join(dir, reportFileName(report));
    },
    async emit(report: AttendanceReport): Promise<void> {
      const target = this.pathFor(report);
      await mkdir(dir, { recursive: true });
      await writeFile(target, formatCsv(toReportRows(report)), "utf8");
      log.info(`Attendance saved to ${target}`);
    },
  };
}

/** Prints the summary line and the report table. */
export function createConsoleEmitter(
  write: (text: string) => void = (text) => process.stdout.write(text)
): ReportEmitter {
  return {
    name: "console",
    async emit(report: AttendanceReport): Promise<void> {
      const required = report.results[0]?.requiredDetections ?? 0;
      const present = report.results.filter((r) => r.present).length;
      write(
        `Total scans: ${report.totalScans}. Threshold: ${Math.round(report.thresholdRatio * 100)}% (${required} detections required). Present: ${present}/${report.results.length}\n\n`
      );
      write(formatTable(toReportRows(report)) + "\n");
    },
  };
}
