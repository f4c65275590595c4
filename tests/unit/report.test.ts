import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import {
  buildReport,
  formatLocalDate,
  reportFileName,
  toReportRows,
} from "../../src/report/build.js";
import { formatCsv } from "../../src/report/csv.js";
import { createConsoleEmitter, createCsvFileEmitter } from "../../src/report/emitters.js";
import { formatTable } from "../../src/report/table.js";
import { sampleReport } from "../helpers/reports.js";

describe("buildReport", () => {
  it("flattens classifications and dates the report by its stop time", () => {
    const stoppedAt = new Date(2026, 0, 5, 23, 59).getTime();
    const report = buildReport({
      id: "sess-1",
      startedAt: stoppedAt - 60_000,
      stoppedAt,
      thresholdRatio: 0.5,
      scanIntervalMs: 5_000,
      classifications: [
        {
          identity: { identifier: "AA:BB:CC:DD:EE:01", displayName: "Ada" },
          detectionCount: 2,
          totalScans: 3,
          requiredDetections: 2,
          present: true,
        },
      ],
    });
    expect(report.date).toBe("2026-01-05");
    expect(report.totalScans).toBe(3);
    expect(report.labels).toEqual({});
    expect(report.results).toEqual([
      {
        identifier: "AA:BB:CC:DD:EE:01",
        displayName: "Ada",
        detectionCount: 2,
        totalScans: 3,
        requiredDetections: 2,
        present: true,
      },
    ]);
  });

  it("has zero scans when nothing was tracked", () => {
    const report = buildReport({
      id: "sess-2",
      startedAt: 0,
      stoppedAt: 0,
      thresholdRatio: 0.8,
      scanIntervalMs: 5_000,
      classifications: [],
    });
    expect(report.totalScans).toBe(0);
    expect(report.results).toEqual([]);
  });
});

describe("formatLocalDate", () => {
  it("zero-pads month and day", () => {
    expect(formatLocalDate(new Date(2026, 8, 3))).toBe("2026-09-03");
  });
});

describe("toReportRows", () => {
  it("maps results to report columns", () => {
    expect(toReportRows(sampleReport())).toEqual([
      {
        Name: "Ada",
        "Beacon ID": "AA:BB:CC:DD:EE:01",
        Date: "2026-03-09",
        Status: "Present",
        "Total Detections": 3,
        "Total Scans": 4,
        "Required Detections": 3,
      },
      {
        Name: "Linus",
        "Beacon ID": "AA:BB:CC:DD:EE:03",
        Date: "2026-03-09",
        Status: "Absent",
        "Total Detections": 1,
        "Total Scans": 4,
        "Required Detections": 3,
      },
    ]);
  });
});

describe("formatCsv", () => {
  it("writes a header and one line per identity", () => {
    expect(formatCsv(toReportRows(sampleReport()))).toBe(
      "Name,Beacon ID,Date,Status,Total Detections,Total Scans,Required Detections\n" +
        "Ada,AA:BB:CC:DD:EE:01,2026-03-09,Present,3,4,3\n" +
        "Linus,AA:BB:CC:DD:EE:03,2026-03-09,Absent,1,4,3\n"
    );
  });

  it("quotes cells with commas and quotes", () => {
    const report = sampleReport();
    report.results = [{ ...report.results[0], displayName: 'Lovelace, Ada "AL"' }];
    const [, line] = formatCsv(toReportRows(report)).split("\n");
    expect(line).toBe('"Lovelace, Ada ""AL""",AA:BB:CC:DD:EE:01,2026-03-09,Present,3,4,3');
  });

  it("writes only the header for an empty session", () => {
    expect(formatCsv([])).toBe(
      "Name,Beacon ID,Date,Status,Total Detections,Total Scans,Required Detections\n"
    );
  });
});

describe("formatTable", () => {
  it("aligns text left and counts right", () => {
    expect(formatTable(toReportRows(sampleReport())).split("\n")).toEqual([
      "Name   Beacon ID          Date        Status   Total Detections  Total Scans  Required Detections",
      "Ada    AA:BB:CC:DD:EE:01  2026-03-09  Present                 3            4                    3",
      "Linus  AA:BB:CC:DD:EE:03  2026-03-09  Absent                  1            4                    3",
    ]);
  });
});

describe("reportFileName", () => {
  it("is dated", () => {
    expect(reportFileName(sampleReport())).toBe("attendance_2026-03-09.csv");
  });

  it("appends the non-empty labels", () => {
    const report = sampleReport({ labels: { semester: "Fall 2026", batch: "B/1", period: " " } });
    expect(reportFileName(report)).toBe("attendance_2026-03-09_fall-2026_b-1.csv");
  });
});

describe("emitters", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes the CSV file named after the report", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "rollcall-report-"));
    const target = path.join(dir, "reports");
    const emitter = createCsvFileEmitter(target);
    const report = sampleReport({ labels: { period: "3" } });

    await emitter.emit(report);
    const file = path.join(target, "attendance_2026-03-09_3.csv");
    expect(emitter.pathFor(report)).toBe(file);
    expect(await readFile(file, "utf8")).toBe(formatCsv(toReportRows(report)));
  });

  it("prints the summary and the table", async () => {
    const out: string[] = [];
    await createConsoleEmitter((text) => out.push(text)).emit(sampleReport());
    expect(out[0]).toBe(
      "Total scans: 4. Threshold: 75% (3 detections required). Present: 1/2\n\n"
    );
    expect(out[1]).toBe(formatTable(toReportRows(sampleReport())) + "\n");
  });
});
