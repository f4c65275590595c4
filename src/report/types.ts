/** Optional class context a session is run under. */
export interface SessionLabels {
  semester?: string;
  batch?: string;
  period?: string;
}

/** A Classification flattened for storage and reporting. */
export interface ClassificationRecord {
  identifier: string;
  displayName: string;
  detectionCount: number;
  totalScans: number;
  requiredDetections: number;
  present: boolean;
}

/** Everything known about a finished session. */
export interface AttendanceReport {
  id: string;
  /** Local calendar date the session stopped on, YYYY-MM-DD. */
  date: string;
  startedAt: number;
  stoppedAt: number;
  thresholdRatio: number;
  scanIntervalMs: number;
  totalScans: number;
  labels: SessionLabels;
  results: ClassificationRecord[];
}

export const REPORT_COLUMNS = [
  "Name",
  "Beacon ID",
  "Date",
  "Status",
  "Total Detections",
  "Total Scans",
  "Required Detections",
] as const;

export type ReportRow = {
  Name: string;
  "Beacon ID": string;
  Date: string;
  Status: "Present" | "Absent";
  "Total Detections": number;
  "Total Scans": number;
  "Required Detections": number;
};

export interface ReportEmitter {
  readonly name: string;
  emit(report: AttendanceReport): Promise<void>;
}
