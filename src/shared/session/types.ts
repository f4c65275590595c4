import type { AttendanceReport } from "../../report/types.js";

/** A finished session as kept in the archive. */
export type ArchivedSession = AttendanceReport;

export interface ArchivedSessionSummary {
  id: string;
  date: string;
  startedAt: number;
  stoppedAt: number;
  totalScans: number;
  present: number;
  tracked: number;
}

export function summarize(session: ArchivedSession): ArchivedSessionSummary {
  return {
    id: session.id,
    date: session.date,
    startedAt: session.startedAt,
    stoppedAt: session.stoppedAt,
    totalScans: session.totalScans,
    present: session.results.filter((r) => r.present).length,
    tracked: session.results.length,
  };
}
