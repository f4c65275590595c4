/**
 * SQLite session archive. Use when finished sessions should survive restarts;
 * pass ":memory:" for a throwaway database.
 */

import { type } from "arktype";
import type { SessionLabels } from "../../report/types.js";
import type { SessionArchive } from "./store.js";
import type { ArchivedSession } from "./types.js";

interface SessionRow {
  id: string;
  date: string;
  startedAt: number;
  stoppedAt: number;
  thresholdRatio: number;
  scanIntervalMs: number;
  totalScans: number;
  labels: string;
}

interface ResultRow {
  identifier: string;
  displayName: string;
  detectionCount: number;
  totalScans: number;
  requiredDetections: number;
  present: number;
}

const LabelsSchema = type({
  "semester?": "string",
  "batch?": "string",
  "period?": "string",
});

function parseLabels(raw: string): SessionLabels {
  try {
    const out = LabelsSchema(JSON.parse(raw));
    return out instanceof type.errors ? {} : out;
  } catch {
    return {};
  }
}

export async function createSqliteSessionArchive(dbPath: string): Promise<SessionArchive> {
  const Database = (await import("better-sqlite3")).default;
  const db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      date TEXT NOT NULL,
      startedAt INTEGER NOT NULL,
      stoppedAt INTEGER NOT NULL,
      thresholdRatio REAL NOT NULL,
      scanIntervalMs INTEGER NOT NULL,
      totalScans INTEGER NOT NULL,
      labels TEXT NOT NULL DEFAULT '{}'
    );
    CREATE TABLE IF NOT EXISTS results (
      sessionId TEXT NOT NULL,
      position INTEGER NOT NULL,
      identifier TEXT NOT NULL,
      displayName TEXT NOT NULL,
      detectionCount INTEGER NOT NULL,
      totalScans INTEGER NOT NULL,
      requiredDetections INTEGER NOT NULL,
      present INTEGER NOT NULL,
      PRIMARY KEY (sessionId, position),
      FOREIGN KEY (sessionId) REFERENCES sessions(id)
    );
  `);

  const getSessionRow = db.prepare<[string], SessionRow>(
    "SELECT id, date, startedAt, stoppedAt, thresholdRatio, scanIntervalMs, totalScans, labels FROM sessions WHERE id = ?"
  );
  const listSessionRows = db.prepare<[], SessionRow>(
    "SELECT id, date, startedAt, stoppedAt, thresholdRatio, scanIntervalMs, totalScans, labels FROM sessions ORDER BY stoppedAt DESC"
  );
  const getResultRows = db.prepare<[string], ResultRow>(
    "SELECT identifier, displayName, detectionCount, totalScans, requiredDetections, present FROM results WHERE sessionId = ? ORDER BY position ASC"
  );
  const insertSession = db.prepare<[string, string, number, number, number, number, number, string]>(
    "INSERT OR REPLACE INTO sessions (id, date, startedAt, stoppedAt, thresholdRatio, scanIntervalMs, totalScans, labels) VALUES (?, ?, ?, ?, ?, ?, ?, ?)"
  );
  const insertResult = db.prepare<[string, number, string, string, number, number, number, number]>(
    "INSERT INTO results (sessionId, position, identifier, displayName, detectionCount, totalScans, requiredDetections, present) VALUES (?, ?, ?, ?, ?, ?, ?, ?)"
  );
  const deleteResults = db.prepare<[string]>("DELETE FROM results WHERE sessionId = ?");
  const deleteSession = db.prepare<[string]>("DELETE FROM sessions WHERE id = ?");

  function rowToSession(row: SessionRow): ArchivedSession {
    return {
      id: row.id,
      date: row.date,
      startedAt: row.startedAt,
      stoppedAt: row.stoppedAt,
      thresholdRatio: row.thresholdRatio,
      scanIntervalMs: row.scanIntervalMs,
      totalScans: row.totalScans,
      labels: parseLabels(row.labels),
      results: getResultRows.all(row.id).map((r) => ({
        identifier: r.identifier,
        displayName: r.displayName,
        detectionCount: r.detectionCount,
        totalScans: r.totalScans,
        requiredDetections: r.requiredDetections,
        present: r.present !== 0,
      })),
    };
  }

  const saveTx = db.transaction((session: ArchivedSession) => {
    deleteResults.run(session.id);
    insertSession.run(
      session.id,
      session.date,
      session.startedAt,
      session.stoppedAt,
      session.thresholdRatio,
      session.scanIntervalMs,
      session.totalScans,
      JSON.stringify(session.labels)
    );
    session.results.forEach((r, position) => {
      insertResult.run(
        session.id,
        position,
        r.identifier,
        r.displayName,
        r.detectionCount,
        r.totalScans,
        r.requiredDetections,
        r.present ? 1 : 0
      );
    });
  });

  const deleteTx = db.transaction((id: string): boolean => {
    deleteResults.run(id);
    return deleteSession.run(id).changes > 0;
  });

  return {
    save(session: ArchivedSession): void {
      saveTx(session);
    },

    get(id: string): ArchivedSession | undefined {
      const row = getSessionRow.get(id);
      return row ? rowToSession(row) : undefined;
    },

    list(): ArchivedSession[] {
      return listSessionRows.all().map(rowToSession);
    },

    delete(id: string): boolean {
      return deleteTx(id);
    },

    close(): void {
      db.close();
    },
  };
}
