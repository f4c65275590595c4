import type { SessionArchive } from "./store.js";
import type { ArchivedSession } from "./types.js";

function clone(session: ArchivedSession): ArchivedSession {
  return {
    ...session,
    labels: { ...session.labels },
    results: session.results.map((r) => ({ ...r })),
  };
}

export function createInMemorySessionArchive(): SessionArchive {
  const sessions = new Map<string, ArchivedSession>();

  return {
    save(session: ArchivedSession): void {
      sessions.set(session.id, clone(session));
    },

    get(id: string): ArchivedSession | undefined {
      const found = sessions.get(id);
      return found ? clone(found) : undefined;
    },

    list(): ArchivedSession[] {
      return Array.from(sessions.values(), clone).sort((a, b) => b.stoppedAt - a.stoppedAt);
    },

    delete(id: string): boolean {
      return sessions.delete(id);
    },

    close(): void {},
  };
}
