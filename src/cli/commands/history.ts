import { writeFile } from "node:fs/promises";
import { toReportRows } from "../../report/build.js";
import { formatCsv } from "../../report/csv.js";
import { formatTable } from "../../report/table.js";
import { validated } from "../../shared/assert.js";
import { InvalidConfigurationError } from "../../shared/errors.js";
import { log } from "../../shared/logging.js";
import { summarize, type SessionArchive } from "../../shared/session/index.js";
import { loadContext, openArchive } from "../context.js";
import { GlobalOptions, parseGlobalOptions } from "../utils.js";

const ListOptions = GlobalOptions.and({ "json?": "boolean" });
const ExportOptions = GlobalOptions.and({ "out?": "string" });

async function withArchive<T>(raw: unknown, fn: (archive: SessionArchive) => Promise<T>): Promise<T> {
  const opts = parseGlobalOptions(raw);
  const archive = await openArchive(await loadContext(opts));
  try {
    return await fn(archive);
  } finally {
    archive.close();
  }
}

export async function runHistoryList(raw: unknown): Promise<void> {
  const opts = validated(ListOptions(raw), "options");
  await withArchive(opts, async (archive) => {
    const summaries = archive.list().map(summarize);
    if (opts.json) {
      process.stdout.write(JSON.stringify(summaries, null, 2) + "\n");
      return;
    }
    if (summaries.length === 0) {
      process.stderr.write("No archived sessions.\n");
      return;
    }
    for (const s of summaries) {
      process.stdout.write(`${s.id}  ${s.date}  scans=${s.totalScans}  present=${s.present}/${s.tracked}\n`);
    }
  });
}

export async function runHistoryShow(id: string, raw: unknown): Promise<void> {
  await withArchive(raw, async (archive) => {
    const session = archive.get(id);
    if (!session) throw new InvalidConfigurationError(`No archived session ${id}`);
    process.stdout.write(formatTable(toReportRows(session)) + "\n");
  });
}

export async function runHistoryExport(id: string, raw: unknown): Promise<void> {
  const opts = validated(ExportOptions(raw), "options");
  await withArchive(opts, async (archive) => {
    const session = archive.get(id);
    if (!session) throw new InvalidConfigurationError(`No archived session ${id}`);
    const csv = formatCsv(toReportRows(session));
    if (opts.out) {
      await writeFile(opts.out, csv, "utf8");
      log.info(`Exported ${id} to ${opts.out}`);
    } else {
      process.stdout.write(csv);
    }
  });
}

export function deleteArchivedSession(archive: SessionArchive, id: string): void {
  if (!archive.delete(id)) throw new InvalidConfigurationError(`No archived session ${id}`);
  log.info(`Deleted archived session ${id}`);
}

export async function runHistoryDelete(id: string, raw: unknown): Promise<void> {
  await withArchive(raw, async (archive) => deleteArchivedSession(archive, id));
}
