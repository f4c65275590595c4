import chalk from "chalk";
import { resolveRunSettings } from "../../config.js";
import type { AttendanceReport } from "../../report/types.js";
import { validated } from "../../shared/assert.js";
import { EXIT, exit } from "../../shared/errors.js";
import { log } from "../../shared/logging.js";
import type { AttendanceController } from "../../runner/controller.js";
import { createRuntime, loadContext } from "../context.js";
import { GlobalOptions, parsePositiveInt } from "../utils.js";

export const SessionOptions = GlobalOptions.and({
  "threshold?": "string",
  "interval?": "string",
  "scanDuration?": "string",
  "discovery?": "string",
  "reportDir?": "string",
});

const RunOptions = SessionOptions.and({
  "scans?": "string",
  "duration?": "string",
  "semester?": "string",
  "batch?": "string",
  "period?": "string",
  "csv?": "boolean",
});

/**
 * SIGINT/SIGTERM handler: stops the running session and settles the run with
 * its report. A signal that arrives while a scan or time limit is already
 * stopping the session is ignored; that stop settles the run instead.
 */
export function stopOnSignal(
  controller: Pick<AttendanceController, "isRunning" | "stop">,
  finish: (report: AttendanceReport) => void,
  fail: (err: unknown) => void
): () => void {
  return () => {
    if (!controller.isRunning) {
      log.info("Session is already stopping. Waiting for the report...");
      return;
    }
    log.info("Stop requested. Finalizing results...");
    controller.stop().then(finish, fail);
  };
}

export async function runSession(raw: unknown): Promise<void> {
  const opts = validated(RunOptions(raw), "options");
  const ctx = await loadContext(opts);
  const settings = resolveRunSettings(opts, ctx.config);
  const maxScans = parsePositiveInt(opts.scans, "--scans");
  const maxDurationMs = parsePositiveInt(opts.duration, "--duration");

  let finish: (report: AttendanceReport) => void = () => {};
  let fail: (err: unknown) => void = () => {};
  const finished = new Promise<AttendanceReport>((resolve, reject) => {
    finish = resolve;
    fail = reject;
  });

  const runtime = await createRuntime(ctx, settings, {
    csv: opts.csv !== false,
    console: true,
    onAutoStop: (report) => finish(report),
  });

  const onSignal = stopOnSignal(runtime.controller, finish, fail);

  process.stderr.write("\n" + chalk.bold("rollcall") + "\n");
  process.stderr.write(`Discovery:   ${settings.discovery}\n`);
  process.stderr.write(`Identities:  ${ctx.registry.size}\n`);
  process.stderr.write(`Threshold:   ${Math.round(settings.thresholdRatio * 100)}% of total scans\n`);
  process.stderr.write(`Interval:    ${settings.scanIntervalMs} ms\n`);
  process.stderr.write(
    maxScans || maxDurationMs ? "Stops on its own, or press Ctrl+C.\n\n" : "Press Ctrl+C to stop and write the report.\n\n"
  );

  try {
    await runtime.controller.start({
      thresholdRatio: settings.thresholdRatio,
      scanIntervalMs: settings.scanIntervalMs,
      maxScans,
      maxDurationMs,
      labels: { semester: opts.semester, batch: opts.batch, period: opts.period },
    });
  } catch (err) {
    await runtime.close();
    throw err;
  }
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const report = await finished;
    log.info(`Session ${report.id} archived`);
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await runtime.close();
  }
  // The BLE binding keeps the event loop alive.
  exit(EXIT.SUCCESS);
}
