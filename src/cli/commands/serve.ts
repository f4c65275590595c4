import { resolveRunSettings } from "../../config.js";
import { DEFAULT_LISTEN } from "../../shared/constants.js";
import { getEnv } from "../../shared/env.js";
import { validated } from "../../shared/assert.js";
import { EXIT, exit } from "../../shared/errors.js";
import { log } from "../../shared/logging.js";
import { parseListen } from "../../shared/net.js";
import { createControlApp, startControlServer } from "../../server/server.js";
import { createRuntime, loadContext } from "../context.js";
import { getPackageJsonVersion } from "../utils.js";
import { SessionOptions } from "./run.js";

const ServeOptions = SessionOptions.and({
  "listen?": "string",
  "csv?": "boolean",
});

export async function runServe(raw: unknown): Promise<void> {
  const opts = validated(ServeOptions(raw), "options");
  const ctx = await loadContext(opts);
  const settings = resolveRunSettings(opts, ctx.config);
  const { host, port } = parseListen(opts.listen || getEnv("LISTEN") || DEFAULT_LISTEN);

  const runtime = await createRuntime(ctx, settings, {
    csv: opts.csv !== false,
    console: false,
  });
  const app = createControlApp({
    controller: runtime.controller,
    registry: ctx.registry,
    archive: runtime.archive,
    defaults: {
      thresholdRatio: settings.thresholdRatio,
      scanIntervalMs: settings.scanIntervalMs,
    },
    version: getPackageJsonVersion(),
  });

  const server = await startControlServer(app, { host, port }).catch(async (err: unknown) => {
    await runtime.close();
    return exit(
      EXIT.SERVER_FAILURE,
      `Could not listen on ${host}:${port}: ${err instanceof Error ? err.message : String(err)}`
    );
  });
  process.stderr.write(`Control API: http://${server.host}:${server.port}\n`);
  process.stderr.write(`Discovery:   ${settings.discovery}\n`);
  process.stderr.write("Press Ctrl+C to stop.\n");

  const shutdown = async () => {
    if (runtime.controller.isRunning) {
      log.info("Shutting down: finalizing the running session");
      await runtime.controller.stop();
    }
    await server.close();
    await runtime.close();
  };

  await new Promise<void>((resolve, reject) => {
    const onSignal = () => {
      shutdown().then(resolve, reject);
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
  exit(EXIT.SUCCESS);
}
