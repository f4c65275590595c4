import { once } from "node:events";
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { z } from "zod";
import type { IdentityRegistry } from "../registry/types.js";
import { reportFileName, toReportRows } from "../report/build.js";
import { formatCsv } from "../report/csv.js";
import type { AttendanceController } from "../runner/controller.js";
import {
  DiscoveryUnavailableError,
  InvalidConfigurationError,
  InvalidStateError,
  RegistryError,
} from "../shared/errors.js";
import { log } from "../shared/logging.js";
import { summarize, type SessionArchive } from "../shared/session/index.js";

export interface ControlServerDeps {
  controller: AttendanceController;
  registry: IdentityRegistry;
  archive: SessionArchive;
  defaults: { thresholdRatio: number; scanIntervalMs: number };
  version?: string;
}

const RegisterBody = z.object({
  identifier: z.string().min(1),
  name: z.string(),
});

const StartBody = z
  .object({
    threshold: z.number().optional(),
    intervalMs: z.number().optional(),
    maxScans: z.number().int().optional(),
    maxDurationMs: z.number().optional(),
    labels: z
      .object({
        semester: z.string().optional(),
        batch: z.string().optional(),
        period: z.string().optional(),
      })
      .optional(),
  })
  .strict();

function statusFor(err: unknown): 400 | 404 | 409 | 503 | 500 {
  if (err instanceof InvalidConfigurationError || err instanceof RegistryError) return 400;
  if (err instanceof InvalidStateError) return 409;
  if (err instanceof DiscoveryUnavailableError) return 503;
  return 500;
}

/** An empty body reads as `{}`. */
async function readJson(req: { text(): Promise<string> }): Promise<unknown> {
  const text = await req.text();
  if (!text.trim()) return {};
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch {
    throw new InvalidConfigurationError("Request body must be JSON");
  }
}

function parseBody<T>(schema: z.ZodType<T>, data: unknown): T {
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    const summary = result.error.issues
      .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid request: ${summary}`);
  }
  return result.data;
}

/** HTTP surface for start/stop commands, registration and the archive. */
export function createControlApp(deps: ControlServerDeps): Hono {
  const { controller, registry, archive } = deps;
  const app = new Hono();

  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) log.error(`Request failed: ${err.message}`);
    return c.json({ error: err.message, type: err.name }, status);
  });

  app.get("/", (c) => c.json({ server: "rollcall", version: deps.version ?? "0.0.0" }));
  app.get("/health", (c) => c.json({ ok: true, running: controller.isRunning }));

  app.get("/api/identities", (c) => c.json(registry.list()));
  app.post("/api/identities", async (c) => {
    const body = parseBody(RegisterBody, await readJson(c.req));
    const identity = await controller.register(body.identifier, body.name);
    return c.json(identity, 201);
  });
  app.delete("/api/identities/:id", async (c) => {
    const removed = await controller.unregister(c.req.param("id"));
    if (!removed) return c.json({ error: "Not found" }, 404);
    return c.json({ removed: true });
  });

  app.post("/api/session", async (c) => {
    const body = parseBody(StartBody, await readJson(c.req));
    const view = await controller.start({
      thresholdRatio: body.threshold ?? deps.defaults.thresholdRatio,
      scanIntervalMs: body.intervalMs ?? deps.defaults.scanIntervalMs,
      maxScans: body.maxScans,
      maxDurationMs: body.maxDurationMs,
      labels: body.labels,
    });
    return c.json(view, 201);
  });
  app.get("/api/session", (c) => {
    const view = controller.current();
    if (!view) return c.json({ error: "No attendance session is running" }, 404);
    return c.json(view);
  });
  app.post("/api/session/stop", async (c) => c.json(await controller.stop()));

  app.get("/api/sessions", (c) => c.json(archive.list().map(summarize)));
  app.get("/api/sessions/:id", (c) => {
    const session = archive.get(c.req.param("id"));
    if (!session) return c.json({ error: "Not found" }, 404);
    return c.json(session);
  });
  app.get("/api/sessions/:id/export", (c) => {
    const session = archive.get(c.req.param("id"));
    if (!session) return c.json({ error: "Not found" }, 404);
    return new Response(formatCsv(toReportRows(session)), {
      headers: {
        "Content-Type": "text/csv; charset=utf-8",
        "Content-Disposition": `attachment; filename="${reportFileName(session)}"`,
      },
    });
  });

  return app;
}

export interface ServerServeOptions {
  host: string;
  port: number;
}

export interface ServerHandle {
  port: number;
  host: string;
  close: () => Promise<void>;
}

/** Resolves once the server is listening; rejects on a listen error such as EADDRINUSE. */
export async function startControlServer(
  app: Hono,
  options: ServerServeOptions
): Promise<ServerHandle> {
  const nodeServer = serve({
    fetch: app.fetch,
    port: options.port,
    hostname: options.host,
  });
  await once(nodeServer, "listening");
  const address = nodeServer.address();

  return {
    port: address && typeof address === "object" ? address.port : options.port,
    host: options.host,
    close: () =>
      new Promise((resolve, reject) => {
        nodeServer.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
