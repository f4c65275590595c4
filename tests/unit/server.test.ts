import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createInMemoryRegistry } from "../../src/registry/memory.js";
import { AttendanceController } from "../../src/runner/controller.js";
import { createControlApp } from "../../src/server/server.js";
import { createInMemorySessionArchive } from "../../src/shared/session/index.js";
import { scriptedSource } from "../helpers/sources.js";

const ADA_ID = "AA:BB:CC:DD:EE:01";
const GRACE_ID = "AA:BB:CC:DD:EE:02";

function setup(script: string[][] = []) {
  const registry = createInMemoryRegistry();
  const archive = createInMemorySessionArchive();
  const controller = new AttendanceController({
    registry,
    source: scriptedSource(script),
    archive,
    now: () => new Date(2026, 2, 9, 9, 0).getTime(),
  });
  const app = createControlApp({
    controller,
    registry,
    archive,
    defaults: { thresholdRatio: 0.5, scanIntervalMs: 1_000 },
    version: "1.2.3",
  });
  return { app, controller, archive };
}

function post(body?: unknown, raw?: string) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: raw ?? (body === undefined ? undefined : JSON.stringify(body)),
  };
}

describe("control server", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports health and version", async () => {
    const { app } = setup();
    expect(await (await app.request("/")).json()).toEqual({ server: "rollcall", version: "1.2.3" });
    expect(await (await app.request("/health")).json()).toEqual({ ok: true, running: false });
  });

  it("registers identities", async () => {
    const { app } = setup();
    const res = await app.request("/api/identities", post({ identifier: "aa:bb:cc:dd:ee:01", name: "Ada" }));
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ identifier: ADA_ID, displayName: "Ada" });

    const dup = await app.request("/api/identities", post({ identifier: ADA_ID, name: "Grace" }));
    expect(dup.status).toBe(400);
    expect(await dup.json()).toEqual({
      error: `Device ${ADA_ID} is already registered to Ada`,
      type: "RegistryError",
    });

    expect(await (await app.request("/api/identities")).json()).toEqual([
      { identifier: ADA_ID, displayName: "Ada" },
    ]);
  });

  it("removes identities", async () => {
    const { app } = setup();
    await app.request("/api/identities", post({ identifier: ADA_ID, name: "Ada" }));
    expect((await app.request(`/api/identities/${ADA_ID}`, { method: "DELETE" })).status).toBe(200);
    expect((await app.request(`/api/identities/${ADA_ID}`, { method: "DELETE" })).status).toBe(404);
  });

  it("rejects malformed bodies", async () => {
    const { app } = setup();
    expect((await app.request("/api/identities", post(undefined, "{oops"))).status).toBe(400);
    expect((await app.request("/api/identities", post({ identifier: ADA_ID }))).status).toBe(400);
    expect((await app.request("/api/session", post({ thresold: 0.5 }))).status).toBe(400);
  });

  it("refuses to start without identities", async () => {
    const { app } = setup();
    const res = await app.request("/api/session", post());
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "No identities are registered",
      type: "InvalidConfigurationError",
    });
  });

  it("refuses an invalid threshold", async () => {
    const { app } = setup();
    await app.request("/api/identities", post({ identifier: ADA_ID, name: "Ada" }));
    const res = await app.request("/api/session", post({ threshold: 2 }));
    expect(res.status).toBe(400);
  });

  it("answers state conflicts with 409", async () => {
    const { app } = setup();
    expect((await app.request("/api/session/stop", post())).status).toBe(409);
    expect((await app.request("/api/session")).status).toBe(404);

    await app.request("/api/identities", post({ identifier: ADA_ID, name: "Ada" }));
    expect((await app.request("/api/session", post())).status).toBe(201);
    expect((await app.request("/api/session", post())).status).toBe(409);
    const late = await app.request("/api/identities", post({ identifier: GRACE_ID, name: "Grace" }));
    expect(late.status).toBe(409);
    expect(await late.json()).toEqual({
      error: "Registration is closed while a session is running",
      type: "InvalidStateError",
    });
  });

  it("runs a session and serves it from the archive", async () => {
    const { app, archive } = setup([[ADA_ID, GRACE_ID], [ADA_ID], [ADA_ID]]);
    await app.request("/api/identities", post({ identifier: ADA_ID, name: "Ada" }));
    await app.request("/api/identities", post({ identifier: GRACE_ID, name: "Grace" }));

    const started = await app.request(
      "/api/session",
      post({ threshold: 0.6, intervalMs: 1_000, labels: { period: "2" } })
    );
    expect(started.status).toBe(201);
    await vi.advanceTimersByTimeAsync(2_000);

    const current = await app.request("/api/session");
    expect(await current.json()).toMatchObject({
      labels: { period: "2" },
      snapshot: { status: "running", totalScans: 3, thresholdRatio: 0.6 },
    });

    const stopped = await app.request("/api/session/stop", post());
    expect(stopped.status).toBe(200);
    expect(await stopped.json()).toMatchObject({
      date: "2026-03-09",
      totalScans: 3,
      results: [
        { displayName: "Ada", detectionCount: 3, requiredDetections: 2, present: true },
        { displayName: "Grace", detectionCount: 1, requiredDetections: 2, present: false },
      ],
    });

    const [saved] = archive.list();
    expect(await (await app.request("/api/sessions")).json()).toEqual([
      {
        id: saved.id,
        date: "2026-03-09",
        startedAt: saved.startedAt,
        stoppedAt: saved.stoppedAt,
        totalScans: 3,
        present: 1,
        tracked: 2,
      },
    ]);
    expect((await app.request(`/api/sessions/${saved.id}`)).status).toBe(200);
    expect((await app.request("/api/sessions/missing")).status).toBe(404);

    const exported = await app.request(`/api/sessions/${saved.id}/export`);
    expect(exported.headers.get("Content-Type")).toBe("text/csv; charset=utf-8");
    expect(exported.headers.get("Content-Disposition")).toBe(
      'attachment; filename="attendance_2026-03-09_2.csv"'
    );
    expect(await exported.text()).toBe(
      "Name,Beacon ID,Date,Status,Total Detections,Total Scans,Required Detections\n" +
        `Ada,${ADA_ID},2026-03-09,Present,3,3,2\n` +
        `Grace,${GRACE_ID},2026-03-09,Absent,1,3,2\n`
    );
  });
});
