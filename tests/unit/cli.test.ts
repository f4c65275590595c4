import { describe, it, expect, vi } from "vitest";
import { deleteArchivedSession } from "../../src/cli/commands/history.js";
import { formatDeviceChoice } from "../../src/cli/commands/register.js";
import { stopOnSignal } from "../../src/cli/commands/run.js";
import { createProgram } from "../../src/cli/program.js";
import { parseGlobalOptions, parsePositiveInt } from "../../src/cli/utils.js";
import { createInMemoryRegistry } from "../../src/registry/memory.js";
import { InvalidConfigurationError } from "../../src/shared/errors.js";
import { createInMemorySessionArchive } from "../../src/shared/session/index.js";
import { sampleReport } from "../helpers/reports.js";

describe("formatDeviceChoice", () => {
  const registry = createInMemoryRegistry([{ identifier: "AA:BB:CC:DD:EE:01", displayName: "Ada" }]);

  it("numbers devices from 1", () => {
    expect(
      formatDeviceChoice({ identifier: "AA:BB:CC:DD:EE:02", name: "Unknown Device" }, 1, registry)
    ).toBe("2) Unknown Device | MAC: AA:BB:CC:DD:EE:02");
  });

  it("shows who a device is registered to", () => {
    expect(formatDeviceChoice({ identifier: "AA:BB:CC:DD:EE:01", name: "Pixel" }, 0, registry)).toBe(
      "1) Pixel | MAC: AA:BB:CC:DD:EE:01 (registered to Ada)"
    );
  });
});

describe("parsePositiveInt", () => {
  it("passes undefined through", () => {
    expect(parsePositiveInt(undefined, "--scans")).toBeUndefined();
  });

  it("parses positive integers and rejects the rest", () => {
    expect(parsePositiveInt("12", "--scans")).toBe(12);
    expect(() => parsePositiveInt("0", "--scans")).toThrow('--scans must be a positive integer, got "0"');
    expect(() => parsePositiveInt("1.5", "--scans")).toThrow(/--scans/);
  });
});

describe("parseGlobalOptions", () => {
  it("rejects wrongly typed options", () => {
    expect(parseGlobalOptions({ dataDir: "/tmp/x", verbose: true })).toEqual({ dataDir: "/tmp/x", verbose: true });
    expect(() => parseGlobalOptions({ verbose: "yes" })).toThrow(/^Invalid options/);
  });
});

describe("createProgram", () => {
  it("declares every command", () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(["register", "identities", "run", "serve", "history", "config", "doctor"]);
  });

  it("gives history its subcommands", () => {
    const history = createProgram().commands.find((c) => c.name() === "history");
    expect(history?.commands.map((c) => c.name())).toEqual(["list", "show", "export", "delete"]);
  });

  it("gives run the session flags", () => {
    const run = createProgram().commands.find((c) => c.name() === "run");
    const flags = run?.options.map((o) => o.long);
    expect(flags).toEqual(
      expect.arrayContaining(["--threshold", "--interval", "--scans", "--duration", "--semester", "--no-csv"])
    );
  });
});

describe("deleteArchivedSession", () => {
  it("removes the session from the archive", () => {
    const archive = createInMemorySessionArchive();
    archive.save(sampleReport());
    archive.save(sampleReport({ id: "sess-test-2" }));

    deleteArchivedSession(archive, "sess-test-1");

    expect(archive.get("sess-test-1")).toBeUndefined();
    expect(archive.list().map((r) => r.id)).toEqual(["sess-test-2"]);
  });

  it("rejects an unknown id", () => {
    const archive = createInMemorySessionArchive();
    expect(() => deleteArchivedSession(archive, "sess-missing")).toThrow(InvalidConfigurationError);
    expect(() => deleteArchivedSession(archive, "sess-missing")).toThrow("No archived session sess-missing");
  });
});

describe("stopOnSignal", () => {
  it("stops a running session and hands over the report", async () => {
    const report = sampleReport();
    const controller = { isRunning: true, stop: vi.fn().mockResolvedValue(report) };
    const finish = vi.fn();
    const fail = vi.fn();

    stopOnSignal(controller, finish, fail)();

    await vi.waitFor(() => expect(finish).toHaveBeenCalledWith(report));
    expect(controller.stop).toHaveBeenCalledTimes(1);
    expect(fail).not.toHaveBeenCalled();
  });

  it("leaves a session that is already stopping alone", async () => {
    const controller = { isRunning: false, stop: vi.fn().mockRejectedValue(new Error("not running")) };
    const finish = vi.fn();
    const fail = vi.fn();

    stopOnSignal(controller, finish, fail)();
    await Promise.resolve();

    expect(controller.stop).not.toHaveBeenCalled();
    expect(finish).not.toHaveBeenCalled();
    expect(fail).not.toHaveBeenCalled();
  });
});
