import { getArchivePath, getConfigPath, getRegistryPath } from "../../config.js";
import { BleDiscoverySource } from "../../discovery/index.js";
import { loadContext } from "../context.js";
import { parseGlobalOptions } from "../utils.js";

export async function runDoctor(raw: unknown): Promise<void> {
  const opts = parseGlobalOptions(raw);
  const ctx = await loadContext(opts);

  process.stderr.write("rollcall doctor\n");
  process.stderr.write("───────────────────────────────────────────────────────────────\n\n");
  process.stderr.write(`Config:      ${getConfigPath(ctx.dataDir)}\n`);
  process.stderr.write(`Registry:    ${getRegistryPath(ctx.dataDir)} (${ctx.registry.size} identities)\n`);
  process.stderr.write(`Archive:     ${getArchivePath(ctx.dataDir)}\n`);
  process.stderr.write(`Discovery:   ${ctx.config.discovery}\n`);
  process.stderr.write(`Threshold:   ${Math.round(ctx.config.threshold * 100)}%\n`);

  const ble = new BleDiscoverySource({ durationMs: 0, powerOnTimeoutMs: 3_000 });
  try {
    await ble.open();
    process.stderr.write("BLE:         adapter powered on\n");
  } catch (err) {
    process.stderr.write(`BLE:         unavailable (${err instanceof Error ? err.message : String(err)})\n`);
    process.stderr.write("\nFix:\n");
    process.stderr.write("  - Check the adapter is on and this user may use it\n");
    process.stderr.write("  - Or run without hardware: rollcall run --discovery simulated\n");
  } finally {
    await ble.close();
  }
  process.stderr.write("───────────────────────────────────────────────────────────────\n");
}
