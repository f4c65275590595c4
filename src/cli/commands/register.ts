import { createInterface } from "node:readline/promises";
import { resolveRunSettings } from "../../config.js";
import { createDiscoverySource, type DiscoveredDevice } from "../../discovery/index.js";
import type { IdentityRegistry } from "../../registry/types.js";
import { validated } from "../../shared/assert.js";
import { InvalidConfigurationError } from "../../shared/errors.js";
import { log } from "../../shared/logging.js";
import { loadContext } from "../context.js";
import { GlobalOptions } from "../utils.js";

const RegisterOptions = GlobalOptions.and({
  "id?": "string",
  "name?": "string",
  "discovery?": "string",
  "scanDuration?": "string",
});

export function formatDeviceChoice(
  device: DiscoveredDevice,
  index: number,
  registry: IdentityRegistry
): string {
  const owner = registry.get(device.identifier);
  const status = owner ? ` (registered to ${owner.displayName})` : "";
  return `${index + 1}) ${device.name} | MAC: ${device.identifier}${status}`;
}

export async function runRegister(raw: unknown): Promise<void> {
  const opts = validated(RegisterOptions(raw), "options");
  const ctx = await loadContext(opts);

  if (opts.id !== undefined || opts.name !== undefined) {
    if (!opts.id || opts.name === undefined) {
      throw new InvalidConfigurationError("--id and --name must be given together");
    }
    const identity = await ctx.registry.register(opts.id, opts.name);
    process.stdout.write(`${identity.displayName}\t${identity.identifier}\n`);
    return;
  }

  const settings = resolveRunSettings(
    { discovery: opts.discovery, scanDuration: opts.scanDuration },
    ctx.config
  );
  const source = createDiscoverySource(settings.discovery, {
    registry: ctx.registry,
    durationMs: settings.scanDurationMs,
  });
  await source.open();
  try {
    log.info(`Scanning for devices (${settings.scanDurationMs} ms)...`);
    const devices = await source.listDevices();
    if (devices.length === 0) {
      log.warn("No Bluetooth devices found. Registration aborted.");
      return;
    }

    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      process.stderr.write("Found devices:\n");
      devices.forEach((device, i) => {
        process.stderr.write(`  ${formatDeviceChoice(device, i, ctx.registry)}\n`);
      });
      const answer = (await rl.question("Device number: ")).trim();
      const device = devices[Number(answer) - 1];
      if (!/^\d+$/.test(answer) || !device) {
        throw new InvalidConfigurationError(`No device numbered "${answer}"`);
      }
      const name = await rl.question("Name: ");
      const identity = await ctx.registry.register(device.identifier, name);
      process.stdout.write(`${identity.displayName}\t${identity.identifier}\n`);
    } finally {
      rl.close();
    }
  } finally {
    await source.close();
  }
}
