import { log } from "../shared/logging.js";
import { normalizeIdentifier } from "../shared/ids.js";
import { UNKNOWN_DEVICE_NAME } from "../shared/constants.js";
import type { DiscoveredDevice, DiscoveryKind } from "./types.js";

/**
 * Abstract base for "scan nearby devices now" backends.
 * Subclasses implement one bounded discovery pass; this class turns any
 * failure of that pass into an empty result.
 */
export abstract class DiscoverySource {
  abstract readonly kind: DiscoveryKind;

  /** One bounded discovery pass. Allowed to reject. */
  protected abstract discover(): Promise<DiscoveredDevice[]>;

  /** Check the backend is usable before a session relies on it. */
  async open(): Promise<void> {}

  /** Release hardware handles. */
  async close(): Promise<void> {}

  /** Devices found in one pass, deduplicated by normalized identifier. */
  async listDevices(): Promise<DiscoveredDevice[]> {
    let raw: DiscoveredDevice[];
    try {
      raw = await this.discover();
    } catch (err) {
      log.warn(
        `${this.kind} scan failed, treating as no devices found: ${err instanceof Error ? err.message : String(err)}`
      );
      return [];
    }
    const byId = new Map<string, DiscoveredDevice>();
    for (const device of raw) {
      const identifier = normalizeIdentifier(device.identifier);
      if (!identifier) continue;
      const previous = byId.get(identifier);
      const name =
        device.name && device.name !== UNKNOWN_DEVICE_NAME
          ? device.name
          : (previous?.name ?? UNKNOWN_DEVICE_NAME);
      byId.set(identifier, { ...device, identifier, name });
    }
    return Array.from(byId.values());
  }

  async scan(): Promise<Set<string>> {
    const devices = await this.listDevices();
    return new Set(devices.map((d) => d.identifier));
  }
}
