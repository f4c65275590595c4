import type { IdentityRegistry } from "../registry/types.js";
import { DiscoverySource } from "./base.js";
import { BleDiscoverySource } from "./ble.js";
import { SimulatedDiscoverySource } from "./simulated.js";
import type { DiscoveryKind } from "./types.js";

export { DiscoverySource } from "./base.js";
export { BleDiscoverySource } from "./ble.js";
export { SimulatedDiscoverySource } from "./simulated.js";
export type { DiscoveredDevice, DiscoveryKind } from "./types.js";

export interface DiscoveryFactoryOptions {
  registry: IdentityRegistry;
  durationMs: number;
}

/** Pick the discovery backend once, from configuration. */
export function createDiscoverySource(
  kind: DiscoveryKind,
  options: DiscoveryFactoryOptions
): DiscoverySource {
  switch (kind) {
    case "ble":
      return new BleDiscoverySource({ durationMs: options.durationMs });
    case "simulated":
      return new SimulatedDiscoverySource({
        registry: options.registry,
        durationMs: options.durationMs,
      });
  }
}
