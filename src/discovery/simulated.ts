import {
  SIMULATED_DETECTION_PROBABILITY,
  SIMULATED_FALLBACK_IDS,
  UNKNOWN_DEVICE_NAME,
} from "../shared/constants.js";
import type { IdentityRegistry } from "../registry/types.js";
import { DiscoverySource } from "./base.js";
import type { DiscoveredDevice } from "./types.js";

export interface SimulatedDiscoveryOptions {
  registry: IdentityRegistry;
  /** Nominal scan length; a simulated pass takes half of it. */
  durationMs: number;
  detectionProbability?: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Stand-in for real hardware: reports the registered devices (padded with two
 * fixed extras when fewer than two are registered), each one independently
 * detected with `detectionProbability`.
 */
export class SimulatedDiscoverySource extends DiscoverySource {
  readonly kind = "simulated" as const;
  private readonly probability: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SimulatedDiscoveryOptions) {
    super();
    this.probability = options.detectionProbability ?? SIMULATED_DETECTION_PROBABILITY;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  protected async discover(): Promise<DiscoveredDevice[]> {
    const candidates: DiscoveredDevice[] = this.options.registry
      .list()
      .map((i) => ({ identifier: i.identifier, name: i.displayName }));
    if (candidates.length < 2) {
      for (const identifier of SIMULATED_FALLBACK_IDS) {
        if (!candidates.some((c) => c.identifier === identifier)) {
          candidates.push({ identifier, name: UNKNOWN_DEVICE_NAME });
        }
      }
    }

    const found = candidates.filter(() => this.random() < this.probability);
    const waitMs = Math.floor(this.options.durationMs / 2);
    if (waitMs > 0) await this.sleep(waitMs);
    return found;
  }
}
