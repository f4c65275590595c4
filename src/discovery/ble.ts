/**
 * Hardware discovery over Bluetooth Low Energy, backed by @abandonware/noble.
 * The native binding is loaded on first use so that simulated sessions and
 * tests never touch the adapter.
 */

import type { Peripheral } from "@abandonware/noble";
import { DiscoveryUnavailableError } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import { UNKNOWN_DEVICE_NAME } from "../shared/constants.js";
import { DiscoverySource } from "./base.js";
import type { DiscoveredDevice } from "./types.js";

/** The part of noble's module-level API this source drives. */
interface Noble {
  readonly state: string;
  on(event: "stateChange", listener: (state: string) => void): unknown;
  on(event: "discover", listener: (peripheral: Peripheral) => void): unknown;
  removeListener(event: "stateChange", listener: (state: string) => void): unknown;
  removeListener(event: "discover", listener: (peripheral: Peripheral) => void): unknown;
  startScanningAsync(serviceUUIDs?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

export interface BleDiscoveryOptions {
  /** How long each pass listens for advertisements. */
  durationMs: number;
  /** How long to wait for the adapter to report poweredOn. */
  powerOnTimeoutMs?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class BleDiscoverySource extends DiscoverySource {
  readonly kind = "ble" as const;
  private noble: Noble | null = null;
  private scanning = false;

  constructor(private readonly options: BleDiscoveryOptions) {
    super();
  }

  override async open(): Promise<void> {
    const noble = await this.load();
    await this.waitForPoweredOn(noble);
    log.debug("BLE adapter powered on");
  }

  override async close(): Promise<void> {
    if (this.noble && this.scanning) {
      await this.noble.stopScanningAsync();
      this.scanning = false;
    }
  }

  protected async discover(): Promise<DiscoveredDevice[]> {
    const noble = await this.load();
    await this.waitForPoweredOn(noble);

    const found = new Map<string, DiscoveredDevice>();
    const onDiscover = (peripheral: Peripheral) => {
      const address = peripheral.address && peripheral.address !== "unknown" ? peripheral.address : "";
      const identifier = address || peripheral.id;
      found.set(identifier, {
        identifier,
        name: peripheral.advertisement?.localName || UNKNOWN_DEVICE_NAME,
        rssi: peripheral.rssi,
      });
    };

    noble.on("discover", onDiscover);
    try {
      await noble.startScanningAsync([], true);
      this.scanning = true;
      await sleep(this.options.durationMs);
    } finally {
      noble.removeListener("discover", onDiscover);
      if (this.scanning) {
        await noble.stopScanningAsync();
        this.scanning = false;
      }
    }
    log.debug(`BLE pass found ${found.size} device(s)`);
    return Array.from(found.values());
  }

  private async load(): Promise<Noble> {
    if (this.noble) return this.noble;
    try {
      const mod = await import("@abandonware/noble");
      const noble: Noble = mod.default;
      this.noble = noble;
      return noble;
    } catch (err) {
      throw new DiscoveryUnavailableError(
        `BLE discovery is not available on this host: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  private waitForPoweredOn(noble: Noble): Promise<void> {
    if (noble.state === "poweredOn") return Promise.resolve();
    const timeoutMs = this.options.powerOnTimeoutMs ?? this.options.durationMs;
    return new Promise<void>((resolve, reject) => {
      const onState = (state: string) => {
        if (state !== "poweredOn") return;
        clearTimeout(timer);
        noble.removeListener("stateChange", onState);
        resolve();
      };
      const timer = setTimeout(() => {
        noble.removeListener("stateChange", onState);
        reject(new DiscoveryUnavailableError(`Bluetooth adapter is ${noble.state}, expected poweredOn`));
      }, timeoutMs);
      noble.on("stateChange", onState);
    });
  }
}
