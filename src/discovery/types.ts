export type DiscoveryKind = "ble" | "simulated";

export interface DiscoveredDevice {
  identifier: string;
  name: string;
  rssi?: number;
}
