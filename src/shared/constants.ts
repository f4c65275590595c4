export const DEFAULT_LISTEN = "127.0.0.1:4870";
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 4870;

export const DEFAULT_THRESHOLD = 0.8;
export const DEFAULT_SCAN_INTERVAL_MS = 5_000;
export const DEFAULT_SCAN_DURATION_MS = 5_000;
/** Largest delay setTimeout honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export const CONFIG_FILENAME = "rollcall.json";
export const REGISTRY_FILENAME = "identities.json";
export const ARCHIVE_FILENAME = "sessions.db";

/** Padding devices the simulator reports when fewer than two identities are registered. */
export const SIMULATED_FALLBACK_IDS = ["AA:BB:CC:DD:EE:01", "AA:BB:CC:DD:EE:02"] as const;
export const SIMULATED_DETECTION_PROBABILITY = 0.75;

export const UNKNOWN_DEVICE_NAME = "Unknown Device";

/** Scan lines kept in memory for the control server's session log. */
export const SCAN_LOG_CAPACITY = 50;
