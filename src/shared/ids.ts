/** Generate a short unique ID for sessions. */
export function genId(prefix = "id"): string {
  return `${prefix}-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

const MAC_LIKE = /^(?:[0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}$/;

/**
 * Canonical form of a device identifier. MAC-like addresses are upper-cased
 * with colon separators (BLE stacks disagree on case); anything else, such as
 * the peripheral UUIDs macOS reports, is only trimmed.
 */
export function normalizeIdentifier(raw: string): string {
  const trimmed = raw.trim();
  if (MAC_LIKE.test(trimmed)) return trimmed.replace(/-/g, ":").toUpperCase();
  return trimmed;
}
