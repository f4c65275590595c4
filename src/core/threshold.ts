/**
 * Presence rule: an identity is present when it was detected in at least
 * `ratio * totalScans` scans. Ratios arrive as floating point (0.14 * 50 is
 * 7.000000000000001), so the product is compared with a small tolerance.
 */
const EPSILON = 1e-9;

export function isValidThreshold(ratio: number): boolean {
  return Number.isFinite(ratio) && ratio > 0 && ratio <= 1;
}

/** 0 when no scan completed; otherwise at least 1, since the ratio is positive. */
export function requiredDetections(ratio: number, totalScans: number): number {
  if (totalScans <= 0) return 0;
  return Math.max(1, Math.ceil(ratio * totalScans - EPSILON));
}

/** A session stopped before its first scan classifies everyone absent. */
export function isPresent(detectionCount: number, totalScans: number, ratio: number): boolean {
  if (totalScans <= 0) return false;
  return detectionCount >= requiredDetections(ratio, totalScans);
}
