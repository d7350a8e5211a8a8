/**
 * Shared numeric helpers for the trig diagram.
 */

export const TAU = Math.PI * 2;

/** Largest finite value, substituted for ±Infinity. */
export const SENTINEL = Number.MAX_VALUE;

/**
 * Replace ±Infinity with the signed sentinel. NaN and finite values pass through.
 */
export function clampInfinite(value: number): number {
  if (value === Infinity) return SENTINEL;
  if (value === -Infinity) return -SENTINEL;
  return value;
}

/**
 * Wrap an angle into [0, 2π). Non-finite input wraps to 0.
 */
export function wrapAngle(theta: number): number {
  if (!Number.isFinite(theta)) return 0;

  let wrapped = theta % TAU;
  if (wrapped < 0) {
    wrapped += TAU;
  }
  // A tiny negative input rounds up to exactly TAU above
  return wrapped >= TAU ? 0 : wrapped;
}
