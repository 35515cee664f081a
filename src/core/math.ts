/**
 * Scalar helpers for interpolation and angles.
 * Zero allocations - all functions return primitives.
 */

export const TAU = Math.PI * 2;

/** Clamp value between min and max inclusive. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** Linear interpolation between a and b. */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Ease-in-out cubic over t in [0, 1]. */
export function easeInOutCubic(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;
}

/** Wrap an angle into [0, 2π). */
export function wrapAngle(angle: number): number {
  const wrapped = angle % TAU;
  const positive = wrapped < 0 ? wrapped + TAU : wrapped;
  // -tiny + TAU can round up to exactly TAU
  return positive >= TAU ? 0 : positive;
}

/** Signed difference `to - from` along the shorter arc, in (-π, π]. */
export function shortestAngleDelta(from: number, to: number): number {
  let delta = wrapAngle(to - from);
  if (delta > Math.PI) delta -= TAU;
  return delta;
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}
