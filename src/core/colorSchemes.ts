/**
 * Height-to-color mapping for terrain vertices.
 *
 * Every scheme is a pure function of a normalized height t in [0, 1].
 * `colorForHeight` normalizes against the grid's (pre-scale) height bounds,
 * so recoloring never depends on the current height scale.
 */

import { HEIGHT_RANGE_EPSILON } from '../config';
import type { ColorScheme, ColorSchemeKind, GradientStop, HeightBounds, Rgb } from '../types';
import { clamp } from './math';

/** Default stops for the custom gradient scheme (lowland green to pale rock). */
export const DEFAULT_GRADIENT_STOPS: readonly GradientStop[] = [
  { at: 0, color: [0.18, 0.32, 0.12] },
  { at: 0.2, color: [0.35, 0.55, 0.2] },
  { at: 0.4, color: [0.55, 0.5, 0.28] },
  { at: 0.6, color: [0.6, 0.45, 0.25] },
  { at: 0.8, color: [0.52, 0.48, 0.42] },
  { at: 1, color: [0.72, 0.7, 0.66] },
];

export const COLOR_SCHEME_KINDS: readonly ColorSchemeKind[] = ['terrain', 'heatmap', 'monochrome', 'gradient'];

/** Convert a 0xRRGGBB value to [r, g, b] in [0, 1]. */
export function hexToRgb(hex: number, out: Rgb = [0, 0, 0]): Rgb {
  out[0] = ((hex >> 16) & 0xff) / 255;
  out[1] = ((hex >> 8) & 0xff) / 255;
  out[2] = (hex & 0xff) / 255;
  return out;
}

/** Position of `height` within bounds, clamped to [0, 1]. Flat grids map to 0. */
export function normalizeHeight(height: number, bounds: HeightBounds): number {
  const span = bounds.max - bounds.min;
  const range = span < HEIGHT_RANGE_EPSILON ? 1 : span;
  return clamp((height - bounds.min) / range, 0, 1);
}

// ── Schemes ─────────────────────────────────────────────────────

/** Blue → cyan → green → brown → white. */
export function terrainColor(t: number, out: Rgb = [0, 0, 0]): Rgb {
  if (t < 0.3) {
    const s = t / 0.3;
    return set(out, 0, s * 0.5, 0.8 + s * 0.2);
  }
  if (t < 0.5) {
    const s = (t - 0.3) / 0.2;
    return set(out, s * 0.2, 0.5 + s * 0.3, 1 - s * 0.6);
  }
  if (t < 0.8) {
    const s = (t - 0.5) / 0.3;
    return set(out, 0.2 + s * 0.4, 0.8 - s * 0.4, 0.4 - s * 0.3);
  }
  const s = (t - 0.8) / 0.2;
  return set(out, 0.6 + s * 0.4, 0.4 + s * 0.6, 0.1 + s * 0.9);
}

/** Blue → cyan → green → yellow → red. */
export function heatmapColor(t: number, out: Rgb = [0, 0, 0]): Rgb {
  if (t < 0.25) return set(out, 0, t / 0.25, 1);
  if (t < 0.5) return set(out, 0, 1, 1 - (t - 0.25) / 0.25);
  if (t < 0.75) return set(out, (t - 0.5) / 0.25, 1, 0);
  return set(out, 1, 1 - (t - 0.75) / 0.25, 0);
}

export function monochromeColor(t: number, out: Rgb = [0, 0, 0]): Rgb {
  const v = 0.1 + t * 0.9;
  return set(out, v, v, v);
}

/** Piecewise-linear interpolation between sorted stops. */
export function gradientColor(stops: readonly GradientStop[], t: number, out: Rgb = [0, 0, 0]): Rgb {
  const first = stops[0];
  if (first === undefined) return set(out, 1, 1, 1);
  if (t <= first.at) return set(out, first.color[0], first.color[1], first.color[2]);

  for (let i = 1; i < stops.length; i++) {
    const prev = stops[i - 1];
    const curr = stops[i];
    if (prev === undefined || curr === undefined) break;
    if (t <= curr.at) {
      const span = curr.at - prev.at;
      const f = span > 0 ? (t - prev.at) / span : 1;
      return set(
        out,
        prev.color[0] + (curr.color[0] - prev.color[0]) * f,
        prev.color[1] + (curr.color[1] - prev.color[1]) * f,
        prev.color[2] + (curr.color[2] - prev.color[2]) * f,
      );
    }
  }

  const last = stops[stops.length - 1] ?? first;
  return set(out, last.color[0], last.color[1], last.color[2]);
}

/** Color for a raw (pre-scale) height under the given scheme. */
export function colorForHeight(
  scheme: ColorScheme,
  height: number,
  bounds: HeightBounds,
  out: Rgb = [0, 0, 0],
): Rgb {
  const t = normalizeHeight(height, bounds);
  switch (scheme.kind) {
    case 'terrain':
      return terrainColor(t, out);
    case 'heatmap':
      return heatmapColor(t, out);
    case 'monochrome':
      return monochromeColor(t, out);
    case 'gradient':
      return gradientColor(scheme.stops, t, out);
  }
}

/** Parse a UI / query-string name into a scheme. */
export function parseColorScheme(name: string): ColorScheme | null {
  switch (name.trim().toLowerCase()) {
    case 'terrain':
      return { kind: 'terrain' };
    case 'heatmap':
      return { kind: 'heatmap' };
    case 'monochrome':
      return { kind: 'monochrome' };
    case 'gradient':
      return { kind: 'gradient', stops: DEFAULT_GRADIENT_STOPS };
    default:
      return null;
  }
}

function set(out: Rgb, r: number, g: number, b: number): Rgb {
  out[0] = r;
  out[1] = g;
  out[2] = b;
  return out;
}
