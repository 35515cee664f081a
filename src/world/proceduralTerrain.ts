/**
 * Procedural height grid generator.
 *
 * Layered sinusoidal noise (continental swell, hills, ridges, detail) with a
 * seed-derived phase offset. Deterministic: the same parameters always
 * produce the same samples.
 */

import {
  DEFAULT_PROCEDURAL_AMPLITUDE,
  DEFAULT_PROCEDURAL_FREQUENCY,
  DEFAULT_PROCEDURAL_SIZE,
} from '../config';
import { createHeightGrid, type HeightGrid } from './heightGrid';

export interface TerrainParams {
  width: number;
  height: number;
  seed: number;
  /** Peak-to-trough scale of the generated heights. */
  amplitude: number;
  /** Roughly the number of large features across the grid. */
  frequency: number;
}

export const DEFAULT_TERRAIN_PARAMS: TerrainParams = {
  width: DEFAULT_PROCEDURAL_SIZE,
  height: DEFAULT_PROCEDURAL_SIZE,
  seed: 1,
  amplitude: DEFAULT_PROCEDURAL_AMPLITUDE,
  frequency: DEFAULT_PROCEDURAL_FREQUENCY,
};

// ── Noise Helpers ──────────────────────────────────────────────────

/** Deterministic hash-based pseudo-random in [0, 1). */
export function hash2d(x: number, y: number): number {
  const h = Math.sin(x * 12.9898 + y * 78.233) * 43758.5453;
  return h - Math.floor(h);
}

/** Layered noise over unit-period coordinates; output roughly in [-1, 1]. */
function terrainNoise(u: number, v: number): number {
  const continental =
    Math.sin(u * 1.0 + 0.3) * Math.cos(v * 1.2 + 0.7) * 0.35 +
    Math.cos(u * 0.7 - 0.5) * Math.sin(v * 0.9 + 1.2) * 0.25;
  const hills =
    Math.sin(u * 4.8 + v * 3.2) * 0.15 +
    Math.cos(u * 3.6 - v * 4.4 + 2.0) * 0.1;
  const ridges =
    Math.sin(u * 14 + 1.7) * Math.cos(v * 11.2 + 0.9) * 0.08 +
    Math.sin(u * 8.8 + v * 17.6 - 1.3) * 0.05;
  const detail =
    Math.sin(u * 28 + v * 20) * 0.03 +
    Math.cos(u * 36 - v * 24 + 3.1) * 0.02;
  return continental + hills + ridges + detail;
}

// ── Public API ─────────────────────────────────────────────────────

export function generateTerrain(overrides: Partial<TerrainParams> = {}): HeightGrid {
  const params: TerrainParams = { ...DEFAULT_TERRAIN_PARAMS, ...overrides };
  const { width, height, seed, amplitude, frequency } = params;

  const phaseU = hash2d(seed, 17) * 100;
  const phaseV = hash2d(31, seed) * 100;
  const span = Math.max(width, height, 1);
  const step = (frequency * Math.PI * 2) / span;

  const samples = new Float32Array(width * height);
  for (let r = 0; r < height; r++) {
    const v = r * step + phaseV;
    for (let c = 0; c < width; c++) {
      const u = c * step + phaseU;
      samples[r * width + c] = terrainNoise(u, v) * amplitude;
    }
  }

  return createHeightGrid(width, height, samples);
}
