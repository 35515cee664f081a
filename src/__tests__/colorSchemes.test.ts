import { describe, it, expect } from 'vitest';
import {
  hexToRgb,
  normalizeHeight,
  terrainColor,
  heatmapColor,
  monochromeColor,
  gradientColor,
  colorForHeight,
  parseColorScheme,
  DEFAULT_GRADIENT_STOPS,
} from '../core/colorSchemes';
import type { GradientStop, Rgb } from '../types';

function expectRgb(actual: Rgb, expected: Rgb): void {
  actual.forEach((channel, i) => expect(channel).toBeCloseTo(expected[i] ?? 0, 9));
}

describe('hexToRgb', () => {
  it('splits 0xRRGGBB into unit channels', () => {
    expect(hexToRgb(0xff8000)).toEqual([1, 128 / 255, 0]);
    expect(hexToRgb(0x000000)).toEqual([0, 0, 0]);
  });

  it('writes into the provided tuple', () => {
    const out: [number, number, number] = [9, 9, 9];
    expect(hexToRgb(0xffffff, out)).toBe(out);
    expect(out).toEqual([1, 1, 1]);
  });
});

describe('normalizeHeight', () => {
  it('maps bounds onto [0, 1]', () => {
    expect(normalizeHeight(5, { min: 0, max: 10 })).toBe(0.5);
    expect(normalizeHeight(-3, { min: -3, max: 1 })).toBe(0);
    expect(normalizeHeight(1, { min: -3, max: 1 })).toBe(1);
  });

  it('clamps out-of-range heights', () => {
    expect(normalizeHeight(20, { min: 0, max: 10 })).toBe(1);
    expect(normalizeHeight(-20, { min: 0, max: 10 })).toBe(0);
  });

  it('maps a flat grid to 0', () => {
    expect(normalizeHeight(4, { min: 4, max: 4 })).toBe(0);
  });
});

describe('schemes', () => {
  it('terrain runs from deep blue to white', () => {
    expect(terrainColor(0)).toEqual([0, 0, 0.8]);
    expectRgb(terrainColor(1), [1, 1, 1]);
  });

  it('heatmap runs from blue through green to red', () => {
    expect(heatmapColor(0)).toEqual([0, 0, 1]);
    expect(heatmapColor(0.5)).toEqual([0, 1, 0]);
    expect(heatmapColor(1)).toEqual([1, 0, 0]);
  });

  it('monochrome keeps the lowest point off black', () => {
    expect(monochromeColor(0)).toEqual([0.1, 0.1, 0.1]);
    expectRgb(monochromeColor(1), [1, 1, 1]);
  });

  it('every scheme stays inside [0, 1]', () => {
    for (let i = 0; i <= 20; i++) {
      const t = i / 20;
      for (const rgb of [terrainColor(t), heatmapColor(t), monochromeColor(t), gradientColor(DEFAULT_GRADIENT_STOPS, t)]) {
        for (const channel of rgb) {
          expect(channel).toBeGreaterThanOrEqual(0);
          expect(channel).toBeLessThanOrEqual(1);
        }
      }
    }
  });
});

describe('gradientColor', () => {
  const stops: GradientStop[] = [
    { at: 0, color: [0, 0, 0] },
    { at: 0.5, color: [1, 0, 0] },
    { at: 1, color: [1, 1, 1] },
  ];

  it('interpolates between neighbouring stops', () => {
    expect(gradientColor(stops, 0.25)).toEqual([0.5, 0, 0]);
    expect(gradientColor(stops, 0.75)).toEqual([1, 0.5, 0.5]);
  });

  it('holds the end colors outside the stop range', () => {
    expect(gradientColor(stops.slice(1), 0)).toEqual([1, 0, 0]);
    expect(gradientColor(stops.slice(0, 2), 1)).toEqual([1, 0, 0]);
  });

  it('falls back to white without stops', () => {
    expect(gradientColor([], 0.5)).toEqual([1, 1, 1]);
  });
});

describe('colorForHeight', () => {
  it('normalizes against the bounds before coloring', () => {
    expect(colorForHeight({ kind: 'heatmap' }, 100, { min: 0, max: 100 })).toEqual([1, 0, 0]);
    expect(colorForHeight({ kind: 'monochrome' }, 0, { min: 0, max: 100 })).toEqual([0.1, 0.1, 0.1]);
  });
});

describe('parseColorScheme', () => {
  it('accepts known names case-insensitively', () => {
    expect(parseColorScheme('Terrain')).toEqual({ kind: 'terrain' });
    expect(parseColorScheme(' heatmap ')).toEqual({ kind: 'heatmap' });
    expect(parseColorScheme('gradient')).toEqual({ kind: 'gradient', stops: DEFAULT_GRADIENT_STOPS });
  });

  it('returns null for unknown names', () => {
    expect(parseColorScheme('rainbow')).toBeNull();
  });
});
