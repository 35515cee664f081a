/**
 * HeightGrid: the immutable rectangular sample array every mesh is built from.
 *
 * Samples are row-major (`row * width + col`). Optional colors are packed
 * 0xRRGGBB values parallel to the samples. Construction copies its inputs,
 * so callers may reuse their buffers; nothing in the pipeline mutates a
 * grid afterwards (height scale is applied at mesh-build time).
 */

import type { GridWindow, HeightBounds, MeshSource, SampleRegion } from '../types';

export interface HeightGrid {
  readonly width: number;
  readonly height: number;
  readonly samples: Float32Array;
  readonly colors: Uint32Array | null;
  readonly bounds: HeightBounds;
}

/** Precondition violation: the grid handed to the pipeline is malformed. */
export class HeightGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HeightGridError';
  }
}

// ── Construction ────────────────────────────────────────────────

export function createHeightGrid(
  width: number,
  height: number,
  samples: ArrayLike<number>,
  colors: ArrayLike<number> | null = null,
): HeightGrid {
  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new HeightGridError(`grid dimensions must be positive integers, got ${width}x${height}`);
  }
  const count = width * height;
  if (samples.length !== count) {
    throw new HeightGridError(`expected ${count} samples for ${width}x${height}, got ${samples.length}`);
  }
  if (colors && colors.length !== count) {
    throw new HeightGridError(`expected ${count} colors for ${width}x${height}, got ${colors.length}`);
  }

  const sampleCopy = Float32Array.from(samples);
  for (let i = 0; i < count; i++) {
    if (!Number.isFinite(sampleCopy[i])) {
      throw new HeightGridError(
        `sample at col ${i % width}, row ${Math.floor(i / width)} is not finite`,
      );
    }
  }

  return {
    width,
    height,
    samples: sampleCopy,
    colors: colors ? Uint32Array.from(colors) : null,
    bounds: computeHeightBounds(sampleCopy),
  };
}

/**
 * Build a grid from parsed rows. Every row must have the same length;
 * `colorRows`, when given, must mirror the shape of `rows`.
 */
export function heightGridFromRows(
  rows: readonly (readonly number[])[],
  colorRows: readonly (readonly number[])[] | null = null,
): HeightGrid {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const samples = new Float32Array(width * height);
  const colors = colorRows ? new Uint32Array(width * height) : null;

  rows.forEach((row, r) => {
    if (row.length !== width) {
      throw new HeightGridError(`row ${r} has ${row.length} samples, expected ${width}`);
    }
    samples.set(row, r * width);
    if (colors && colorRows) {
      const colorRow = colorRows[r];
      if (!colorRow || colorRow.length !== width) {
        throw new HeightGridError(`color row ${r} does not match its sample row`);
      }
      colors.set(colorRow, r * width);
    }
  });

  return createHeightGrid(width, height, samples, colors);
}

// ── Queries ─────────────────────────────────────────────────────

/** Min/max over a sample set; (0, 0) when empty. */
export function computeHeightBounds(samples: ArrayLike<number>): HeightBounds {
  if (samples.length === 0) return { min: 0, max: 0 };
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < samples.length; i++) {
    const h = samples[i];
    if (h === undefined) continue;
    if (h < min) min = h;
    if (h > max) max = h;
  }
  return { min, max };
}

export function sampleAt(grid: HeightGrid, col: number, row: number): number {
  if (col < 0 || col >= grid.width || row < 0 || row >= grid.height) {
    throw new RangeError(`sample (${col}, ${row}) outside ${grid.width}x${grid.height} grid`);
  }
  return grid.samples[row * grid.width + col] ?? 0;
}

/** Tight min/max of the samples inside a region. */
export function regionHeightBounds(grid: HeightGrid, region: SampleRegion): HeightBounds {
  let min = Infinity;
  let max = -Infinity;
  for (let r = region.row0; r < region.row0 + region.rows; r++) {
    const rowStart = r * grid.width;
    for (let c = region.col0; c < region.col0 + region.cols; c++) {
      const h = grid.samples[rowStart + c] ?? 0;
      if (h < min) min = h;
      if (h > max) max = h;
    }
  }
  return min <= max ? { min, max } : { min: 0, max: 0 };
}

export function fullRegion(grid: HeightGrid): SampleRegion {
  return { col0: 0, row0: 0, cols: grid.width, rows: grid.height };
}

/** A mesh source that reads straight from the grid's own buffers (no copy). */
export function asMeshSource(grid: HeightGrid): MeshSource {
  const window: GridWindow = {
    ...fullRegion(grid),
    samples: grid.samples,
    colors: grid.colors,
  };
  return { width: grid.width, height: grid.height, bounds: grid.bounds, window };
}

/** Total sample count, the quantity render-mode thresholds compare against. */
export function sampleCount(grid: Pick<HeightGrid, 'width' | 'height'>): number {
  return grid.width * grid.height;
}
