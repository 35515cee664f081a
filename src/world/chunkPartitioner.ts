/**
 * ChunkPartitioner: tiles a height grid into fixed-size chunks.
 *
 * Tiles are emitted row-major (`index = tileRow * tilesX + tileCol`), which
 * is also the draw order. A tile's sample region reaches one sample into
 * the next tile when one exists, so both tiles emit the shared edge and
 * the meshes meet without seams.
 *
 * Each chunk carries a world-space AABB whose Y range comes from its own
 * samples, which keeps culling tight on uneven terrain.
 */

import { MAX_CHUNKS, MIN_CHUNK_SIZE } from '../config';
import { createLogger } from '../core/logger';
import type {
  Aabb,
  GridWindow,
  MeshBuildOptions,
  MeshSource,
  SampleRegion,
  TerrainMeshData,
} from '../types';
import { asMeshSource, fullRegion, regionHeightBounds, type HeightGrid } from './heightGrid';
import { buildTerrainMesh } from './meshBuilder';

const log = createLogger('Partitioner');

// ── Types ──────────────────────────────────────────────────────────

export interface ChunkPlan {
  /** Creation order; stable draw order. */
  index: number;
  origin: { col: number; row: number };
  /** Nominal tile size, without the shared edge. */
  extent: { cols: number; rows: number };
  /** Samples the mesh is built from: extent plus the overlap column/row. */
  sampleRegion: SampleRegion;
}

export interface TerrainChunk extends ChunkPlan {
  mesh: TerrainMeshData;
  bounds: Aabb;
}

// ── Planning ───────────────────────────────────────────────────────

export function chunkCountFor(width: number, height: number, chunkSize: number): number {
  return Math.ceil(width / chunkSize) * Math.ceil(height / chunkSize);
}

/**
 * Clamp a requested chunk size to a usable integer and double it until the
 * grid fits in `maxChunks` tiles.
 */
export function effectiveChunkSize(
  width: number,
  height: number,
  requested: number,
  maxChunks: number = MAX_CHUNKS,
): number {
  let size = Math.max(MIN_CHUNK_SIZE, Math.floor(requested));
  if (!Number.isFinite(size)) size = MIN_CHUNK_SIZE;
  while (chunkCountFor(width, height, size) > maxChunks) {
    size *= 2;
  }
  if (size !== requested) {
    log.warn(`Chunk size ${requested} adjusted to ${size} for ${width}x${height} grid (max ${maxChunks} chunks)`);
  }
  return size;
}

/** Tile a `width x height` grid. Grids under 2 samples on either axis have no chunks. */
export function planChunks(width: number, height: number, chunkSize: number): ChunkPlan[] {
  if (width < 2 || height < 2) return [];
  const tilesX = Math.ceil(width / chunkSize);
  const tilesY = Math.ceil(height / chunkSize);
  const plans: ChunkPlan[] = [];

  for (let ty = 0; ty < tilesY; ty++) {
    const row = ty * chunkSize;
    const rows = Math.min(chunkSize, height - row);
    const regionRows = row + rows < height ? rows + 1 : rows;

    for (let tx = 0; tx < tilesX; tx++) {
      const col = tx * chunkSize;
      const cols = Math.min(chunkSize, width - col);
      const regionCols = col + cols < width ? cols + 1 : cols;

      plans.push({
        index: plans.length,
        origin: { col, row },
        extent: { cols, rows },
        sampleRegion: { col0: col, row0: row, cols: regionCols, rows: regionRows },
      });
    }
  }
  return plans;
}

/** The single plan covering the whole grid (whole-mesh modes). */
export function wholeGridPlan(grid: HeightGrid): ChunkPlan {
  return {
    index: 0,
    origin: { col: 0, row: 0 },
    extent: { cols: grid.width, rows: grid.height },
    sampleRegion: fullRegion(grid),
  };
}

// ── Bounds ─────────────────────────────────────────────────────────

/** World-space AABB of a sample region, through the mesh centering transform. */
export function chunkBounds(grid: HeightGrid, region: SampleRegion, heightScale: number): Aabb {
  const centerX = (grid.width - 1) / 2;
  const centerZ = (grid.height - 1) / 2;
  const { min, max } = regionHeightBounds(grid, region);
  const y0 = min * heightScale;
  const y1 = max * heightScale;
  return {
    minX: region.col0 - centerX,
    maxX: region.col0 + region.cols - 1 - centerX,
    minY: Math.min(y0, y1),
    maxY: Math.max(y0, y1),
    minZ: region.row0 - centerZ,
    maxZ: region.row0 + region.rows - 1 - centerZ,
  };
}

// ── Windows ────────────────────────────────────────────────────────

/**
 * Copy the samples a region's mesh build reads (the region plus a
 * one-sample halo for smooth normals) into a standalone mesh source,
 * suitable for transfer to a worker.
 */
export function extractWindow(grid: HeightGrid, region: SampleRegion): MeshSource {
  const col0 = Math.max(region.col0 - 1, 0);
  const row0 = Math.max(region.row0 - 1, 0);
  const col1 = Math.min(region.col0 + region.cols + 1, grid.width);
  const row1 = Math.min(region.row0 + region.rows + 1, grid.height);
  const cols = col1 - col0;
  const rows = row1 - row0;

  const samples = new Float32Array(cols * rows);
  const colors = grid.colors ? new Uint32Array(cols * rows) : null;
  for (let r = 0; r < rows; r++) {
    const from = (row0 + r) * grid.width + col0;
    samples.set(grid.samples.subarray(from, from + cols), r * cols);
    if (colors && grid.colors) {
      colors.set(grid.colors.subarray(from, from + cols), r * cols);
    }
  }

  const window: GridWindow = { col0, row0, cols, rows, samples, colors };
  return { width: grid.width, height: grid.height, bounds: grid.bounds, window };
}

// ── Synchronous build ──────────────────────────────────────────────

export function buildChunk(grid: HeightGrid, plan: ChunkPlan, options: MeshBuildOptions): TerrainChunk {
  return {
    ...plan,
    mesh: buildTerrainMesh(asMeshSource(grid), plan.sampleRegion, options),
    bounds: chunkBounds(grid, plan.sampleRegion, options.heightScale),
  };
}

/** Partition and mesh every chunk on the calling thread. */
export function partitionGrid(
  grid: HeightGrid,
  chunkSize: number,
  options: MeshBuildOptions,
): TerrainChunk[] {
  return planChunks(grid.width, grid.height, chunkSize).map((plan) => buildChunk(grid, plan, options));
}
