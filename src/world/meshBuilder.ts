/**
 * Height grid → triangle mesh.
 *
 * Pure data in, pure data out (no Three.js), so the same code runs on the
 * main thread and inside the mesh worker.
 *
 * Layout for sample (c, r) of a W x H grid:
 *   x = c - (W - 1) / 2,  y = h * heightScale,  z = r - (H - 1) / 2
 * Centering always uses the whole grid, so chunk meshes land exactly where
 * the same samples sit in the whole-grid mesh.
 *
 * Each quad is split along its TR-BL diagonal into (tl, bl, tr) and
 * (tr, bl, br), both counter-clockwise seen from +Y.
 *
 * Normal modes:
 *   smooth - one vertex per sample; normal = normalized sum of the unit face
 *            normals of every triangle touching the sample, including
 *            triangles of quads one sample outside the region. Chunk edge
 *            normals therefore equal whole-mesh normals.
 *   flat   - three vertices per triangle carrying its face normal; no index
 *            reuse. Each quad belongs to exactly one chunk, so chunked flat
 *            normals also match the whole mesh.
 */

import { colorForHeight, hexToRgb } from '../core/colorSchemes';
import type {
  MeshBuildOptions,
  MeshSource,
  Rgb,
  SampleRegion,
  TerrainMeshData,
  Vertex,
} from '../types';
import { asMeshSource, fullRegion, type HeightGrid } from './heightGrid';

// ── Mesh helpers ───────────────────────────────────────────────────

export function emptyMesh(): TerrainMeshData {
  return {
    positions: new Float32Array(0),
    normals: new Float32Array(0),
    colors: new Float32Array(0),
    indices: new Uint32Array(0),
  };
}

export function meshVertexCount(mesh: TerrainMeshData): number {
  return mesh.positions.length / 3;
}

export function meshTriangleCount(mesh: TerrainMeshData): number {
  return mesh.indices.length / 3;
}

/** Copy vertex `i` out of the struct-of-arrays buffers. */
export function getVertex(mesh: TerrainMeshData, i: number): Vertex {
  if (i < 0 || i >= meshVertexCount(mesh)) {
    throw new RangeError(`vertex ${i} out of range (${meshVertexCount(mesh)} vertices)`);
  }
  const o = i * 3;
  const p = mesh.positions;
  const n = mesh.normals;
  const c = mesh.colors;
  return {
    position: [p[o] ?? 0, p[o + 1] ?? 0, p[o + 2] ?? 0],
    normal: [n[o] ?? 0, n[o + 1] ?? 0, n[o + 2] ?? 0],
    color: [c[o] ?? 0, c[o + 1] ?? 0, c[o + 2] ?? 0],
  };
}

// ── Sampling ───────────────────────────────────────────────────────

interface Sampler {
  height(c: number, r: number): number;
  writeColor(c: number, r: number, out: Float32Array, offset: number): void;
}

function createSampler(source: MeshSource, options: MeshBuildOptions): Sampler {
  const { window: win, bounds } = source;
  const { colorScheme } = options;
  const rgb: Rgb = [0, 0, 0];

  const indexOf = (c: number, r: number): number => (r - win.row0) * win.cols + (c - win.col0);
  const height = (c: number, r: number): number => win.samples[indexOf(c, r)] ?? 0;

  return {
    height,
    writeColor(c, r, out, offset) {
      if (win.colors) {
        hexToRgb(win.colors[indexOf(c, r)] ?? 0, rgb);
      } else {
        colorForHeight(colorScheme, height(c, r), bounds, rgb);
      }
      out[offset] = rgb[0];
      out[offset + 1] = rgb[1];
      out[offset + 2] = rgb[2];
    },
  };
}

function assertCovered(source: MeshSource, region: SampleRegion): void {
  const win = source.window;
  if (
    region.col0 < win.col0 ||
    region.row0 < win.row0 ||
    region.col0 + region.cols > win.col0 + win.cols ||
    region.row0 + region.rows > win.row0 + win.rows ||
    win.col0 + win.cols > source.width ||
    win.row0 + win.rows > source.height
  ) {
    throw new RangeError(
      `region (${region.col0},${region.row0} ${region.cols}x${region.rows}) is not covered by ` +
      `window (${win.col0},${win.row0} ${win.cols}x${win.rows}) of ${source.width}x${source.height} grid`,
    );
  }
}

// ── Public API ─────────────────────────────────────────────────────

/**
 * Build the mesh for `region` of the grid described by `source`.
 * Regions narrower than 2 samples in either axis yield an empty mesh.
 */
export function buildTerrainMesh(
  source: MeshSource,
  region: SampleRegion,
  options: MeshBuildOptions,
): TerrainMeshData {
  if (region.cols < 2 || region.rows < 2) return emptyMesh();
  assertCovered(source, region);
  return options.normalMode === 'flat'
    ? buildFlatMesh(source, region, options)
    : buildSmoothMesh(source, region, options);
}

/** Convenience wrapper for building straight from a grid (whole grid by default). */
export function buildGridMesh(
  grid: HeightGrid,
  options: MeshBuildOptions,
  region: SampleRegion = fullRegion(grid),
): TerrainMeshData {
  return buildTerrainMesh(asMeshSource(grid), region, options);
}

// ── Smooth ─────────────────────────────────────────────────────────

function buildSmoothMesh(
  source: MeshSource,
  region: SampleRegion,
  options: MeshBuildOptions,
): TerrainMeshData {
  const { col0, row0, cols, rows } = region;
  const win = source.window;
  const sampler = createSampler(source, options);
  const scale = options.heightScale;
  const centerX = (source.width - 1) / 2;
  const centerZ = (source.height - 1) / 2;

  const vertexCount = cols * rows;
  const positions = new Float32Array(vertexCount * 3);
  const normals = new Float32Array(vertexCount * 3);
  const colors = new Float32Array(vertexCount * 3);
  const indices = new Uint32Array((cols - 1) * (rows - 1) * 6);

  let o = 0;
  for (let r = row0; r < row0 + rows; r++) {
    for (let c = col0; c < col0 + cols; c++) {
      positions[o] = c - centerX;
      positions[o + 1] = sampler.height(c, r) * scale;
      positions[o + 2] = r - centerZ;
      sampler.writeColor(c, r, colors, o);
      o += 3;
    }
  }

  let k = 0;
  for (let qr = 0; qr < rows - 1; qr++) {
    for (let qc = 0; qc < cols - 1; qc++) {
      const tl = qr * cols + qc;
      const tr = tl + 1;
      const bl = tl + cols;
      const br = bl + 1;
      indices[k++] = tl;
      indices[k++] = bl;
      indices[k++] = tr;
      indices[k++] = tr;
      indices[k++] = bl;
      indices[k++] = br;
    }
  }

  // Accumulate unit face normals over every quad touching the region,
  // in row-major quad order so the sum for a sample is the same whichever
  // region it is built from.
  const acc = new Float64Array(vertexCount * 3);
  const add = (c: number, r: number, nx: number, ny: number, nz: number): void => {
    if (c < col0 || c >= col0 + cols || r < row0 || r >= row0 + rows) return;
    const a = ((r - row0) * cols + (c - col0)) * 3;
    acc[a] = (acc[a] ?? 0) + nx;
    acc[a + 1] = (acc[a + 1] ?? 0) + ny;
    acc[a + 2] = (acc[a + 2] ?? 0) + nz;
  };

  const qc0 = Math.max(col0 - 1, win.col0);
  const qc1 = Math.min(col0 + cols - 1, win.col0 + win.cols - 2);
  const qr0 = Math.max(row0 - 1, win.row0);
  const qr1 = Math.min(row0 + rows - 1, win.row0 + win.rows - 2);

  for (let qr = qr0; qr <= qr1; qr++) {
    for (let qc = qc0; qc <= qc1; qc++) {
      const htl = sampler.height(qc, qr) * scale;
      const htr = sampler.height(qc + 1, qr) * scale;
      const hbl = sampler.height(qc, qr + 1) * scale;
      const hbr = sampler.height(qc + 1, qr + 1) * scale;

      // (tl, bl, tr)
      let nx = htl - htr;
      let nz = htl - hbl;
      let inv = 1 / Math.sqrt(nx * nx + 1 + nz * nz);
      add(qc, qr, nx * inv, inv, nz * inv);
      add(qc, qr + 1, nx * inv, inv, nz * inv);
      add(qc + 1, qr, nx * inv, inv, nz * inv);

      // (tr, bl, br)
      nx = hbl - hbr;
      nz = htr - hbr;
      inv = 1 / Math.sqrt(nx * nx + 1 + nz * nz);
      add(qc + 1, qr, nx * inv, inv, nz * inv);
      add(qc, qr + 1, nx * inv, inv, nz * inv);
      add(qc + 1, qr + 1, nx * inv, inv, nz * inv);
    }
  }

  for (let a = 0; a < acc.length; a += 3) {
    const x = acc[a] ?? 0;
    const y = acc[a + 1] ?? 0;
    const z = acc[a + 2] ?? 0;
    const inv = 1 / Math.sqrt(x * x + y * y + z * z);
    normals[a] = x * inv;
    normals[a + 1] = y * inv;
    normals[a + 2] = z * inv;
  }

  return { positions, normals, colors, indices };
}

// ── Flat ───────────────────────────────────────────────────────────

function buildFlatMesh(
  source: MeshSource,
  region: SampleRegion,
  options: MeshBuildOptions,
): TerrainMeshData {
  const { col0, row0, cols, rows } = region;
  const sampler = createSampler(source, options);
  const scale = options.heightScale;
  const centerX = (source.width - 1) / 2;
  const centerZ = (source.height - 1) / 2;

  const vertexCount = (cols - 1) * (rows - 1) * 6;
  const positions = new Float32Array(vertexCount * 3);
  const normals = new Float32Array(vertexCount * 3);
  const colors = new Float32Array(vertexCount * 3);
  const indices = new Uint32Array(vertexCount);
  for (let i = 0; i < vertexCount; i++) indices[i] = i;

  let o = 0;
  const emit = (c: number, r: number, y: number, nx: number, ny: number, nz: number): void => {
    positions[o] = c - centerX;
    positions[o + 1] = y;
    positions[o + 2] = r - centerZ;
    normals[o] = nx;
    normals[o + 1] = ny;
    normals[o + 2] = nz;
    sampler.writeColor(c, r, colors, o);
    o += 3;
  };

  for (let qr = row0; qr < row0 + rows - 1; qr++) {
    for (let qc = col0; qc < col0 + cols - 1; qc++) {
      const htl = sampler.height(qc, qr) * scale;
      const htr = sampler.height(qc + 1, qr) * scale;
      const hbl = sampler.height(qc, qr + 1) * scale;
      const hbr = sampler.height(qc + 1, qr + 1) * scale;

      let nx = htl - htr;
      let nz = htl - hbl;
      let inv = 1 / Math.sqrt(nx * nx + 1 + nz * nz);
      emit(qc, qr, htl, nx * inv, inv, nz * inv);
      emit(qc, qr + 1, hbl, nx * inv, inv, nz * inv);
      emit(qc + 1, qr, htr, nx * inv, inv, nz * inv);

      nx = hbl - hbr;
      nz = htr - hbr;
      inv = 1 / Math.sqrt(nx * nx + 1 + nz * nz);
      emit(qc + 1, qr, htr, nx * inv, inv, nz * inv);
      emit(qc, qr + 1, hbl, nx * inv, inv, nz * inv);
      emit(qc + 1, qr + 1, hbr, nx * inv, inv, nz * inv);
    }
  }

  return { positions, normals, colors, indices };
}
