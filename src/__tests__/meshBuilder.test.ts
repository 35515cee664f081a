import { describe, it, expect } from 'vitest';
import {
  buildGridMesh,
  buildTerrainMesh,
  getVertex,
  meshTriangleCount,
  meshVertexCount,
} from '../world/meshBuilder';
import { createHeightGrid, type HeightGrid } from '../world/heightGrid';
import { extractWindow, partitionGrid } from '../world/chunkPartitioner';
import { generateTerrain } from '../world/proceduralTerrain';
import type { MeshBuildOptions, TerrainMeshData } from '../types';

const SMOOTH: MeshBuildOptions = { heightScale: 1, normalMode: 'smooth', colorScheme: { kind: 'monochrome' } };
const FLAT: MeshBuildOptions = { ...SMOOTH, normalMode: 'flat' };

function gridOf(width: number, height: number, fn: (c: number, r: number) => number): HeightGrid {
  const samples: number[] = [];
  for (let r = 0; r < height; r++) {
    for (let c = 0; c < width; c++) samples.push(fn(c, r));
  }
  return createHeightGrid(width, height, samples);
}

/** Y component of (b - a) x (c - a) for triangle t. */
function triangleUpness(mesh: TerrainMeshData, t: number): number {
  const [ia, ib, ic] = [mesh.indices[t * 3] ?? 0, mesh.indices[t * 3 + 1] ?? 0, mesh.indices[t * 3 + 2] ?? 0];
  const a = getVertex(mesh, ia).position;
  const b = getVertex(mesh, ib).position;
  const c = getVertex(mesh, ic).position;
  const ux = b[0] - a[0];
  const uz = b[2] - a[2];
  const vx = c[0] - a[0];
  const vz = c[2] - a[2];
  return uz * vx - ux * vz;
}

describe('buildTerrainMesh (smooth)', () => {
  const flat4 = gridOf(4, 4, () => 0);

  it('builds one vertex per sample and two triangles per quad', () => {
    const mesh = buildGridMesh(flat4, SMOOTH);
    expect(meshVertexCount(mesh)).toBe(16);
    expect(meshTriangleCount(mesh)).toBe(18);
    expect(mesh.indices.length).toBe(54);
  });

  it('splits each quad along the TR-BL diagonal', () => {
    const mesh = buildGridMesh(flat4, SMOOTH);
    // Quad (0,0): tl=0, tr=1, bl=4, br=5
    expect(Array.from(mesh.indices.subarray(0, 6))).toEqual([0, 4, 1, 1, 4, 5]);
  });

  it('centers positions on the grid', () => {
    const mesh = buildGridMesh(flat4, SMOOTH);
    expect(getVertex(mesh, 0).position).toEqual([-1.5, 0, -1.5]);
    expect(getVertex(mesh, 15).position).toEqual([1.5, 0, 1.5]);
    expect(getVertex(mesh, 1).position).toEqual([-0.5, 0, -1.5]);
  });

  it('winds every triangle counter-clockwise seen from +Y', () => {
    const mesh = buildGridMesh(generateTerrain({ width: 6, height: 5, seed: 3 }), SMOOTH);
    for (let t = 0; t < meshTriangleCount(mesh); t++) {
      expect(triangleUpness(mesh, t)).toBeGreaterThan(0);
    }
  });

  it('gives a flat grid straight-up normals', () => {
    const mesh = buildGridMesh(flat4, SMOOTH);
    for (let i = 0; i < 16; i++) {
      expect(getVertex(mesh, i).normal).toEqual([0, 1, 0]);
    }
  });

  it('tilts normals away from an upward slope', () => {
    const ramp = gridOf(3, 3, (c) => c);
    const mesh = buildGridMesh(ramp, SMOOTH);
    const [nx, ny, nz] = getVertex(mesh, 4).normal;
    expect(nx).toBeCloseTo(-Math.SQRT1_2, 6);
    expect(ny).toBeCloseTo(Math.SQRT1_2, 6);
    expect(nz).toBeCloseTo(0, 6);
  });

  it('produces unit normals', () => {
    const mesh = buildGridMesh(generateTerrain({ width: 8, height: 8, seed: 5 }), SMOOTH);
    for (let i = 0; i < meshVertexCount(mesh); i++) {
      const [x, y, z] = getVertex(mesh, i).normal;
      expect(Math.hypot(x, y, z)).toBeCloseTo(1, 5);
      expect(y).toBeGreaterThan(0);
    }
  });

  it('applies the height scale to Y only', () => {
    const grid = gridOf(2, 2, (c, r) => c + r);
    const mesh = buildGridMesh(grid, { ...SMOOTH, heightScale: 3 });
    expect(getVertex(mesh, 3).position).toEqual([0.5, 6, 0.5]);
  });

  it('colors by height when the grid has no colors', () => {
    const grid = gridOf(2, 2, (c) => c * 10);
    const mesh = buildGridMesh(grid, SMOOTH);
    expect(getVertex(mesh, 0).color[0]).toBeCloseTo(0.1, 6);
    expect(getVertex(mesh, 1).color[0]).toBeCloseTo(1, 6);
  });

  it('prefers per-sample colors', () => {
    const grid = createHeightGrid(2, 2, [0, 0, 0, 0], [0xff0000, 0x00ff00, 0x0000ff, 0xffffff]);
    const mesh = buildGridMesh(grid, SMOOTH);
    expect(getVertex(mesh, 0).color).toEqual([1, 0, 0]);
    expect(getVertex(mesh, 2).color).toEqual([0, 0, 1]);
  });

  it('returns an empty mesh for regions under 2 samples', () => {
    const mesh = buildGridMesh(flat4, SMOOTH, { col0: 0, row0: 0, cols: 1, rows: 4 });
    expect(meshVertexCount(mesh)).toBe(0);
    expect(meshTriangleCount(mesh)).toBe(0);
  });

  it('rejects a region outside the sample window', () => {
    const source = extractWindow(flat4, { col0: 0, row0: 0, cols: 2, rows: 2 });
    expect(() => buildTerrainMesh(source, { col0: 1, row0: 1, cols: 3, rows: 3 }, SMOOTH)).toThrow(RangeError);
  });

  it('getVertex rejects out-of-range indices', () => {
    const mesh = buildGridMesh(flat4, SMOOTH);
    expect(() => getVertex(mesh, 16)).toThrow(RangeError);
  });
});

describe('buildTerrainMesh (flat)', () => {
  it('emits six unshared vertices per quad', () => {
    const mesh = buildGridMesh(gridOf(4, 4, () => 0), FLAT);
    expect(meshVertexCount(mesh)).toBe(54);
    expect(meshTriangleCount(mesh)).toBe(18);
    expect(mesh.indices[53]).toBe(53);
  });

  it('gives every vertex of a triangle its face normal', () => {
    const ramp = gridOf(2, 2, (c) => c);
    const mesh = buildGridMesh(ramp, FLAT);
    for (let i = 0; i < 6; i++) {
      const [nx, ny, nz] = getVertex(mesh, i).normal;
      expect(nx).toBeCloseTo(-Math.SQRT1_2, 6);
      expect(ny).toBeCloseTo(Math.SQRT1_2, 6);
      expect(nz).toBeCloseTo(0, 6);
    }
  });

  it('distinguishes the two triangles of a bent quad', () => {
    // Only the bottom-right corner is raised: (tl, bl, tr) stays level.
    const grid = gridOf(2, 2, (c, r) => (c === 1 && r === 1 ? 1 : 0));
    const mesh = buildGridMesh(grid, FLAT);
    expect(getVertex(mesh, 0).normal).toEqual([0, 1, 0]);
    const [nx, ny, nz] = getVertex(mesh, 3).normal;
    expect(nx).toBeCloseTo(-1 / Math.sqrt(3), 6);
    expect(ny).toBeCloseTo(1 / Math.sqrt(3), 6);
    expect(nz).toBeCloseTo(-1 / Math.sqrt(3), 6);
  });
});

describe('chunk seams', () => {
  const grid = generateTerrain({ width: 9, height: 7, seed: 11, amplitude: 4 });

  it('chunk vertices match the whole mesh exactly in smooth mode', () => {
    const whole = buildGridMesh(grid, SMOOTH);
    for (const chunk of partitionGrid(grid, 3, SMOOTH)) {
      const { col0, row0, cols } = chunk.sampleRegion;
      for (let i = 0; i < meshVertexCount(chunk.mesh); i++) {
        const c = col0 + (i % cols);
        const r = row0 + Math.floor(i / cols);
        const mine = getVertex(chunk.mesh, i);
        const theirs = getVertex(whole, r * grid.width + c);
        expect(mine.position).toEqual(theirs.position);
        expect(mine.normal).toEqual(theirs.normal);
        expect(mine.color).toEqual(theirs.color);
      }
    }
  });

  it('chunks built from extracted windows match chunks built from the grid', () => {
    for (const chunk of partitionGrid(grid, 4, SMOOTH)) {
      const fromWindow = buildTerrainMesh(extractWindow(grid, chunk.sampleRegion), chunk.sampleRegion, SMOOTH);
      expect(Array.from(fromWindow.normals)).toEqual(Array.from(chunk.mesh.normals));
      expect(Array.from(fromWindow.positions)).toEqual(Array.from(chunk.mesh.positions));
    }
  });

  it('flat chunks together hold exactly the whole mesh triangles', () => {
    const key = (m: TerrainMeshData, i: number): string => {
      const v = getVertex(m, i);
      return [...v.position, ...v.normal].join(',');
    };
    const counts = new Map<string, number>();
    const whole = buildGridMesh(grid, FLAT);
    for (let i = 0; i < meshVertexCount(whole); i++) {
      const k = key(whole, i);
      counts.set(k, (counts.get(k) ?? 0) + 1);
    }

    let total = 0;
    for (const chunk of partitionGrid(grid, 3, FLAT)) {
      total += meshTriangleCount(chunk.mesh);
      for (let i = 0; i < meshVertexCount(chunk.mesh); i++) {
        const k = key(chunk.mesh, i);
        const left = counts.get(k) ?? 0;
        expect(left).toBeGreaterThan(0);
        counts.set(k, left - 1);
      }
    }
    expect(total).toBe(meshTriangleCount(whole));
  });
});

describe('determinism', () => {
  const grid = generateTerrain({ width: 12, height: 9, seed: 21 });

  for (const options of [{ ...SMOOTH, heightScale: 3.5 }, { ...FLAT, heightScale: 3.5 }]) {
    it(`rebuilds bit-identical ${options.normalMode} meshes`, () => {
      const a = buildGridMesh(grid, options);
      const b = buildGridMesh(grid, options);
      expect(new Uint8Array(b.positions.buffer, b.positions.byteOffset, b.positions.byteLength)).toEqual(
        new Uint8Array(a.positions.buffer, a.positions.byteOffset, a.positions.byteLength),
      );
      expect(Array.from(b.indices)).toEqual(Array.from(a.indices));
      expect(Array.from(b.normals)).toEqual(Array.from(a.normals));
    });
  }
});
