import { describe, it, expect } from 'vitest';
import { Camera } from '../camera/camera';
import { RenderStats } from '../core/renderStats';
import {
  chunkEntityCount,
  clearChunkEntities,
  createFrameContext,
  createTerrainWorld,
  runFramePipeline,
  syncChunkEntities,
} from '../ecs';
import { createHeightGrid, type HeightGrid } from '../world/heightGrid';
import { TerrainBuilder, type TerrainSettings } from '../world/terrainBuilder';
import type { RenderThresholds } from '../world/renderStrategy';

const SETTINGS: TerrainSettings = {
  heightScale: 1,
  normalMode: 'smooth',
  colorScheme: { kind: 'monochrome' },
  chunkSize: 4,
};

const SMALL: RenderThresholds = { wholeMeshMaxSamples: 10, culledMeshMaxSamples: 50, maxGridDimension: 100 };

function flatGrid(width: number, height: number): HeightGrid {
  return createHeightGrid(width, height, new Array<number>(width * height).fill(0));
}

function setup(grid: HeightGrid, camera: Camera, options: { thresholds?: RenderThresholds; chunkSize?: number } = {}) {
  const world = createTerrainWorld();
  const stats = new RenderStats();
  const frame = createFrameContext(camera, stats);
  const terrain = new TerrainBuilder({ thresholds: options.thresholds }).buildSync(grid, {
    ...SETTINGS,
    chunkSize: options.chunkSize ?? SETTINGS.chunkSize,
  });
  syncChunkEntities(world, terrain);
  return { world, stats, frame, terrain };
}

describe('chunk entity sync', () => {
  it('creates one entity per chunk', () => {
    const { world, terrain } = setup(flatGrid(10, 10), new Camera(), { thresholds: SMALL });
    expect(terrain.chunks.length).toBe(9);
    expect(chunkEntityCount(world)).toBe(9);
    expect(world.chunks.size).toBe(9);
    expect(world.mode).toBe('chunked');
    expect(world.terrain).toBe(terrain);
  });

  it('replaces the previous set', () => {
    const { world } = setup(flatGrid(10, 10), new Camera(), { thresholds: SMALL });
    const next = new TerrainBuilder().buildSync(flatGrid(4, 4), SETTINGS);
    syncChunkEntities(world, next);
    expect(chunkEntityCount(world)).toBe(1);
    expect(world.chunks.size).toBe(1);
    expect(world.mode).toBe('whole');
  });

  it('clears every chunk entity', () => {
    const { world } = setup(flatGrid(10, 10), new Camera(), { thresholds: SMALL });
    clearChunkEntities(world);
    expect(chunkEntityCount(world)).toBe(0);
    expect(world.chunks.size).toBe(0);
  });

  it('keeps worlds independent', () => {
    const a = setup(flatGrid(10, 10), new Camera(), { thresholds: SMALL });
    const b = setup(flatGrid(4, 4), new Camera());
    expect(chunkEntityCount(a.world)).toBe(9);
    expect(chunkEntityCount(b.world)).toBe(1);
  });
});

describe('runFramePipeline', () => {
  // Eye at (10, 0, 20) looking down -X: the whole grid sits off to the side.
  const lookingAway = (): Camera => new Camera({ target: [0, 0, 20] });

  it('draws the whole mesh without a frustum test', () => {
    const { world, frame } = setup(flatGrid(4, 4), lookingAway());
    runFramePipeline(world, frame);
    expect(frame.drawList.map((d) => d.chunkIndex)).toEqual([0]);
  });

  it('culls the whole mesh in whole-culled mode', () => {
    const { world, frame, terrain } = setup(flatGrid(5, 5), lookingAway(), { thresholds: SMALL });
    expect(terrain.mode).toBe('whole-culled');
    runFramePipeline(world, frame);
    expect(frame.drawList).toEqual([]);
  });

  it('culls chunks outside the frustum and orders the rest by index', () => {
    // Eye at (10, 0, 6): the two far-side chunks of the first tile row fall
    // outside the 60° view.
    const { world, frame } = setup(flatGrid(10, 10), new Camera({ target: [0, 0, 6] }), { thresholds: SMALL });
    runFramePipeline(world, frame);
    expect(frame.drawList.map((d) => d.chunkIndex)).toEqual([0, 3, 4, 5, 6, 7, 8]);
  });

  it('shares one view-projection across the frame', () => {
    const camera = new Camera();
    const { world, frame } = setup(flatGrid(10, 10), camera, { thresholds: SMALL });
    runFramePipeline(world, frame);
    const [first, ...rest] = frame.drawList;
    expect(first?.viewProjection).toEqual(new Float32Array(camera.viewProjectionMatrix().elements));
    for (const item of rest) {
      expect(item.viewProjection).toBe(first?.viewProjection);
    }
  });

  it('skips chunks with empty meshes', () => {
    // 7x6 at size 3: tiles 2 and 5 are one sample wide.
    const { world, frame, stats } = setup(flatGrid(7, 6), new Camera(), {
      thresholds: { wholeMeshMaxSamples: 10, culledMeshMaxSamples: 20, maxGridDimension: 100 },
      chunkSize: 3,
    });
    runFramePipeline(world, frame);
    expect(frame.drawList.map((d) => d.chunkIndex)).toEqual([0, 1, 3, 4]);
    expect(stats.visibleChunks).toBe(6);
    expect(stats.drawCalls).toBe(4);
    expect(stats.visibleTriangles).toBe(18 + 18 + 12 + 12);
  });

  it('fills the render stats', () => {
    const { world, frame, stats, terrain } = setup(flatGrid(10, 10), new Camera({ target: [0, 0, 6] }), {
      thresholds: SMALL,
    });
    runFramePipeline(world, frame);
    expect(stats.mode).toBe('chunked');
    expect(stats.chunkCount).toBe(9);
    expect(stats.visibleChunks).toBe(7);
    expect(stats.drawCalls).toBe(7);
    expect(stats.vertexCount).toBe(terrain.vertexCount);
    expect(stats.triangleCount).toBe(162);
  });

  it('flags camera motion only while an animation runs', () => {
    const camera = new Camera();
    const { world, frame } = setup(flatGrid(4, 4), camera);

    frame.now = 0;
    runFramePipeline(world, frame);
    expect(frame.cameraMoved).toBe(false);

    camera.animateTo({ ...camera.getState(), distance: 30 }, 0, 100);
    frame.now = 50;
    runFramePipeline(world, frame);
    expect(frame.cameraMoved).toBe(true);
    expect(camera.getState().distance).toBe(20);
  });
});
