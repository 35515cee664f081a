/**
 * System #5: StatsSystem
 *
 * Copies the frame's terrain and draw counts into RenderStats for the HUD.
 *
 * Frequency: every frame
 */

import { meshTriangleCount } from '../../world/meshBuilder';
import type { FrameContext } from '../frame';
import type { TerrainWorld } from '../world';

export function statsSystem(world: TerrainWorld, frame: FrameContext): void {
  const { stats, drawList } = frame;
  const terrain = world.terrain;

  stats.mode = terrain ? terrain.mode : null;
  stats.chunkCount = terrain ? terrain.chunks.length : 0;
  stats.vertexCount = terrain ? terrain.vertexCount : 0;
  stats.triangleCount = terrain ? terrain.triangleCount : 0;
  stats.drawCalls = drawList.length;

  let visibleTriangles = 0;
  for (const item of drawList) {
    visibleTriangles += meshTriangleCount(item.mesh);
  }
  stats.visibleTriangles = visibleTriangles;

  let visibleChunks = 0;
  const { Visible } = world.components;
  for (const eid of world.chunks.keys()) {
    if (Visible.value[eid] === 1) visibleChunks++;
  }
  stats.visibleChunks = visibleChunks;
}
