/**
 * System #3: VisibilitySystem
 *
 * Sets Visible.value on chunk entities.
 *   whole         - everything visible, no frustum test
 *   whole-culled  - the single mesh is tested against the frustum
 *   chunked       - every chunk AABB is tested against the frustum
 *
 * Frequency: every frame
 */

import { query } from 'bitecs';
import type { Aabb } from '../../types';
import { selectVisibleChunks } from '../../world/visibility';
import { modeUsesCulling } from '../../world/renderStrategy';
import type { FrameContext } from '../frame';
import type { TerrainWorld } from '../world';

interface ChunkCandidate {
  eid: number;
  bounds: Aabb;
}

export function visibilitySystem(world: TerrainWorld, frame: FrameContext): void {
  const { IsChunk, ChunkBounds, Visible } = world.components;
  const chunks = query(world, [IsChunk, ChunkBounds, Visible]);
  const cull = modeUsesCulling(world.mode);

  const candidates: ChunkCandidate[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const eid = chunks[i] ?? 0;
    Visible.value[eid] = cull ? 0 : 1;
    if (!cull) continue;
    candidates.push({
      eid,
      bounds: {
        minX: ChunkBounds.minX[eid] ?? 0,
        minY: ChunkBounds.minY[eid] ?? 0,
        minZ: ChunkBounds.minZ[eid] ?? 0,
        maxX: ChunkBounds.maxX[eid] ?? 0,
        maxY: ChunkBounds.maxY[eid] ?? 0,
        maxZ: ChunkBounds.maxZ[eid] ?? 0,
      },
    });
  }

  for (const { eid } of selectVisibleChunks(frame.frustum, candidates)) {
    Visible.value[eid] = 1;
  }
}
