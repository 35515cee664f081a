/**
 * System #4: DrawListSystem
 *
 * Emits one DrawItem per visible chunk with a non-empty mesh, ordered by
 * chunk index (creation order), all sharing the frame's view-projection.
 *
 * Frequency: every frame
 */

import { query } from 'bitecs';
import type { DrawItem } from '../../types';
import { createDrawItem } from '../../world/renderStrategy';
import type { FrameContext } from '../frame';
import type { TerrainWorld } from '../world';

export function drawListSystem(world: TerrainWorld, frame: FrameContext): void {
  const { IsChunk, ChunkIndex, Visible } = world.components;
  const chunks = query(world, [IsChunk, ChunkIndex, Visible]);

  const visible: number[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const eid = chunks[i] ?? 0;
    if (Visible.value[eid] === 1) visible.push(eid);
  }
  visible.sort((a, b) => (ChunkIndex.value[a] ?? 0) - (ChunkIndex.value[b] ?? 0));

  const drawList: DrawItem[] = [];
  for (const eid of visible) {
    const chunk = world.chunks.get(eid);
    if (!chunk || chunk.mesh.indices.length === 0) continue;
    drawList.push(createDrawItem(chunk.index, chunk.mesh, frame.viewProjection));
  }
  frame.drawList = drawList;
}
