/**
 * Entity archetype factory functions.
 */

import { addComponent, addEntity } from 'bitecs';
import type { TerrainChunk } from '../world/chunkPartitioner';
import type { TerrainWorld } from './world';

export function addChunkArchetype(world: TerrainWorld, eid: number, chunk: TerrainChunk): void {
  const { IsChunk, ChunkIndex, ChunkBounds, Visible } = world.components;
  addComponent(world, eid, IsChunk);
  addComponent(world, eid, ChunkIndex);
  addComponent(world, eid, ChunkBounds);
  addComponent(world, eid, Visible);

  ChunkIndex.value[eid] = chunk.index;
  ChunkBounds.minX[eid] = chunk.bounds.minX;
  ChunkBounds.minY[eid] = chunk.bounds.minY;
  ChunkBounds.minZ[eid] = chunk.bounds.minZ;
  ChunkBounds.maxX[eid] = chunk.bounds.maxX;
  ChunkBounds.maxY[eid] = chunk.bounds.maxY;
  ChunkBounds.maxZ[eid] = chunk.bounds.maxZ;
  Visible.value[eid] = 0;
  world.chunks.set(eid, chunk);
}

/** Create a new chunk entity and return its eid. */
export function createChunkEntity(world: TerrainWorld, chunk: TerrainChunk): number {
  const eid = addEntity(world);
  addChunkArchetype(world, eid, chunk);
  return eid;
}
