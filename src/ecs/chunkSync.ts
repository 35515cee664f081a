/**
 * Mirrors a TerrainSet into the ECS world: one entity per chunk.
 * A new set replaces every chunk entity of the previous one.
 */

import { query, removeEntity } from 'bitecs';
import type { TerrainSet } from '../world/terrainBuilder';
import { createChunkEntity } from './archetypes';
import type { TerrainWorld } from './world';

export function clearChunkEntities(world: TerrainWorld): void {
  const eids = [...query(world, [world.components.IsChunk])];
  for (const eid of eids) {
    removeEntity(world, eid);
  }
  world.chunks.clear();
}

export function syncChunkEntities(world: TerrainWorld, terrain: TerrainSet): void {
  clearChunkEntities(world);
  for (const chunk of terrain.chunks) {
    createChunkEntity(world, chunk);
  }
  world.terrain = terrain;
  world.mode = terrain.mode;
}

export function chunkEntityCount(world: TerrainWorld): number {
  return query(world, [world.components.IsChunk]).length;
}
