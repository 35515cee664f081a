/**
 * ECS world for the terrain viewer.
 *
 * Each viewer owns one bitECS world. The world's context carries its
 * component stores, so two viewers (or two tests) never share eid slots.
 */

import { createWorld, type World } from 'bitecs';
import { MAX_ENTITIES } from '../config';
import type { RenderMode } from '../types';
import type { TerrainChunk } from '../world/chunkPartitioner';
import type { TerrainSet } from '../world/terrainBuilder';
import { createChunkComponents, type ChunkComponents } from './components';

export interface TerrainWorldContext {
  components: ChunkComponents;
  /** Chunk payload by eid (meshes stay out of the TypedArray stores). */
  chunks: Map<number, TerrainChunk>;
  terrain: TerrainSet | null;
  mode: RenderMode;
}

export type TerrainWorld = World<TerrainWorldContext>;

export function createTerrainWorld(): TerrainWorld {
  return createWorld<TerrainWorldContext>({
    components: createChunkComponents(MAX_ENTITIES),
    chunks: new Map(),
    terrain: null,
    mode: 'whole',
  });
}
