/**
 * ECS public API.
 *
 * Re-exports the pieces needed by the viewer and tests.
 */

export { createTerrainWorld } from './world';
export type { TerrainWorld, TerrainWorldContext } from './world';
export { createChunkComponents } from './components';
export type { ChunkComponents } from './components';
export { addChunkArchetype, createChunkEntity } from './archetypes';
export { chunkEntityCount, clearChunkEntities, syncChunkEntities } from './chunkSync';
export { createFrameContext } from './frame';
export type { ECSSystem, FrameContext } from './frame';
export { runFramePipeline } from './pipeline';
