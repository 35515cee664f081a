/**
 * ECS component definitions (bitECS v0.4 API).
 *
 * Components are plain objects with pre-allocated TypedArray stores,
 * indexed by entity ID (eid). No Three.js objects, data only.
 *
 * Convention: Float64Array for world-space bounds,
 *             Uint8Array for booleans,
 *             Uint32Array for indices.
 */

export function createChunkComponents(n: number) {
  return {
    /** Tag: entity is a terrain chunk. */
    IsChunk: {},

    /** Row-major tile index; the draw order. */
    ChunkIndex: {
      value: new Uint32Array(n),
    },

    /** World-space AABB of the chunk's mesh. */
    ChunkBounds: {
      minX: new Float64Array(n),
      minY: new Float64Array(n),
      minZ: new Float64Array(n),
      maxX: new Float64Array(n),
      maxY: new Float64Array(n),
      maxZ: new Float64Array(n),
    },

    /** 1 if the chunk passed this frame's visibility test. */
    Visible: {
      value: new Uint8Array(n),
    },
  };
}

export type ChunkComponents = ReturnType<typeof createChunkComponents>;
