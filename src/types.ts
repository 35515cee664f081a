/**
 * Core type definitions for the Relief terrain viewer.
 */

// ── Vectors ─────────────────────────────────────────────────────

export type Vec3Tuple = [number, number, number];

/** Linear RGB, each channel in [0, 1]. */
export type Rgb = [number, number, number];

// ── Grid ────────────────────────────────────────────────────────

export interface HeightBounds {
  min: number;
  max: number;
}

/** Rectangular range of sample indices within a parent grid. */
export interface SampleRegion {
  col0: number;
  row0: number;
  cols: number;
  rows: number;
}

/**
 * A copy of (part of) a grid's samples. Indices stay in parent-grid
 * space: sample (c, r) lives at `(r - row0) * cols + (c - col0)`.
 */
export interface GridWindow extends SampleRegion {
  samples: Float32Array;
  colors: Uint32Array | null;
}

/** Everything a mesh build needs: the parent grid's frame plus the samples it may read. */
export interface MeshSource {
  width: number;
  height: number;
  bounds: HeightBounds;
  window: GridWindow;
}

// ── Mesh ────────────────────────────────────────────────────────

/** Struct-of-arrays vertex data, 3 floats per vertex, CCW triangles seen from +Y. */
export interface TerrainMeshData {
  positions: Float32Array;
  normals: Float32Array;
  colors: Float32Array;
  indices: Uint32Array;
}

export interface Vertex {
  position: Vec3Tuple;
  color: Rgb;
  normal: Vec3Tuple;
}

export type NormalMode = 'smooth' | 'flat';

export interface GradientStop {
  /** Normalized height in [0, 1]. */
  at: number;
  color: Rgb;
}

export type ColorScheme =
  | { kind: 'terrain' }
  | { kind: 'heatmap' }
  | { kind: 'monochrome' }
  | { kind: 'gradient'; stops: readonly GradientStop[] };

export type ColorSchemeKind = ColorScheme['kind'];

export interface MeshBuildOptions {
  heightScale: number;
  normalMode: NormalMode;
  colorScheme: ColorScheme;
}

// ── Chunks & Culling ────────────────────────────────────────────

export interface Aabb {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
}

export type RenderMode = 'whole' | 'whole-culled' | 'chunked';

export interface ResourceLimitWarning {
  kind: 'grid_dimension';
  width: number;
  height: number;
  limit: number;
  message: string;
}

/** One drawable handed to the shading stage. */
export interface DrawItem {
  chunkIndex: number;
  mesh: TerrainMeshData;
  /** Column-major 4x4, shared by every item of a frame. */
  viewProjection: Float32Array;
  /** Column-major 4x4; identity because centering is baked into positions. */
  modelMatrix: Float32Array;
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = never>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T = never, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

// ── Worker Messages ─────────────────────────────────────────────

export interface MeshWorkerRequest {
  id: number;
  type: 'BUILD_MESH';
  source: MeshSource;
  region: SampleRegion;
  options: MeshBuildOptions;
}

export interface MeshWorkerResponse {
  id: number;
  type: 'MESH_READY' | 'ERROR';
  meshData?: TerrainMeshData;
  error?: string;
}
