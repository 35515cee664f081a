/**
 * RenderStrategy: picks how a grid is drawn, once per build.
 *
 *   samples <  wholeMeshMaxSamples   → 'whole'         one mesh, never culled
 *   samples <  culledMeshMaxSamples  → 'whole-culled'  one mesh, one AABB test
 *   otherwise                        → 'chunked'       per-chunk frustum culling
 *
 * A grid with either dimension over maxGridDimension is forced into
 * chunked mode and reported with an advisory ResourceLimitWarning.
 */

import {
  CULLED_MESH_MAX_SAMPLES,
  MAX_GRID_DIMENSION,
  WHOLE_MESH_MAX_SAMPLES,
} from '../config';
import type { DrawItem, RenderMode, ResourceLimitWarning, TerrainMeshData } from '../types';

export interface RenderThresholds {
  wholeMeshMaxSamples: number;
  culledMeshMaxSamples: number;
  maxGridDimension: number;
}

export const DEFAULT_RENDER_THRESHOLDS: RenderThresholds = {
  wholeMeshMaxSamples: WHOLE_MESH_MAX_SAMPLES,
  culledMeshMaxSamples: CULLED_MESH_MAX_SAMPLES,
  maxGridDimension: MAX_GRID_DIMENSION,
};

export interface RenderDecision {
  mode: RenderMode;
  warning: ResourceLimitWarning | null;
}

export function chooseRenderMode(
  width: number,
  height: number,
  thresholds: RenderThresholds = DEFAULT_RENDER_THRESHOLDS,
): RenderDecision {
  const largest = Math.max(width, height);
  if (largest > thresholds.maxGridDimension) {
    return {
      mode: 'chunked',
      warning: {
        kind: 'grid_dimension',
        width,
        height,
        limit: thresholds.maxGridDimension,
        message:
          `Grid ${width}x${height} exceeds the ${thresholds.maxGridDimension} sample limit per axis; ` +
          'rendering in chunked mode',
      },
    };
  }

  const samples = width * height;
  const mode: RenderMode =
    samples < thresholds.wholeMeshMaxSamples
      ? 'whole'
      : samples < thresholds.culledMeshMaxSamples
        ? 'whole-culled'
        : 'chunked';
  return { mode, warning: null };
}

/** Whether a mode runs the per-frame frustum test at all. */
export function modeUsesCulling(mode: RenderMode): boolean {
  return mode !== 'whole';
}

/** Model matrix shared by every draw item; positions are already centered. */
export const IDENTITY_MATRIX = new Float32Array([
  1, 0, 0, 0,
  0, 1, 0, 0,
  0, 0, 1, 0,
  0, 0, 0, 1,
]);

export function createDrawItem(
  chunkIndex: number,
  mesh: TerrainMeshData,
  viewProjection: Float32Array,
): DrawItem {
  return { chunkIndex, mesh, viewProjection, modelMatrix: IDENTITY_MATRIX };
}
