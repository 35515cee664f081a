/**
 * Per-frame data shared by the ECS systems.
 */

import * as THREE from 'three';
import type { Camera } from '../camera/camera';
import type { RenderStats } from '../core/renderStats';
import type { DrawItem } from '../types';
import type { TerrainWorld } from './world';

export interface FrameContext {
  /** Wall-clock time of the frame, ms. */
  now: number;
  camera: Camera;
  /** True when the camera state changed this frame. */
  cameraMoved: boolean;
  frustum: THREE.Frustum;
  /** Column-major view-projection, fresh per frame (draw items keep it). */
  viewProjection: Float32Array;
  drawList: DrawItem[];
  stats: RenderStats;
}

export function createFrameContext(camera: Camera, stats: RenderStats): FrameContext {
  return {
    now: 0,
    camera,
    cameraMoved: false,
    frustum: new THREE.Frustum(),
    viewProjection: new Float32Array(16),
    drawList: [],
    stats,
  };
}

export type ECSSystem = (world: TerrainWorld, frame: FrameContext) => void;
