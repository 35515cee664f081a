/**
 * Named camera presets. Each preset is a destination state derived from the
 * current one (target and distance are kept), meant for `Camera.animateTo`.
 */

import { degToRad } from '../core/math';
import {
  convertProjection,
  DEFAULT_CAMERA_LIMITS,
  type CameraLimits,
  type CameraState,
} from './cameraState';

export type CameraPreset = 'isometric' | 'top' | 'front' | 'side';

export const CAMERA_PRESETS: readonly CameraPreset[] = ['isometric', 'top', 'front', 'side'];

/** True isometric: 45° around, arctan(1/√2) ≈ 35.264° up. */
export const ISOMETRIC_AZIMUTH = Math.PI / 4;
export const ISOMETRIC_ELEVATION = Math.atan(1 / Math.SQRT2);

export function presetState(
  preset: CameraPreset,
  current: CameraState,
  limits: CameraLimits = DEFAULT_CAMERA_LIMITS,
): CameraState {
  switch (preset) {
    case 'isometric':
      return {
        ...current,
        azimuth: ISOMETRIC_AZIMUTH,
        elevation: ISOMETRIC_ELEVATION,
        projection: convertProjection(current.projection, 'orthographic', current.distance, limits),
      };
    case 'top':
      return { ...current, azimuth: Math.PI / 2, elevation: limits.elevationLimit };
    case 'front':
      return {
        ...current,
        azimuth: Math.PI / 2,
        elevation: degToRad(20),
        projection: convertProjection(current.projection, 'perspective', current.distance, limits),
      };
    case 'side':
      return {
        ...current,
        azimuth: 0,
        elevation: degToRad(20),
        projection: convertProjection(current.projection, 'perspective', current.distance, limits),
      };
  }
}

export function parseCameraPreset(name: string): CameraPreset | null {
  const normalized = name.trim().toLowerCase();
  return CAMERA_PRESETS.find((preset) => preset === normalized) ?? null;
}
