/**
 * Eased camera transitions.
 *
 * Distance, elevation, target and projection parameters are interpolated
 * with ease-in-out cubic; azimuth follows the shorter arc, so 350° → 10°
 * passes through 0° rather than sweeping back through 180°. When the
 * projection kind changes, the start projection is first converted to the
 * destination kind so the framing does not jump.
 */

import { easeInOutCubic, lerp, shortestAngleDelta, wrapAngle } from '../core/math';
import {
  convertProjection,
  DEFAULT_CAMERA_LIMITS,
  type CameraLimits,
  type CameraState,
  type Projection,
} from './cameraState';

export interface CameraAnimation {
  from: CameraState;
  to: CameraState;
  startTime: number;
  durationMs: number;
  limits: CameraLimits;
}

export function startCameraAnimation(
  from: CameraState,
  to: CameraState,
  durationMs: number,
  now: number,
  limits: CameraLimits = DEFAULT_CAMERA_LIMITS,
): CameraAnimation {
  return { from, to, startTime: now, durationMs, limits };
}

/** Interpolate between two states at eased parameter `e` in [0, 1]. */
export function interpolateCameraState(
  from: CameraState,
  to: CameraState,
  e: number,
  limits: CameraLimits = DEFAULT_CAMERA_LIMITS,
): CameraState {
  const start = convertProjection(from.projection, to.projection.kind, from.distance, limits);
  let projection: Projection;
  if (start.kind === 'perspective' && to.projection.kind === 'perspective') {
    projection = {
      kind: 'perspective',
      fovY: lerp(start.fovY, to.projection.fovY, e),
      near: lerp(start.near, to.projection.near, e),
      far: lerp(start.far, to.projection.far, e),
    };
  } else if (start.kind === 'orthographic' && to.projection.kind === 'orthographic') {
    projection = {
      kind: 'orthographic',
      halfHeight: lerp(start.halfHeight, to.projection.halfHeight, e),
      near: lerp(start.near, to.projection.near, e),
      far: lerp(start.far, to.projection.far, e),
    };
  } else {
    projection = to.projection;
  }

  return {
    distance: lerp(from.distance, to.distance, e),
    azimuth: wrapAngle(from.azimuth + shortestAngleDelta(from.azimuth, to.azimuth) * e),
    elevation: lerp(from.elevation, to.elevation, e),
    target: [
      lerp(from.target[0], to.target[0], e),
      lerp(from.target[1], to.target[1], e),
      lerp(from.target[2], to.target[2], e),
    ],
    projection,
  };
}

/**
 * State of an animation at wall-clock `now` (ms). The final sample is the
 * destination state itself, not an interpolated approximation of it.
 */
export function sampleCameraAnimation(
  animation: CameraAnimation,
  now: number,
): { state: CameraState; done: boolean } {
  const elapsed = now - animation.startTime;
  if (animation.durationMs <= 0 || elapsed >= animation.durationMs) {
    return { state: animation.to, done: true };
  }
  const t = Math.max(0, elapsed / animation.durationMs);
  return {
    state: interpolateCameraState(animation.from, animation.to, easeInOutCubic(t), animation.limits),
    done: false,
  };
}
