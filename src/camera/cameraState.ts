/**
 * Orbital camera state and its pure transition function.
 *
 * The eye orbits `target` on a sphere:
 *   eye = target + distance * (cos(el) cos(az), sin(el), cos(el) sin(az))
 * Azimuth wraps into [0, 2π); elevation is clamped strictly inside
 * (-π/2, π/2) so the look-at basis never degenerates.
 *
 * Every mutation goes through `applyCameraCommand(state, command)`, which
 * returns a new state and never touches its input.
 */

import {
  DEFAULT_CAMERA_AZIMUTH,
  DEFAULT_CAMERA_DISTANCE,
  DEFAULT_CAMERA_ELEVATION,
  DEFAULT_FOV_DEG,
  ELEVATION_LIMIT,
  FAR_CLIP,
  MAX_CAMERA_DISTANCE,
  MAX_FOV_DEG,
  MIN_CAMERA_DISTANCE,
  MIN_FOV_DEG,
  NEAR_CLIP,
  ZOOM_SENSITIVITY,
} from '../config';
import { clamp, degToRad, wrapAngle } from '../core/math';
import type { Vec3Tuple } from '../types';

// ── Types ──────────────────────────────────────────────────────────

export type Projection =
  | { kind: 'perspective'; fovY: number; near: number; far: number }
  | { kind: 'orthographic'; halfHeight: number; near: number; far: number };

export type ProjectionKind = Projection['kind'];

export interface CameraState {
  distance: number;
  /** Radians, [0, 2π). */
  azimuth: number;
  /** Radians, within ±limits.elevationLimit. */
  elevation: number;
  target: Vec3Tuple;
  projection: Projection;
}

export interface CameraLimits {
  minDistance: number;
  maxDistance: number;
  elevationLimit: number;
  minFovY: number;
  maxFovY: number;
  zoomSensitivity: number;
}

export type CameraCommand =
  | { type: 'orbit'; dAzimuth: number; dElevation: number }
  | { type: 'zoom'; delta: number }
  | { type: 'pan'; dx: number; dy: number }
  | { type: 'setProjection'; kind: ProjectionKind }
  | { type: 'toggleProjection' }
  | { type: 'setFov'; fovY: number }
  | { type: 'reset'; home?: CameraState }
  | { type: 'frameGrid'; width: number; height: number; minHeight: number; maxHeight: number };

export const DEFAULT_CAMERA_LIMITS: CameraLimits = {
  minDistance: MIN_CAMERA_DISTANCE,
  maxDistance: MAX_CAMERA_DISTANCE,
  elevationLimit: ELEVATION_LIMIT,
  minFovY: degToRad(MIN_FOV_DEG),
  maxFovY: degToRad(MAX_FOV_DEG),
  zoomSensitivity: ZOOM_SENSITIVITY,
};

export function createCameraState(overrides: Partial<CameraState> = {}): CameraState {
  return {
    distance: DEFAULT_CAMERA_DISTANCE,
    azimuth: DEFAULT_CAMERA_AZIMUTH,
    elevation: DEFAULT_CAMERA_ELEVATION,
    target: [0, 0, 0],
    projection: { kind: 'perspective', fovY: degToRad(DEFAULT_FOV_DEG), near: NEAR_CLIP, far: FAR_CLIP },
    ...overrides,
  };
}

// ── Derived vectors ────────────────────────────────────────────────

export function eyePosition(state: CameraState, out: Vec3Tuple = [0, 0, 0]): Vec3Tuple {
  const cosEl = Math.cos(state.elevation);
  out[0] = state.target[0] + state.distance * cosEl * Math.cos(state.azimuth);
  out[1] = state.target[1] + state.distance * Math.sin(state.elevation);
  out[2] = state.target[2] + state.distance * cosEl * Math.sin(state.azimuth);
  return out;
}

/** Unit camera axes: forward (eye → target), right = forward × Y, up = right × forward. */
export function cameraBasis(state: CameraState): { forward: Vec3Tuple; right: Vec3Tuple; up: Vec3Tuple } {
  const cosEl = Math.cos(state.elevation);
  const forward: Vec3Tuple = [
    -cosEl * Math.cos(state.azimuth),
    -Math.sin(state.elevation),
    -cosEl * Math.sin(state.azimuth),
  ];
  // forward × (0, 1, 0) = (-fz, 0, fx)
  const rx = -forward[2];
  const rz = forward[0];
  const rLen = Math.hypot(rx, rz);
  const right: Vec3Tuple = [rx / rLen, 0, rz / rLen];
  const up: Vec3Tuple = [
    right[1] * forward[2] - right[2] * forward[1],
    right[2] * forward[0] - right[0] * forward[2],
    right[0] * forward[1] - right[1] * forward[0],
  ];
  return { forward, right, up };
}

// ── Projection conversion ──────────────────────────────────────────

/**
 * Convert a projection to `kind`, keeping the visible height at the target
 * plane unchanged: halfHeight = distance * tan(fovY / 2).
 */
export function convertProjection(
  projection: Projection,
  kind: ProjectionKind,
  distance: number,
  limits: CameraLimits = DEFAULT_CAMERA_LIMITS,
): Projection {
  if (projection.kind === kind) return projection;
  const { near, far } = projection;
  if (projection.kind === 'perspective') {
    return { kind: 'orthographic', halfHeight: distance * Math.tan(projection.fovY / 2), near, far };
  }
  const fovY = clamp(2 * Math.atan(projection.halfHeight / distance), limits.minFovY, limits.maxFovY);
  return { kind: 'perspective', fovY, near, far };
}

// ── Transition function ────────────────────────────────────────────

export function applyCameraCommand(
  state: CameraState,
  command: CameraCommand,
  limits: CameraLimits = DEFAULT_CAMERA_LIMITS,
): CameraState {
  switch (command.type) {
    case 'orbit':
      return {
        ...state,
        azimuth: wrapAngle(state.azimuth + command.dAzimuth),
        elevation: clamp(state.elevation + command.dElevation, -limits.elevationLimit, limits.elevationLimit),
      };

    case 'zoom': {
      const distance = clamp(
        state.distance * Math.exp(-command.delta * limits.zoomSensitivity),
        limits.minDistance,
        limits.maxDistance,
      );
      const ratio = distance / state.distance;
      const projection: Projection =
        state.projection.kind === 'orthographic'
          ? { ...state.projection, halfHeight: state.projection.halfHeight * ratio }
          : state.projection;
      return { ...state, distance, projection };
    }

    case 'pan': {
      const { right, up } = cameraBasis(state);
      const [tx, ty, tz] = state.target;
      return {
        ...state,
        target: [
          tx + right[0] * command.dx + up[0] * command.dy,
          ty + right[1] * command.dx + up[1] * command.dy,
          tz + right[2] * command.dx + up[2] * command.dy,
        ],
      };
    }

    case 'setProjection':
      return { ...state, projection: convertProjection(state.projection, command.kind, state.distance, limits) };

    case 'toggleProjection': {
      const kind: ProjectionKind = state.projection.kind === 'perspective' ? 'orthographic' : 'perspective';
      return { ...state, projection: convertProjection(state.projection, kind, state.distance, limits) };
    }

    case 'setFov': {
      // No field of view in orthographic projection.
      if (state.projection.kind !== 'perspective') return state;
      const fovY = clamp(command.fovY, limits.minFovY, limits.maxFovY);
      return { ...state, projection: { ...state.projection, fovY } };
    }

    case 'reset':
      return command.home ?? createCameraState();

    case 'frameGrid':
      return frameGrid(state, command, limits);
  }
}

/**
 * Aim at the grid's center from far enough away that the whole grid fits
 * a 60° view, and push the far plane out to cover it.
 */
function frameGrid(
  state: CameraState,
  command: Extract<CameraCommand, { type: 'frameGrid' }>,
  limits: CameraLimits,
): CameraState {
  const heightSpan = Math.abs(command.maxHeight - command.minHeight);
  const radius = 0.5 * Math.hypot(command.width, command.height, heightSpan);
  const distance = clamp(radius / Math.tan(degToRad(DEFAULT_FOV_DEG) / 2), limits.minDistance, limits.maxDistance);
  const far = Math.max(state.projection.far, (distance + radius) * 2);
  const midY = (command.minHeight + command.maxHeight) / 2;
  const projection: Projection =
    state.projection.kind === 'perspective'
      ? { ...state.projection, far }
      : { ...state.projection, far, halfHeight: radius };
  return { ...state, distance, target: [0, midY, 0], projection };
}
