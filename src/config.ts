/**
 * Global constants for the Relief terrain viewer.
 * All magic numbers live here, nowhere else.
 */

import type { LogLevel } from './core/logger';

// ── Application ─────────────────────────────────────────────────
export const APP_NAME = 'Relief';

// ── Chunking ────────────────────────────────────────────────────
export const DEFAULT_CHUNK_SIZE = 256;
export const MIN_CHUNK_SIZE = 2;
export const MAX_CHUNKS = 4096; // chunk entities per terrain set
export const MAX_ENTITIES = 8192; // ECS component store capacity

// ── Render Strategy ─────────────────────────────────────────────
export const WHOLE_MESH_MAX_SAMPLES = 1000 * 1000;
export const CULLED_MESH_MAX_SAMPLES = 4000 * 4000;
export const MAX_GRID_DIMENSION = 16_384; // per axis; larger grids are forced into chunked mode

// ── Mesh ────────────────────────────────────────────────────────
export const DEFAULT_HEIGHT_SCALE = 1;
export const HEIGHT_RANGE_EPSILON = 1e-6;

// ── Camera ──────────────────────────────────────────────────────
export const DEFAULT_CAMERA_DISTANCE = 10;
export const DEFAULT_CAMERA_AZIMUTH = 0;
export const DEFAULT_CAMERA_ELEVATION = 0;
export const DEFAULT_FOV_DEG = 60;
export const MIN_FOV_DEG = 10;
export const MAX_FOV_DEG = 120;
export const NEAR_CLIP = 0.1;
export const FAR_CLIP = 10_000;
export const MIN_CAMERA_DISTANCE = 1;
export const MAX_CAMERA_DISTANCE = 5000;
export const ELEVATION_LIMIT = Math.PI / 2 - 0.1;
export const CAMERA_ANIMATION_MS = 600;

// ── Input ───────────────────────────────────────────────────────
export const ROTATE_SENSITIVITY = 0.005; // radians per pixel
export const PAN_SENSITIVITY = 0.1;
export const ZOOM_SENSITIVITY = 0.1;
export const WHEEL_NOTCH_PIXELS = 100;

// ── Rendering ───────────────────────────────────────────────────
export const TARGET_FPS = 60;
export const FRAME_BUDGET_MS = 1000 / TARGET_FPS; // 16.67ms
export const MAX_PIXEL_RATIO = 2;
export const BACKGROUND_COLOR = 0x10151c;

// ── Workers ─────────────────────────────────────────────────────
export const WORKER_COUNT = 4;

// ── Procedural Terrain ──────────────────────────────────────────
export const DEFAULT_PROCEDURAL_SIZE = 512;
export const DEFAULT_PROCEDURAL_AMPLITUDE = 40;
export const DEFAULT_PROCEDURAL_FREQUENCY = 4;

// ── Runtime Config Loading ──────────────────────────────────────
export interface RuntimeConfig {
  appName: string;
  chunkSize: number;
  maxChunks: number;
  wholeMeshMaxSamples: number;
  culledMeshMaxSamples: number;
  maxGridDimension: number;
  minDistance: number;
  maxDistance: number;
  elevationLimit: number;
  minFovDeg: number;
  maxFovDeg: number;
  nearClip: number;
  farClip: number;
  rotateSensitivity: number;
  panSensitivity: number;
  zoomSensitivity: number;
  animationMs: number;
  workerCount: number;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: RuntimeConfig;
  errors: string[];
}

const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  appName: APP_NAME,
  chunkSize: DEFAULT_CHUNK_SIZE,
  maxChunks: MAX_CHUNKS,
  wholeMeshMaxSamples: WHOLE_MESH_MAX_SAMPLES,
  culledMeshMaxSamples: CULLED_MESH_MAX_SAMPLES,
  maxGridDimension: MAX_GRID_DIMENSION,
  minDistance: MIN_CAMERA_DISTANCE,
  maxDistance: MAX_CAMERA_DISTANCE,
  elevationLimit: ELEVATION_LIMIT,
  minFovDeg: MIN_FOV_DEG,
  maxFovDeg: MAX_FOV_DEG,
  nearClip: NEAR_CLIP,
  farClip: FAR_CLIP,
  rotateSensitivity: ROTATE_SENSITIVITY,
  panSensitivity: PAN_SENSITIVITY,
  zoomSensitivity: ZOOM_SENSITIVITY,
  animationMs: CAMERA_ANIMATION_MS,
  workerCount: WORKER_COUNT,
  logLevel: 'info',
};

const INTEGER_FIELDS = [
  'chunkSize',
  'maxChunks',
  'wholeMeshMaxSamples',
  'culledMeshMaxSamples',
  'maxGridDimension',
  'workerCount',
] as const;

const POSITIVE_NUMBER_FIELDS = [
  'minDistance',
  'maxDistance',
  'elevationLimit',
  'minFovDeg',
  'maxFovDeg',
  'nearClip',
  'farClip',
  'rotateSensitivity',
  'panSensitivity',
  'zoomSensitivity',
] as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isPositiveInt(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  if (!Number.isInteger(value)) {
    errors.push(`${field} must be an integer`);
    return false;
  }
  return true;
}

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<RuntimeConfig> = {},
): ConfigValidationResult {
  const config: RuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
  const errors: string[] = [];

  for (const field of INTEGER_FIELDS) {
    isPositiveInt(config[field], field, errors);
  }

  for (const field of POSITIVE_NUMBER_FIELDS) {
    isPositiveNumber(config[field], field, errors);
  }

  if (typeof config.appName !== 'string' || config.appName.trim().length === 0) {
    errors.push('appName must be a non-empty string');
  }

  if (config.chunkSize < MIN_CHUNK_SIZE) {
    errors.push(`chunkSize (${config.chunkSize}) must be at least ${MIN_CHUNK_SIZE}`);
  }

  if (config.wholeMeshMaxSamples > config.culledMeshMaxSamples) {
    errors.push(
      `wholeMeshMaxSamples (${config.wholeMeshMaxSamples}) must not exceed ` +
      `culledMeshMaxSamples (${config.culledMeshMaxSamples})`,
    );
  }

  if (config.minDistance >= config.maxDistance) {
    errors.push(`minDistance (${config.minDistance}) must be smaller than maxDistance (${config.maxDistance})`);
  }

  if (config.maxChunks > MAX_ENTITIES) {
    errors.push(`maxChunks (${config.maxChunks}) must not exceed ${MAX_ENTITIES} entities`);
  }

  if (config.elevationLimit >= Math.PI / 2) {
    errors.push(`elevationLimit (${config.elevationLimit}) must be below PI/2`);
  }

  if (config.minFovDeg >= config.maxFovDeg || config.maxFovDeg >= 180) {
    errors.push(`FOV range [${config.minFovDeg}, ${config.maxFovDeg}] must be increasing and below 180`);
  }

  if (config.nearClip >= config.farClip) {
    errors.push(`nearClip (${config.nearClip}) must be smaller than farClip (${config.farClip})`);
  }

  if (typeof config.animationMs !== 'number' || !Number.isFinite(config.animationMs) || config.animationMs < 0) {
    errors.push('animationMs must be a finite number >= 0');
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}
