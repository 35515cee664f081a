import { describe, it, expect } from 'vitest';
import {
  CULLED_MESH_MAX_SAMPLES,
  DEFAULT_CHUNK_SIZE,
  ELEVATION_LIMIT,
  MAX_CHUNKS,
  MAX_ENTITIES,
  WHOLE_MESH_MAX_SAMPLES,
  validateAndLoadConfig,
} from '../config';

describe('config', () => {
  it('loads default runtime config with valid values', () => {
    const result = validateAndLoadConfig();
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.config.appName).toBe('Relief');
    expect(result.config.chunkSize).toBe(256);
    expect(result.config.logLevel).toBe('info');
  });

  it('fails when required values are invalid', () => {
    const result = validateAndLoadConfig({ chunkSize: -1, minDistance: 100, maxDistance: 50 });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('chunkSize must be greater than 0');
    expect(result.errors).toContain('minDistance (100) must be smaller than maxDistance (50)');
  });

  it('rejects a chunk size below two samples', () => {
    const result = validateAndLoadConfig({ chunkSize: 1 });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('chunkSize (1) must be at least 2');
  });

  it('caps maxChunks at the entity store capacity', () => {
    expect(validateAndLoadConfig({ maxChunks: MAX_ENTITIES }).valid).toBe(true);
    const result = validateAndLoadConfig({ maxChunks: MAX_ENTITIES + 1 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([`maxChunks (${MAX_ENTITIES + 1}) must not exceed ${MAX_ENTITIES} entities`]);
  });

  it('rejects an elevation limit at or above PI/2', () => {
    const result = validateAndLoadConfig({ elevationLimit: Math.PI / 2 });
    expect(result.errors).toContain(`elevationLimit (${Math.PI / 2}) must be below PI/2`);
  });

  it('rejects inverted clip planes and bad log levels', () => {
    const result = validateAndLoadConfig({
      nearClip: 10,
      farClip: 5,
      logLevel: 'verbose' as never,
    });
    expect(result.errors).toContain('nearClip (10) must be smaller than farClip (5)');
    expect(result.errors).toContain('logLevel must be one of debug, info, warn, error');
  });

  it('rejects negative animation durations and blank app names', () => {
    const result = validateAndLoadConfig({ animationMs: -1, appName: '  ' });
    expect(result.errors).toContain('animationMs must be a finite number >= 0');
    expect(result.errors).toContain('appName must be a non-empty string');
  });

  it('accepts valid overrides', () => {
    const result = validateAndLoadConfig({ chunkSize: 64, workerCount: 2, animationMs: 0 });
    expect(result.valid).toBe(true);
    expect(result.config.chunkSize).toBe(64);
    expect(result.config.workerCount).toBe(2);
  });

  it('exports consistent thresholds', () => {
    expect(WHOLE_MESH_MAX_SAMPLES).toBe(1_000_000);
    expect(CULLED_MESH_MAX_SAMPLES).toBe(16_000_000);
    expect(DEFAULT_CHUNK_SIZE).toBeGreaterThanOrEqual(2);
    expect(MAX_CHUNKS).toBeGreaterThan(0);
    expect(ELEVATION_LIMIT).toBeLessThan(Math.PI / 2);
  });
});
