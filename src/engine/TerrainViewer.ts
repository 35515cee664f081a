/**
 * TerrainViewer: the headless core of the application.
 *
 * Owns the current grid, the display settings, the camera, the terrain
 * builder and the ECS world. The browser shell feeds it input and asks it
 * for a draw list once per frame; nothing in here touches the DOM or GPU.
 *
 * Mesh-affecting settings (color scheme, normal mode, height scale, chunk
 * size) trigger a rebuild. Camera settings apply immediately or animate.
 * A failed rebuild keeps the previous terrain on screen.
 */

import { DEFAULT_HEIGHT_SCALE, validateAndLoadConfig, type RuntimeConfig } from '../config';
import { Camera } from '../camera/camera';
import { presetState, type CameraPreset } from '../camera/cameraPresets';
import {
  createCameraState,
  type CameraCommand,
  type CameraLimits,
  type CameraState,
  type ProjectionKind,
} from '../camera/cameraState';
import type { InputAction } from '../camera/inputController';
import { EventBus, type ViewerEventMap } from '../core/eventBus';
import { createLogger } from '../core/logger';
import { degToRad } from '../core/math';
import { RenderStats, type RenderStatsSnapshot } from '../core/renderStats';
import {
  createFrameContext,
  createTerrainWorld,
  runFramePipeline,
  syncChunkEntities,
  clearChunkEntities,
  type FrameContext,
  type TerrainWorld,
} from '../ecs';
import type { ColorScheme, DrawItem, NormalMode } from '../types';
import type { WorkerPool } from '../workers/workerPool';
import type { HeightGrid } from '../world/heightGrid';
import { generateTerrain, type TerrainParams } from '../world/proceduralTerrain';
import { TerrainBuilder, type TerrainSet, type TerrainSettings } from '../world/terrainBuilder';

const log = createLogger('Viewer');

// ── Types ──────────────────────────────────────────────────────────

export type ConfigEvent =
  | { type: 'colorScheme'; scheme: ColorScheme }
  | { type: 'normalMode'; mode: NormalMode }
  | { type: 'heightScale'; scale: number }
  | { type: 'chunkSize'; size: number }
  | { type: 'projection'; kind: ProjectionKind }
  | { type: 'cameraPreset'; preset: CameraPreset }
  | { type: 'fov'; fovY: number };

export interface TerrainViewerOptions {
  config?: Partial<RuntimeConfig>;
  settings?: Partial<TerrainSettings>;
  /** Off-thread builds; omitted means synchronous builds. Not owned by the viewer. */
  pool?: WorkerPool | null;
  events?: EventBus<ViewerEventMap>;
}

export function cameraLimitsFromConfig(config: RuntimeConfig): CameraLimits {
  return {
    minDistance: config.minDistance,
    maxDistance: config.maxDistance,
    elevationLimit: config.elevationLimit,
    minFovY: degToRad(config.minFovDeg),
    maxFovY: degToRad(config.maxFovDeg),
    zoomSensitivity: config.zoomSensitivity,
  };
}

// ── TerrainViewer ──────────────────────────────────────────────────

export class TerrainViewer {
  readonly config: RuntimeConfig;
  readonly events: EventBus<ViewerEventMap>;
  readonly camera: Camera;
  readonly world: TerrainWorld;

  private readonly builder: TerrainBuilder;
  private readonly renderStats = new RenderStats();
  private readonly frameContext: FrameContext;
  private grid: HeightGrid | null = null;
  private settings: TerrainSettings;
  private terrain: TerrainSet | null = null;
  private lastCameraState: CameraState;

  constructor(options: TerrainViewerOptions = {}) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) {
      throw new Error(`Invalid viewer config: ${errors.join('; ')}`);
    }
    this.config = config;
    this.events = options.events ?? new EventBus<ViewerEventMap>();
    this.settings = {
      heightScale: DEFAULT_HEIGHT_SCALE,
      normalMode: 'smooth',
      colorScheme: { kind: 'terrain' },
      chunkSize: config.chunkSize,
      ...options.settings,
    };

    const limits = cameraLimitsFromConfig(config);
    const initial = createCameraState();
    this.camera = new Camera(
      { projection: { ...initial.projection, near: config.nearClip, far: config.farClip } },
      limits,
    );
    this.lastCameraState = this.camera.getState();

    this.builder = new TerrainBuilder({
      pool: options.pool ?? null,
      thresholds: {
        wholeMeshMaxSamples: config.wholeMeshMaxSamples,
        culledMeshMaxSamples: config.culledMeshMaxSamples,
        maxGridDimension: config.maxGridDimension,
      },
      maxChunks: config.maxChunks,
      events: this.events,
    });

    this.world = createTerrainWorld();
    this.frameContext = createFrameContext(this.camera, this.renderStats);
  }

  // ── Accessors ────────────────────────────────────────────────────

  get heightGrid(): HeightGrid | null {
    return this.grid;
  }

  get terrainSet(): TerrainSet | null {
    return this.terrain;
  }

  getSettings(): Readonly<TerrainSettings> {
    return this.settings;
  }

  stats(): RenderStatsSnapshot {
    return this.renderStats.snapshot();
  }

  // ── Loading ──────────────────────────────────────────────────────

  /**
   * Replace the grid, frame the camera on it (this framing becomes the
   * reset target) and rebuild. Resolves to the published set, or null if
   * the build was superseded or failed.
   */
  async load(grid: HeightGrid): Promise<TerrainSet | null> {
    this.grid = grid;
    this.camera.apply({
      type: 'frameGrid',
      width: grid.width,
      height: grid.height,
      minHeight: grid.bounds.min * this.settings.heightScale,
      maxHeight: grid.bounds.max * this.settings.heightScale,
    });
    this.camera.setHome(this.camera.getState());
    log.info(`Loaded ${grid.width}x${grid.height} grid`);
    return this.rebuild();
  }

  regenerate(params: Partial<TerrainParams> = {}): Promise<TerrainSet | null> {
    return this.load(generateTerrain(params));
  }

  // ── Settings ─────────────────────────────────────────────────────

  async applyConfig(event: ConfigEvent, now: number = performance.now()): Promise<void> {
    switch (event.type) {
      case 'colorScheme':
        this.settings = { ...this.settings, colorScheme: event.scheme };
        await this.rebuild();
        return;
      case 'normalMode':
        this.settings = { ...this.settings, normalMode: event.mode };
        await this.rebuild();
        return;
      case 'heightScale':
        if (!Number.isFinite(event.scale)) {
          log.warn(`Ignoring non-finite height scale ${event.scale}`);
          return;
        }
        this.settings = { ...this.settings, heightScale: event.scale };
        await this.rebuild();
        return;
      case 'chunkSize':
        this.settings = { ...this.settings, chunkSize: event.size };
        await this.rebuild();
        return;
      case 'projection':
        this.handleCommand({ type: 'setProjection', kind: event.kind });
        return;
      case 'cameraPreset':
        this.animateToPreset(event.preset, now);
        return;
      case 'fov':
        this.handleCommand({ type: 'setFov', fovY: event.fovY });
        return;
    }
  }

  // ── Input ────────────────────────────────────────────────────────

  handleCommand(command: CameraCommand): void {
    this.camera.apply(command);
  }

  handleInput(action: InputAction, now: number = performance.now()): void {
    if (action.kind === 'command') {
      this.handleCommand(action.command);
    } else {
      this.animateToPreset(action.preset, now);
    }
  }

  setAspect(aspect: number): void {
    this.camera.setAspect(aspect);
  }

  private animateToPreset(preset: CameraPreset, now: number): void {
    const target = presetState(preset, this.camera.getState(), this.camera.limits);
    this.camera.animateTo(target, now, this.config.animationMs);
  }

  // ── Frame ────────────────────────────────────────────────────────

  /**
   * Run the frame pipeline and return the ordered draw list. `render`
   * draws that list; frame timing covers the pipeline and the render.
   */
  frame(now: number = performance.now(), render?: (drawList: readonly DrawItem[]) => void): DrawItem[] {
    const ctx = this.frameContext;
    ctx.now = now;
    this.renderStats.beginFrame();
    runFramePipeline(this.world, ctx);
    render?.(ctx.drawList);
    this.renderStats.endFrame();

    const state = this.camera.getState();
    if (state !== this.lastCameraState) {
      this.lastCameraState = state;
      this.events.emit('camera_moved', state);
    }
    return ctx.drawList;
  }

  // ── Builds ───────────────────────────────────────────────────────

  private async rebuild(): Promise<TerrainSet | null> {
    const grid = this.grid;
    if (!grid) return null;

    const generation = this.builder.currentGeneration + 1;
    let set: TerrainSet | null;
    try {
      set = await this.builder.rebuild(grid, this.settings);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.error(`Terrain build ${generation} failed: ${message}`);
      this.events.emit('build_failed', { generation, message });
      return null;
    }
    if (set) {
      syncChunkEntities(this.world, set);
      this.terrain = set;
    }
    return set;
  }

  dispose(): void {
    clearChunkEntities(this.world);
    this.world.terrain = null;
    this.terrain = null;
    this.grid = null;
    this.events.clear();
  }
}
