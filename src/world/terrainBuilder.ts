/**
 * TerrainBuilder: turns a height grid plus display settings into a
 * TerrainSet (render mode, chunks, counts).
 *
 * Every rebuild takes a new generation number. When a newer rebuild starts
 * before an older one finishes, the older result is discarded (resolves to
 * null) so a slow build can never replace a newer one.
 */

import { MAX_CHUNKS } from '../config';
import type { EventBus, ViewerEventMap } from '../core/eventBus';
import { createLogger } from '../core/logger';
import type { Aabb, MeshBuildOptions, RenderMode, ResourceLimitWarning } from '../types';
import type { WorkerPool } from '../workers/workerPool';
import {
  buildChunk,
  chunkBounds,
  effectiveChunkSize,
  extractWindow,
  planChunks,
  wholeGridPlan,
  type ChunkPlan,
  type TerrainChunk,
} from './chunkPartitioner';
import type { HeightGrid } from './heightGrid';
import { meshTriangleCount, meshVertexCount } from './meshBuilder';
import { chooseRenderMode, DEFAULT_RENDER_THRESHOLDS, type RenderThresholds } from './renderStrategy';
import { unionAabb } from './visibility';

const log = createLogger('TerrainBuilder');

export interface TerrainSettings extends MeshBuildOptions {
  chunkSize: number;
}

export interface TerrainSet {
  generation: number;
  mode: RenderMode;
  chunks: TerrainChunk[];
  /** Union of chunk bounds; null when the grid has no quads. */
  bounds: Aabb | null;
  vertexCount: number;
  triangleCount: number;
  /** Chunk size actually used; null in whole-mesh modes. */
  chunkSize: number | null;
  warning: ResourceLimitWarning | null;
  settings: TerrainSettings;
}

export interface TerrainBuilderOptions {
  /** Off-thread mesh builds; without a pool, builds run on the calling thread. */
  pool?: WorkerPool | null;
  thresholds?: RenderThresholds;
  maxChunks?: number;
  events?: EventBus<ViewerEventMap> | null;
}

interface BuildPlan {
  mode: RenderMode;
  plans: ChunkPlan[];
  chunkSize: number | null;
  warning: ResourceLimitWarning | null;
}

export class TerrainBuilder {
  private generation = 0;
  private lastMode: RenderMode | null = null;
  private readonly pool: WorkerPool | null;
  private readonly thresholds: RenderThresholds;
  private readonly maxChunks: number;
  private readonly events: EventBus<ViewerEventMap> | null;

  constructor(options: TerrainBuilderOptions = {}) {
    this.pool = options.pool ?? null;
    this.thresholds = options.thresholds ?? DEFAULT_RENDER_THRESHOLDS;
    this.maxChunks = options.maxChunks ?? MAX_CHUNKS;
    this.events = options.events ?? null;
  }

  /** Generation of the most recently started build. */
  get currentGeneration(): number {
    return this.generation;
  }

  /** Decide the render mode and the chunk plans for a grid. */
  plan(grid: HeightGrid, chunkSize: number): BuildPlan {
    const { mode, warning } = chooseRenderMode(grid.width, grid.height, this.thresholds);
    if (mode === 'chunked') {
      const size = effectiveChunkSize(grid.width, grid.height, chunkSize, this.maxChunks);
      return { mode, plans: planChunks(grid.width, grid.height, size), chunkSize: size, warning };
    }
    const plans = grid.width >= 2 && grid.height >= 2 ? [wholeGridPlan(grid)] : [];
    return { mode, plans, chunkSize: null, warning };
  }

  /** Build on the calling thread. Always current: bumps the generation. */
  buildSync(grid: HeightGrid, settings: TerrainSettings): TerrainSet {
    const generation = ++this.generation;
    const start = performance.now();
    const plan = this.plan(grid, settings.chunkSize);
    const chunks = plan.plans.map((p) => buildChunk(grid, p, settings));
    return this.finish(generation, plan, chunks, settings, performance.now() - start);
  }

  /**
   * Build (through the worker pool when there is one). Resolves to null if
   * a newer build was started meanwhile.
   */
  async rebuild(grid: HeightGrid, settings: TerrainSettings): Promise<TerrainSet | null> {
    if (!this.pool) {
      return this.buildSync(grid, settings);
    }
    const pool = this.pool;
    const generation = ++this.generation;
    const start = performance.now();
    const plan = this.plan(grid, settings.chunkSize);
    const options: MeshBuildOptions = {
      heightScale: settings.heightScale,
      normalMode: settings.normalMode,
      colorScheme: settings.colorScheme,
    };

    let chunks: TerrainChunk[];
    try {
      chunks = await Promise.all(
        plan.plans.map(async (p): Promise<TerrainChunk> => {
          const mesh = await pool.requestMesh(extractWindow(grid, p.sampleRegion), p.sampleRegion, options);
          return { ...p, mesh, bounds: chunkBounds(grid, p.sampleRegion, settings.heightScale) };
        }),
      );
    } catch (e) {
      if (generation !== this.generation) {
        log.debug(`Build ${generation} failed after being superseded`, e);
        return null;
      }
      throw e;
    }

    if (generation !== this.generation) {
      log.debug(`Discarding build ${generation}; ${this.generation} is current`);
      return null;
    }
    return this.finish(generation, plan, chunks, settings, performance.now() - start);
  }

  private finish(
    generation: number,
    plan: BuildPlan,
    chunks: TerrainChunk[],
    settings: TerrainSettings,
    buildMs: number,
  ): TerrainSet {
    let vertexCount = 0;
    let triangleCount = 0;
    for (const chunk of chunks) {
      vertexCount += meshVertexCount(chunk.mesh);
      triangleCount += meshTriangleCount(chunk.mesh);
    }

    const set: TerrainSet = {
      generation,
      mode: plan.mode,
      chunks,
      bounds: unionAabb(chunks.map((c) => c.bounds)),
      vertexCount,
      triangleCount,
      chunkSize: plan.chunkSize,
      warning: plan.warning,
      settings,
    };

    if (plan.warning) {
      log.warn(plan.warning.message);
      this.events?.emit('resource_limit', plan.warning);
    }
    if (plan.mode !== this.lastMode) {
      this.events?.emit('render_mode_changed', { previous: this.lastMode, mode: plan.mode });
      this.lastMode = plan.mode;
    }
    this.events?.emit('terrain_rebuilt', {
      generation,
      mode: plan.mode,
      chunkCount: chunks.length,
      vertexCount,
      triangleCount,
      normalMode: settings.normalMode,
      buildMs,
    });
    log.info(
      `Build ${generation}: ${plan.mode}, ${chunks.length} chunks, ` +
      `${vertexCount} vertices, ${triangleCount} triangles in ${buildMs.toFixed(1)}ms`,
    );
    return set;
  }
}
