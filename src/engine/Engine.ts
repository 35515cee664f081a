/**
 * Engine: frame loop and rendering infrastructure.
 *
 * Owns the Three.js renderer, the scene with its lights, and the
 * requestAnimationFrame loop. Each frame it asks the TerrainViewer for the
 * draw list, syncs the terrain renderer to it, and renders with the
 * viewer's camera.
 *
 * Uses WebGPURenderer which supports both native WebGPU and WebGL2
 * (via forceWebGL fallback).
 */

import * as THREE from 'three';
// Import from three/webgpu (not a deep path) so Vite keeps a single
// pre-bundled copy of Three.js.
import { WebGPURenderer } from 'three/webgpu';
import { APP_NAME, BACKGROUND_COLOR, MAX_PIXEL_RATIO } from '../config';
import { createLogger } from '../core/logger';
import { TerrainRenderer, type RenderStyle } from '../rendering/terrainRenderer';
import type { TerrainViewer } from './TerrainViewer';

const log = createLogger('Engine');

function hasWebGpu(): boolean {
  return typeof navigator !== 'undefined' && 'gpu' in navigator;
}

// ── Engine ────────────────────────────────────────────────────────

export class Engine {
  readonly scene: THREE.Scene;
  readonly renderer: InstanceType<typeof WebGPURenderer>;
  readonly terrainRenderer: TerrainRenderer;

  /** DOM element the renderer canvas lives in. */
  readonly container: HTMLDivElement;

  private running = false;
  private animationFrameId = 0;
  private disposeCallbacks: (() => void)[] = [];
  private frameCallbacks: ((now: number) => void)[] = [];

  constructor(
    mountPoint: HTMLElement,
    private readonly viewer: TerrainViewer,
    style: RenderStyle = 'shaded',
  ) {
    this.container = document.createElement('div');
    this.container.style.width = '100%';
    this.container.style.height = '100%';
    mountPoint.appendChild(this.container);

    this.scene = new THREE.Scene();
    this.scene.background = new THREE.Color(BACKGROUND_COLOR);

    const gpu = hasWebGpu();
    this.renderer = new WebGPURenderer({
      antialias: true,
      forceWebGL: !gpu,
    });
    this.renderer.setPixelRatio(Math.min(window.devicePixelRatio, MAX_PIXEL_RATIO));
    this.renderer.setSize(window.innerWidth, window.innerHeight);
    this.container.appendChild(this.renderer.domElement);

    // Lighting: soft sky ambient plus one directional key light
    this.scene.add(new THREE.AmbientLight(0x8c9bb4, 0.5));
    const sun = new THREE.DirectionalLight(0xfff8eb, 1.0);
    sun.position.set(-1, 2, -0.8);
    this.scene.add(sun);

    this.terrainRenderer = new TerrainRenderer(this.scene, style);
    this.viewer.setAspect(window.innerWidth / window.innerHeight);

    window.addEventListener('resize', this.handleResize);

    log.info(`${APP_NAME} engine created (${gpu ? 'WebGPU' : 'WebGL2'} backend)`);
  }

  /** Canvas that receives pointer input. */
  get canvas(): HTMLCanvasElement {
    return this.renderer.domElement;
  }

  /**
   * Initialize the renderer backend. Must be called before start().
   * WebGPURenderer requires async initialization for both backends.
   */
  async init(): Promise<void> {
    await this.renderer.init();
    log.info('Renderer initialized');
  }

  // ── Lifecycle Callbacks ─────────────────────────────────────────

  onDispose(fn: () => void): void {
    this.disposeCallbacks.push(fn);
  }

  /** Runs after each rendered frame (HUD updates). */
  onFrame(fn: (now: number) => void): void {
    this.frameCallbacks.push(fn);
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    this.animationFrameId = requestAnimationFrame(this.animate);
    log.info('Render loop started');
  }

  /** Stop the render loop and dispose everything. */
  stop(): void {
    this.running = false;
    cancelAnimationFrame(this.animationFrameId);

    for (const fn of this.disposeCallbacks) {
      fn();
    }
    this.disposeCallbacks = [];
    this.frameCallbacks = [];

    window.removeEventListener('resize', this.handleResize);
    this.terrainRenderer.dispose();
    this.renderer.dispose();
    log.info('Engine stopped');
  }

  // ── Render Loop ───────────────────────────────────────────────

  private animate = (now: number): void => {
    if (!this.running) return;
    this.animationFrameId = requestAnimationFrame(this.animate);

    this.viewer.frame(now, (drawList) => {
      this.terrainRenderer.sync(drawList, this.viewer.terrainSet);
      this.renderer.render(this.scene, this.viewer.camera.threeCamera());
    });

    for (const fn of this.frameCallbacks) {
      fn(now);
    }
  };

  // ── Resize ────────────────────────────────────────────────────

  private handleResize = (): void => {
    const w = window.innerWidth;
    const h = window.innerHeight;
    this.viewer.setAspect(w / h);
    this.renderer.setSize(w, h);
  };
}
