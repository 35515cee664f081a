/**
 * Per-frame render statistics: rolling FPS plus the counts the HUD shows.
 */

import { FRAME_BUDGET_MS } from '../config';
import type { RenderMode } from '../types';

export interface RenderStatsSnapshot {
  fps: number;
  frameTimeMs: number;
  overBudget: boolean;
  mode: RenderMode | null;
  chunkCount: number;
  visibleChunks: number;
  drawCalls: number;
  vertexCount: number;
  triangleCount: number;
  visibleTriangles: number;
}

export class RenderStats {
  private frameTimes: number[] = [];
  private frameStart = 0;
  private frameCount = 0;
  private currentFps = 0;
  private currentFrameTime = 0;
  private readonly sampleWindow = 60; // frames for rolling average

  mode: RenderMode | null = null;
  chunkCount = 0;
  visibleChunks = 0;
  drawCalls = 0;
  vertexCount = 0;
  triangleCount = 0;
  visibleTriangles = 0;

  beginFrame(now: number = performance.now()): void {
    this.frameStart = now;
  }

  /** Returns frame time in ms. */
  endFrame(now: number = performance.now()): number {
    const elapsed = now - this.frameStart;
    this.frameTimes.push(elapsed);
    if (this.frameTimes.length > this.sampleWindow) {
      this.frameTimes.shift();
    }
    this.frameCount++;

    // Update rolling averages every 30 frames
    if (this.frameCount % 30 === 0) {
      const sum = this.frameTimes.reduce((a, b) => a + b, 0);
      this.currentFrameTime = sum / this.frameTimes.length;
      this.currentFps = this.currentFrameTime > 0 ? 1000 / this.currentFrameTime : 0;
    }

    return elapsed;
  }

  snapshot(): RenderStatsSnapshot {
    return {
      fps: Math.round(this.currentFps),
      frameTimeMs: Math.round(this.currentFrameTime * 100) / 100,
      overBudget: this.currentFrameTime > FRAME_BUDGET_MS,
      mode: this.mode,
      chunkCount: this.chunkCount,
      visibleChunks: this.visibleChunks,
      drawCalls: this.drawCalls,
      vertexCount: this.vertexCount,
      triangleCount: this.triangleCount,
      visibleTriangles: this.visibleTriangles,
    };
  }

  reset(): void {
    this.frameTimes.length = 0;
    this.frameCount = 0;
    this.currentFps = 0;
    this.currentFrameTime = 0;
    this.mode = null;
    this.chunkCount = 0;
    this.visibleChunks = 0;
    this.drawCalls = 0;
    this.vertexCount = 0;
    this.triangleCount = 0;
    this.visibleTriangles = 0;
  }
}
