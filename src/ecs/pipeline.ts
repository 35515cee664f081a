/**
 * ECS system pipeline.
 *
 * All systems execute in fixed order on the main thread. The viewer calls
 * `runFramePipeline(world, frame)` once per frame; on return,
 * `frame.drawList` holds the frame's draw items.
 */

import type { ECSSystem, FrameContext } from './frame';
import { cameraSystem } from './systems/cameraSystem';
import { drawListSystem } from './systems/drawListSystem';
import { frustumSystem } from './systems/frustumSystem';
import { statsSystem } from './systems/statsSystem';
import { visibilitySystem } from './systems/visibilitySystem';
import type { TerrainWorld } from './world';

/** Ordered system list. Index = execution priority. */
const systems: readonly ECSSystem[] = [
  /* 1 */ cameraSystem,
  /* 2 */ frustumSystem,
  /* 3 */ visibilitySystem,
  /* 4 */ drawListSystem,
  /* 5 */ statsSystem,
];

export function runFramePipeline(world: TerrainWorld, frame: FrameContext): void {
  frame.cameraMoved = false;
  for (const system of systems) {
    system(world, frame);
  }
}
