/**
 * System #2: FrustumSystem
 *
 * Captures this frame's view-projection matrix and rebuilds the frustum
 * planes from it. Every later system reads this single snapshot, so the
 * frame is culled and drawn with one consistent camera.
 *
 * Frequency: every frame
 */

import type { FrameContext } from '../frame';
import type { TerrainWorld } from '../world';

export function frustumSystem(_world: TerrainWorld, frame: FrameContext): void {
  const viewProjection = frame.camera.viewProjectionMatrix();
  frame.frustum.setFromProjectionMatrix(viewProjection);
  frame.viewProjection = new Float32Array(viewProjection.elements);
}
