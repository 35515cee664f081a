/**
 * System #1: CameraSystem
 *
 * Advances the camera's active animation, if any.
 *
 * Frequency: every frame
 */

import type { FrameContext } from '../frame';
import type { TerrainWorld } from '../world';

export function cameraSystem(_world: TerrainWorld, frame: FrameContext): void {
  if (frame.camera.update(frame.now)) {
    frame.cameraMoved = true;
  }
}
