/**
 * Camera: owns the orbital CameraState, its active animation, and the
 * Three.js camera objects the matrices are derived from.
 *
 * The state is a plain immutable value; `apply` and `update` replace it.
 * Callers that need a stable view for a whole frame take `getState()` once
 * at frame start (it is never mutated in place).
 */

import * as THREE from 'three';
import { CAMERA_ANIMATION_MS } from '../config';
import { radToDeg } from '../core/math';
import type { Vec3Tuple } from '../types';
import { sampleCameraAnimation, startCameraAnimation, type CameraAnimation } from './cameraAnimation';
import {
  applyCameraCommand,
  createCameraState,
  DEFAULT_CAMERA_LIMITS,
  eyePosition,
  type CameraCommand,
  type CameraLimits,
  type CameraState,
} from './cameraState';

export class Camera {
  private state: CameraState;
  private home: CameraState;
  private animation: CameraAnimation | null = null;
  private aspect = 1;
  private revision = 0;
  private syncedRevision = -1;

  readonly limits: CameraLimits;

  private readonly perspective = new THREE.PerspectiveCamera();
  private readonly orthographic = new THREE.OrthographicCamera();
  private readonly _viewProjection = new THREE.Matrix4();
  private readonly _frustum = new THREE.Frustum();

  // Scratch tuple for eye computation
  private readonly _eye: Vec3Tuple = [0, 0, 0];

  constructor(initial: Partial<CameraState> = {}, limits: CameraLimits = DEFAULT_CAMERA_LIMITS) {
    this.limits = limits;
    this.state = createCameraState(initial);
    this.home = this.state;
  }

  // ── State ──────────────────────────────────────────────────────────

  getState(): CameraState {
    return this.state;
  }

  /** State that the `reset` command returns to. */
  setHome(state: CameraState): void {
    this.home = state;
  }

  getHome(): CameraState {
    return this.home;
  }

  /** Apply a command immediately. Cancels any running animation. */
  apply(command: CameraCommand): void {
    this.animation = null;
    const resolved: CameraCommand =
      command.type === 'reset' && command.home === undefined ? { type: 'reset', home: this.home } : command;
    this.setState(applyCameraCommand(this.state, resolved, this.limits));
  }

  /** Replace the state outright (e.g. from a UI field). */
  setState(state: CameraState): void {
    this.state = state;
    this.revision++;
  }

  animateTo(target: CameraState, now: number, durationMs: number = CAMERA_ANIMATION_MS): void {
    this.animation = startCameraAnimation(this.state, target, durationMs, now, this.limits);
    if (durationMs <= 0) this.update(now);
  }

  get isAnimating(): boolean {
    return this.animation !== null;
  }

  /** Advance the active animation. Returns true if the state changed. */
  update(now: number): boolean {
    if (!this.animation) return false;
    const { state, done } = sampleCameraAnimation(this.animation, now);
    if (done) this.animation = null;
    this.setState(state);
    return true;
  }

  setAspect(aspect: number): void {
    if (aspect > 0 && Number.isFinite(aspect) && aspect !== this.aspect) {
      this.aspect = aspect;
      this.revision++;
    }
  }

  getAspect(): number {
    return this.aspect;
  }

  // ── Matrices ───────────────────────────────────────────────────────

  eye(): Vec3Tuple {
    const [x, y, z] = eyePosition(this.state, this._eye);
    return [x, y, z];
  }

  /** The Three.js camera matching the current projection, synced to the state. */
  threeCamera(): THREE.PerspectiveCamera | THREE.OrthographicCamera {
    this.sync();
    return this.state.projection.kind === 'perspective' ? this.perspective : this.orthographic;
  }

  viewMatrix(): THREE.Matrix4 {
    return this.threeCamera().matrixWorldInverse;
  }

  projectionMatrix(): THREE.Matrix4 {
    return this.threeCamera().projectionMatrix;
  }

  viewProjectionMatrix(): THREE.Matrix4 {
    const camera = this.threeCamera();
    return this._viewProjection.multiplyMatrices(camera.projectionMatrix, camera.matrixWorldInverse);
  }

  /** Frustum rebuilt from the current view-projection matrix. */
  frustum(): THREE.Frustum {
    return this._frustum.setFromProjectionMatrix(this.viewProjectionMatrix());
  }

  private sync(): void {
    if (this.syncedRevision === this.revision) return;
    this.syncedRevision = this.revision;

    const { projection, target } = this.state;
    const [ex, ey, ez] = eyePosition(this.state, this._eye);
    const camera = projection.kind === 'perspective' ? this.perspective : this.orthographic;

    if (projection.kind === 'perspective') {
      this.perspective.fov = radToDeg(projection.fovY);
      this.perspective.aspect = this.aspect;
    } else {
      const halfWidth = projection.halfHeight * this.aspect;
      this.orthographic.left = -halfWidth;
      this.orthographic.right = halfWidth;
      this.orthographic.top = projection.halfHeight;
      this.orthographic.bottom = -projection.halfHeight;
    }
    camera.near = projection.near;
    camera.far = projection.far;
    camera.updateProjectionMatrix();

    camera.position.set(ex, ey, ez);
    camera.up.set(0, 1, 0);
    camera.lookAt(target[0], target[1], target[2]);
    camera.updateMatrixWorld(true);
  }
}
