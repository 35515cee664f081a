import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { Camera } from '../camera/camera';
import { createCameraState } from '../camera/cameraState';

describe('Camera', () => {
  it('maps the origin to (0, 0, -10) in view space from the default pose', () => {
    const camera = new Camera();
    const p = new THREE.Vector3(0, 0, 0).applyMatrix4(camera.viewMatrix());
    expect(p.x).toBeCloseTo(0, 9);
    expect(p.y).toBeCloseTo(0, 9);
    expect(p.z).toBeCloseTo(-10, 9);
  });

  it('syncs the perspective camera from the state', () => {
    const camera = new Camera();
    camera.setAspect(2);
    const three = camera.threeCamera();
    expect(three).toBeInstanceOf(THREE.PerspectiveCamera);
    if (!(three instanceof THREE.PerspectiveCamera)) return;
    expect(three.fov).toBeCloseTo(60, 9);
    expect(three.aspect).toBe(2);
    expect(three.near).toBe(0.1);
    expect(three.position.x).toBeCloseTo(10, 9);
  });

  it('switches to an orthographic camera sized by the aspect', () => {
    const camera = new Camera();
    camera.setAspect(1.5);
    camera.apply({ type: 'setProjection', kind: 'orthographic' });
    const three = camera.threeCamera();
    expect(three).toBeInstanceOf(THREE.OrthographicCamera);
    if (!(three instanceof THREE.OrthographicCamera)) return;
    const half = 10 * Math.tan(Math.PI / 6);
    expect(three.top).toBeCloseTo(half, 9);
    expect(three.right).toBeCloseTo(half * 1.5, 9);
  });

  it('ignores invalid aspect ratios', () => {
    const camera = new Camera();
    camera.setAspect(0);
    camera.setAspect(NaN);
    camera.setAspect(-1);
    expect(camera.getAspect()).toBe(1);
  });

  it('builds a frustum that contains the target and not points behind the eye', () => {
    const camera = new Camera();
    const frustum = camera.frustum();
    expect(frustum.containsPoint(new THREE.Vector3(0, 0, 0))).toBe(true);
    expect(frustum.containsPoint(new THREE.Vector3(20, 0, 0))).toBe(false);
  });

  it('refreshes matrices after a state change', () => {
    const camera = new Camera();
    const before = camera.viewProjectionMatrix().clone();
    camera.apply({ type: 'orbit', dAzimuth: 0.5, dElevation: 0.2 });
    expect(camera.viewProjectionMatrix().equals(before)).toBe(false);
  });

  it('returns each state as a new value', () => {
    const camera = new Camera();
    const first = camera.getState();
    camera.apply({ type: 'zoom', delta: 1 });
    expect(camera.getState()).not.toBe(first);
    expect(first.distance).toBe(10);
  });

  describe('home and reset', () => {
    it('resets to the home state', () => {
      const camera = new Camera();
      const home = createCameraState({ distance: 50, azimuth: 1 });
      camera.setHome(home);
      camera.apply({ type: 'orbit', dAzimuth: 2, dElevation: 0 });
      camera.apply({ type: 'reset' });
      expect(camera.getState()).toBe(home);
    });

    it('uses the initial state as home by default', () => {
      const camera = new Camera({ distance: 12 });
      camera.apply({ type: 'zoom', delta: 3 });
      camera.apply({ type: 'reset' });
      expect(camera.getState().distance).toBe(12);
    });
  });

  describe('animation', () => {
    it('advances on update and finishes on the target', () => {
      const camera = new Camera();
      const target = createCameraState({ distance: 30 });
      camera.animateTo(target, 0, 100);
      expect(camera.isAnimating).toBe(true);

      expect(camera.update(50)).toBe(true);
      expect(camera.getState().distance).toBe(20);

      expect(camera.update(100)).toBe(true);
      expect(camera.getState()).toBe(target);
      expect(camera.isAnimating).toBe(false);
      expect(camera.update(150)).toBe(false);
    });

    it('applies a zero-length animation at once', () => {
      const camera = new Camera();
      const target = createCameraState({ distance: 3 });
      camera.animateTo(target, 0, 0);
      expect(camera.getState()).toBe(target);
      expect(camera.isAnimating).toBe(false);
    });

    it('is cancelled by a direct command', () => {
      const camera = new Camera();
      camera.animateTo(createCameraState({ distance: 30 }), 0, 100);
      camera.apply({ type: 'orbit', dAzimuth: 0.1, dElevation: 0 });
      expect(camera.isAnimating).toBe(false);
      expect(camera.update(50)).toBe(false);
      expect(camera.getState().distance).toBe(10);
    });
  });

  it('eye() returns a fresh tuple', () => {
    const camera = new Camera();
    const eye = camera.eye();
    eye[0] = 99;
    expect(camera.eye()[0]).toBeCloseTo(10, 9);
  });
});
