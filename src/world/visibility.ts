/**
 * Frustum culling for chunk bounding boxes.
 *
 * Uses the plane / p-vertex test of THREE.Frustum.intersectsBox: a box is
 * rejected only when it lies wholly outside one plane. Boxes straddling a
 * frustum corner outside the volume may be kept; boxes with any part inside
 * are never dropped. No occlusion culling.
 */

import * as THREE from 'three';
import type { Aabb } from '../types';

// Scratch box to avoid per-test allocations
const _box = new THREE.Box3();

export function aabbToBox3(aabb: Aabb, target: THREE.Box3 = new THREE.Box3()): THREE.Box3 {
  target.min.set(aabb.minX, aabb.minY, aabb.minZ);
  target.max.set(aabb.maxX, aabb.maxY, aabb.maxZ);
  return target;
}

export function aabbIntersectsFrustum(frustum: THREE.Frustum, aabb: Aabb): boolean {
  return frustum.intersectsBox(aabbToBox3(aabb, _box));
}

/** Visible subset of `chunks`, in their original order. */
export function selectVisibleChunks<T extends { bounds: Aabb }>(
  frustum: THREE.Frustum,
  chunks: readonly T[],
): T[] {
  const visible: T[] = [];
  for (const chunk of chunks) {
    if (aabbIntersectsFrustum(frustum, chunk.bounds)) visible.push(chunk);
  }
  return visible;
}

/** Smallest box containing every input box, or null for an empty list. */
export function unionAabb(boxes: readonly Aabb[]): Aabb | null {
  if (boxes.length === 0) return null;
  const out: Aabb = {
    minX: Infinity, minY: Infinity, minZ: Infinity,
    maxX: -Infinity, maxY: -Infinity, maxZ: -Infinity,
  };
  for (const b of boxes) {
    out.minX = Math.min(out.minX, b.minX);
    out.minY = Math.min(out.minY, b.minY);
    out.minZ = Math.min(out.minZ, b.minZ);
    out.maxX = Math.max(out.maxX, b.maxX);
    out.maxY = Math.max(out.maxY, b.maxY);
    out.maxZ = Math.max(out.maxZ, b.maxZ);
  }
  return out;
}

export function aabbContains(outer: Aabb, inner: Aabb): boolean {
  return (
    inner.minX >= outer.minX && inner.maxX <= outer.maxX &&
    inner.minY >= outer.minY && inner.maxY <= outer.maxY &&
    inner.minZ >= outer.minZ && inner.maxZ <= outer.maxZ
  );
}
