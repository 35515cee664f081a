/**
 * TerrainRenderer: uploads chunk meshes to Three.js and shows exactly the
 * chunks in the frame's draw list.
 *
 * Geometry is created lazily the first time a chunk is drawn and kept
 * until the terrain set changes. Culling has already happened in the ECS
 * pipeline, so Three.js' own frustum culling is turned off.
 */

import * as THREE from 'three';
import { createLogger } from '../core/logger';
import type { DrawItem, TerrainMeshData } from '../types';
import type { TerrainSet } from '../world/terrainBuilder';

const log = createLogger('TerrainRenderer');

export type RenderStyle = 'shaded' | 'wireframe' | 'unlit';

export const RENDER_STYLES: readonly RenderStyle[] = ['shaded', 'wireframe', 'unlit'];

export function toBufferGeometry(mesh: TerrainMeshData): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(mesh.positions, 3));
  geometry.setAttribute('normal', new THREE.BufferAttribute(mesh.normals, 3));
  geometry.setAttribute('color', new THREE.BufferAttribute(mesh.colors, 3));
  geometry.setIndex(new THREE.BufferAttribute(mesh.indices, 1));
  return geometry;
}

function createMaterial(style: RenderStyle): THREE.Material {
  switch (style) {
    case 'shaded':
      return new THREE.MeshLambertMaterial({ vertexColors: true, side: THREE.DoubleSide });
    case 'wireframe':
      return new THREE.MeshBasicMaterial({ vertexColors: true, wireframe: true });
    case 'unlit':
      return new THREE.MeshBasicMaterial({ vertexColors: true, side: THREE.DoubleSide });
  }
}

interface ChunkObject {
  mesh: TerrainMeshData;
  object: THREE.Mesh;
}

export class TerrainRenderer {
  readonly group = new THREE.Group();
  private readonly objects = new Map<number, ChunkObject>();
  private material: THREE.Material;
  private style: RenderStyle;
  private terrain: TerrainSet | null = null;

  constructor(scene: THREE.Scene, style: RenderStyle = 'shaded') {
    this.style = style;
    this.material = createMaterial(style);
    this.group.name = 'terrain';
    scene.add(this.group);
  }

  get renderStyle(): RenderStyle {
    return this.style;
  }

  get objectCount(): number {
    return this.objects.size;
  }

  setStyle(style: RenderStyle): void {
    if (style === this.style) return;
    const previous = this.material;
    this.style = style;
    this.material = createMaterial(style);
    for (const { object } of this.objects.values()) {
      object.material = this.material;
    }
    previous.dispose();
    log.debug(`Render style: ${style}`);
  }

  /** Show the chunks in `drawList`, hide the rest. */
  sync(drawList: readonly DrawItem[], terrain: TerrainSet | null): void {
    if (terrain !== this.terrain) {
      this.clear();
      this.terrain = terrain;
    }

    for (const { object } of this.objects.values()) {
      object.visible = false;
    }

    for (const item of drawList) {
      let entry = this.objects.get(item.chunkIndex);
      if (!entry || entry.mesh !== item.mesh) {
        if (entry) this.disposeEntry(item.chunkIndex, entry);
        const object = new THREE.Mesh(toBufferGeometry(item.mesh), this.material);
        object.frustumCulled = false;
        object.matrixAutoUpdate = false;
        object.matrix.fromArray(item.modelMatrix);
        object.name = `chunk-${item.chunkIndex}`;
        this.group.add(object);
        entry = { mesh: item.mesh, object };
        this.objects.set(item.chunkIndex, entry);
      }
      entry.object.visible = true;
    }
  }

  clear(): void {
    for (const [index, entry] of this.objects) {
      this.disposeEntry(index, entry);
    }
  }

  dispose(): void {
    this.clear();
    this.material.dispose();
    this.group.removeFromParent();
  }

  private disposeEntry(index: number, entry: ChunkObject): void {
    this.group.remove(entry.object);
    entry.object.geometry.dispose();
    this.objects.delete(index);
  }
}
