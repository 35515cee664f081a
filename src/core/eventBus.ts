/**
 * Typed event bus for viewer events.
 * Zero-dependency pub/sub with type safety.
 */

import type { CameraState } from '../camera/cameraState';
import type { NormalMode, RenderMode, ResourceLimitWarning } from '../types';

type Listener<T> = (payload: T) => void;

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners = new Map<keyof EventMap, Set<Listener<never>>>();

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    const listeners = set;
    listeners.add(listener);

    // Return unsubscribe function
    return () => {
      listeners.delete(listener);
      if (listeners.size === 0 && this.listeners.get(event) === listeners) {
        this.listeners.delete(event);
      }
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    // Snapshot: listeners may unsubscribe while being notified.
    for (const listener of [...set]) {
      (listener as Listener<EventMap[K]>)(payload);
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    this.listeners.delete(event);
  }

  clear(): void {
    this.listeners.clear();
  }
}

// ── Viewer Event Map ────────────────────────────────────────────

export interface TerrainRebuiltEvent {
  generation: number;
  mode: RenderMode;
  chunkCount: number;
  vertexCount: number;
  triangleCount: number;
  normalMode: NormalMode;
  buildMs: number;
}

export interface ViewerEventMap {
  terrain_rebuilt: TerrainRebuiltEvent;
  resource_limit: ResourceLimitWarning;
  render_mode_changed: { previous: RenderMode | null; mode: RenderMode };
  camera_moved: CameraState;
  build_failed: { generation: number; message: string };
}
