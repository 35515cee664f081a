/**
 * Worker pool for parallel terrain mesh builds.
 *
 * Maintains a fixed pool of Web Workers and dispatches build requests
 * using least-loaded scheduling with an overflow task queue. Each request
 * gets a unique ID; responses are matched back to the originating Promise
 * via a pending-request map.
 *
 * Main -> Worker: the chunk's sample window is transferred (the caller
 *                 extracts a fresh copy per request, see extractWindow)
 * Worker -> Main: positions, normals, colors, indices are transferred back
 *
 * Usage:
 *   const pool = new WorkerPool();
 *   const mesh = await pool.requestMesh(source, region, options);
 *   pool.dispose();
 */

import { WORKER_COUNT } from '../config';
import { createLogger } from '../core/logger';
import type {
  MeshBuildOptions,
  MeshSource,
  MeshWorkerRequest,
  MeshWorkerResponse,
  SampleRegion,
  TerrainMeshData,
} from '../types';

const log = createLogger('WorkerPool');

// ── Worker handle ────────────────────────────────────────────────

/** The slice of the Worker API the pool relies on. */
export interface MeshWorkerHandle {
  postMessage(message: MeshWorkerRequest, transfer: Transferable[]): void;
  onmessage: ((ev: MessageEvent<MeshWorkerResponse>) => void) | null;
  onerror: ((ev: ErrorEvent) => void) | null;
  terminate(): void;
}

export type MeshWorkerFactory = () => MeshWorkerHandle;

export const createMeshWorker: MeshWorkerFactory = () =>
  new Worker(new URL('./meshWorker.ts', import.meta.url), { type: 'module' });

// ── Internal types ───────────────────────────────────────────────

interface PendingTask {
  entry: WorkerEntry;
  resolve: (data: TerrainMeshData) => void;
  reject: (error: Error) => void;
}

interface QueuedTask {
  source: MeshSource;
  region: SampleRegion;
  options: MeshBuildOptions;
  resolve: (data: TerrainMeshData) => void;
  reject: (error: Error) => void;
}

interface WorkerEntry {
  worker: MeshWorkerHandle;
  pendingCount: number;
}

// ── WorkerPool ───────────────────────────────────────────────────

export class WorkerPool {
  private workers: WorkerEntry[] = [];
  private readonly pending = new Map<number, PendingTask>();
  private readonly queue: QueuedTask[] = [];
  private nextId = 1;
  private disposed = false;
  private targetPoolSize: number;

  constructor(
    poolSize: number = WORKER_COUNT,
    private readonly factory: MeshWorkerFactory = createMeshWorker,
  ) {
    this.targetPoolSize = Math.max(1, Math.floor(poolSize));
    for (let i = 0; i < this.targetPoolSize; i++) {
      this.workers.push(this.createWorkerEntry());
    }
    log.info(`Initialised with ${this.targetPoolSize} workers`);
  }

  // ── Public API ───────────────────────────────────────────────

  get workerCount(): number {
    return this.workers.length;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  get pendingTaskCount(): number {
    return this.pending.size;
  }

  /**
   * Submit a mesh build. Resolves with the mesh once a worker finishes;
   * rejects on a worker-reported error, a worker crash, or disposal.
   *
   * The source window's buffer is transferred, so the caller must not
   * reuse `source` afterwards.
   */
  requestMesh(source: MeshSource, region: SampleRegion, options: MeshBuildOptions): Promise<TerrainMeshData> {
    if (this.disposed) {
      return Promise.reject(new Error('WorkerPool has been disposed'));
    }

    return new Promise<TerrainMeshData>((resolve, reject) => {
      const leastBusy = this.pickWorker();

      // Every worker busy: queue rather than piling onto one worker.
      if (!leastBusy || leastBusy.pendingCount > 0) {
        this.queue.push({ source, region, options, resolve, reject });
        return;
      }

      this.dispatch(leastBusy, { source, region, options, resolve, reject });
    });
  }

  /**
   * Resize the pool. Excess workers are terminated only once idle, so
   * in-flight work is not lost.
   */
  setPoolSize(size: number): void {
    if (this.disposed) return;
    if (size < 1) {
      log.warn(`setPoolSize(${size}) clamped to 1`);
      size = 1;
    }

    this.targetPoolSize = size;
    while (this.workers.length < size) {
      this.workers.push(this.createWorkerEntry());
    }
    this.trimExcessWorkers();
    this.drainQueue();

    log.info(`Pool resized to target=${size}, active=${this.workers.length}`);
  }

  /** Terminate all workers and reject any pending / queued tasks. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const queued of this.queue) {
      queued.reject(new Error('WorkerPool disposed'));
    }
    this.queue.length = 0;

    for (const [, task] of this.pending) {
      task.reject(new Error('WorkerPool disposed'));
    }
    this.pending.clear();

    for (const entry of this.workers) {
      entry.worker.terminate();
      entry.pendingCount = 0;
    }
    this.workers.length = 0;

    log.info('Disposed');
  }

  // ── Internals ────────────────────────────────────────────────

  private createWorkerEntry(): WorkerEntry {
    const worker = this.factory();
    const entry: WorkerEntry = { worker, pendingCount: 0 };

    worker.onmessage = (ev) => this.handleResponse(entry, ev.data);
    worker.onerror = (ev) => this.handleWorkerError(entry, ev);

    return entry;
  }

  /** Fewest outstanding tasks; ties go to the lowest index. */
  private pickWorker(): WorkerEntry | undefined {
    let best: WorkerEntry | undefined;
    for (const w of this.workers) {
      if (!best || w.pendingCount < best.pendingCount) {
        best = w;
      }
    }
    return best;
  }

  private dispatch(entry: WorkerEntry, task: QueuedTask): void {
    const id = this.nextId++;
    entry.pendingCount++;
    this.pending.set(id, { entry, resolve: task.resolve, reject: task.reject });

    const request: MeshWorkerRequest = {
      id,
      type: 'BUILD_MESH',
      source: task.source,
      region: task.region,
      options: task.options,
    };

    const transfer: Transferable[] = [];
    const { samples, colors } = task.source.window;
    if (samples.buffer instanceof ArrayBuffer && samples.buffer.byteLength > 0) transfer.push(samples.buffer);
    if (colors && colors.buffer instanceof ArrayBuffer && colors.buffer.byteLength > 0) transfer.push(colors.buffer);

    entry.worker.postMessage(request, transfer);
  }

  private handleResponse(entry: WorkerEntry, response: MeshWorkerResponse): void {
    const task = this.pending.get(response.id);
    if (!task) {
      // Owner crashed or pool disposed.
      return;
    }

    this.pending.delete(response.id);
    entry.pendingCount = Math.max(0, entry.pendingCount - 1);

    if (response.type === 'MESH_READY' && response.meshData) {
      task.resolve(response.meshData);
    } else {
      task.reject(new Error(response.error ?? 'Unknown worker error'));
    }

    this.trimExcessWorkers();
    this.drainQueue();
  }

  /**
   * Unrecoverable worker failure (script error, out-of-memory). Rejects the
   * tasks it was running, replaces it, and drains the queue.
   */
  private handleWorkerError(entry: WorkerEntry, ev: ErrorEvent): void {
    const errorMsg = ev.message || 'Worker error';
    log.error(`Worker crashed: ${errorMsg}`);

    entry.worker.terminate();
    entry.pendingCount = 0;

    for (const [id, task] of this.pending) {
      if (task.entry === entry) {
        this.pending.delete(id);
        task.reject(new Error(`Mesh worker crashed: ${errorMsg}`));
      }
    }

    const idx = this.workers.indexOf(entry);
    if (idx === -1) return;

    if (!this.disposed && this.workers.length <= this.targetPoolSize) {
      this.workers[idx] = this.createWorkerEntry();
      log.info('Replaced crashed worker with fresh instance');
    } else {
      this.workers.splice(idx, 1);
    }

    this.drainQueue();
  }

  private drainQueue(): void {
    while (this.queue.length > 0) {
      const worker = this.pickWorker();
      if (!worker || worker.pendingCount > 0) break;

      const queued = this.queue.shift();
      if (!queued) break;
      this.dispatch(worker, queued);
    }
  }

  /** Remove idle workers beyond the target size. */
  private trimExcessWorkers(): void {
    while (this.workers.length > this.targetPoolSize) {
      let removed = false;
      for (let i = this.workers.length - 1; i >= 0; i--) {
        const w = this.workers[i];
        if (w && w.pendingCount === 0) {
          w.worker.terminate();
          this.workers.splice(i, 1);
          removed = true;
          break;
        }
      }
      // Busy excess workers are trimmed when they finish.
      if (!removed) break;
    }
  }
}
