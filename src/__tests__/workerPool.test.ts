import { describe, it, expect, beforeEach } from 'vitest';
import { WorkerPool } from '../workers/workerPool';
import { FakeWorker } from './fakeWorker';
import { extractWindow } from '../world/chunkPartitioner';
import { generateTerrain } from '../world/proceduralTerrain';
import { meshTriangleCount } from '../world/meshBuilder';
import type { MeshBuildOptions, SampleRegion } from '../types';

const OPTIONS: MeshBuildOptions = { heightScale: 1, normalMode: 'smooth', colorScheme: { kind: 'terrain' } };
const REGION: SampleRegion = { col0: 0, row0: 0, cols: 4, rows: 4 };
const grid = generateTerrain({ width: 8, height: 8, seed: 2 });

function request(pool: WorkerPool) {
  return pool.requestMesh(extractWindow(grid, REGION), REGION, OPTIONS);
}

describe('WorkerPool', () => {
  let created: FakeWorker[];
  const factory = (): FakeWorker => {
    const worker = new FakeWorker();
    created.push(worker);
    return worker;
  };

  beforeEach(() => {
    created = [];
  });

  it('creates the requested number of workers', () => {
    const pool = new WorkerPool(3, factory);
    expect(pool.workerCount).toBe(3);
    expect(created.length).toBe(3);
    pool.dispose();
  });

  it('resolves with the mesh the worker returns', async () => {
    const pool = new WorkerPool(1, factory);
    const pending = request(pool);
    expect(pool.pendingTaskCount).toBe(1);
    created[0]?.complete();
    const mesh = await pending;
    expect(meshTriangleCount(mesh)).toBe(18);
    expect(pool.pendingTaskCount).toBe(0);
    pool.dispose();
  });

  it('transfers the sample window buffer', () => {
    const pool = new WorkerPool(1, factory);
    const source = extractWindow(grid, REGION);
    const pending = pool.requestMesh(source, REGION, OPTIONS);
    expect(created[0]?.transfers[0]).toEqual([source.window.samples.buffer]);
    const settled = expect(pending).rejects.toThrow('WorkerPool disposed');
    pool.dispose();
    return settled;
  });

  it('spreads work over idle workers and queues the rest', async () => {
    const pool = new WorkerPool(2, factory);
    const a = request(pool);
    const b = request(pool);
    const c = request(pool);
    expect(created[0]?.requests.length).toBe(1);
    expect(created[1]?.requests.length).toBe(1);
    expect(pool.queueLength).toBe(1);

    created[1]?.complete(0);
    await b;
    expect(pool.queueLength).toBe(0);
    expect(created[1]?.requests.length).toBe(2);

    created[0]?.complete(0);
    created[1]?.complete(1);
    await Promise.all([a, c]);
    pool.dispose();
  });

  it('rejects with the error a worker reports', async () => {
    const pool = new WorkerPool(1, factory);
    const pending = request(pool);
    const id = created[0]?.requests[0]?.id ?? -1;
    created[0]?.reply({ id, type: 'ERROR', error: 'region out of range' });
    await expect(pending).rejects.toThrow('region out of range');
    pool.dispose();
  });

  it('ignores responses for unknown ids', () => {
    const pool = new WorkerPool(1, factory);
    created[0]?.reply({ id: 999, type: 'ERROR', error: 'stray' });
    expect(pool.pendingTaskCount).toBe(0);
    pool.dispose();
  });

  it('rejects in-flight work of a crashed worker and replaces it', async () => {
    const pool = new WorkerPool(1, factory);
    const first = request(pool);
    const second = request(pool);
    expect(pool.queueLength).toBe(1);

    const firstFailed = expect(first).rejects.toThrow('Mesh worker crashed: out of memory');
    created[0]?.crash('out of memory');
    await firstFailed;

    expect(created[0]?.terminated).toBe(true);
    expect(created.length).toBe(2);
    expect(pool.workerCount).toBe(1);
    // The queued task moves to the replacement.
    expect(created[1]?.requests.length).toBe(1);
    created[1]?.complete();
    await expect(second).resolves.toBeDefined();
    pool.dispose();
  });

  it('rejects pending and queued work on dispose', async () => {
    const pool = new WorkerPool(1, factory);
    const inFlight = request(pool);
    const queued = request(pool);
    const settled = Promise.all([
      expect(inFlight).rejects.toThrow('WorkerPool disposed'),
      expect(queued).rejects.toThrow('WorkerPool disposed'),
    ]);
    pool.dispose();
    await settled;
    expect(created[0]?.terminated).toBe(true);
    expect(pool.workerCount).toBe(0);
    await expect(request(pool)).rejects.toThrow('WorkerPool has been disposed');
  });

  it('grows at once and shrinks only idle workers', async () => {
    const pool = new WorkerPool(1, factory);
    pool.setPoolSize(3);
    expect(pool.workerCount).toBe(3);

    const busy = request(pool);
    pool.setPoolSize(1);
    // Worker 0 is busy, so the two idle ones go.
    expect(pool.workerCount).toBe(1);
    expect(created[1]?.terminated).toBe(true);
    expect(created[2]?.terminated).toBe(true);
    expect(created[0]?.terminated).toBe(false);

    created[0]?.complete();
    await busy;
    pool.dispose();
  });

  it('clamps the pool size to at least one worker', () => {
    const pool = new WorkerPool(2, factory);
    pool.setPoolSize(0);
    expect(pool.workerCount).toBe(1);
    pool.dispose();
  });
});
