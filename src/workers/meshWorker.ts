/**
 * Web Worker for off-thread terrain mesh builds.
 *
 * Bundled by Vite as an ES module worker:
 *   new Worker(new URL('./meshWorker.ts', import.meta.url), { type: 'module' })
 */

import type { MeshWorkerRequest } from '../types';
import { handleMeshRequest } from './meshWorkerHandler';

/**
 * Typed reference to the worker global scope. Cast through `unknown`
 * because the tsconfig includes the DOM lib, not WebWorker, so
 * DedicatedWorkerGlobalScope is unavailable.
 */
const workerSelf = self as unknown as {
  postMessage(message: unknown, transfer?: Transferable[]): void;
  addEventListener(type: 'message', listener: (ev: MessageEvent<MeshWorkerRequest>) => void): void;
};

workerSelf.addEventListener('message', (ev) => {
  const { response, transfer } = handleMeshRequest(ev.data);
  workerSelf.postMessage(response, transfer);
});
