/**
 * Request handling for the mesh worker, kept free of worker globals so it
 * runs (and is tested) on the main thread as well.
 */

import { buildTerrainMesh } from '../world/meshBuilder';
import type { MeshWorkerRequest, MeshWorkerResponse, TerrainMeshData } from '../types';

export interface HandledRequest {
  response: MeshWorkerResponse;
  transfer: ArrayBuffer[];
}

/**
 * Unique, non-empty result buffers. After posting with these the typed
 * arrays are detached on the sending side.
 */
export function meshTransferables(mesh: TerrainMeshData): ArrayBuffer[] {
  const seen = new Set<ArrayBuffer>();
  const transfer: ArrayBuffer[] = [];
  for (const array of [mesh.positions, mesh.normals, mesh.colors, mesh.indices]) {
    const buf = array.buffer;
    if (buf instanceof ArrayBuffer && buf.byteLength > 0 && !seen.has(buf)) {
      seen.add(buf);
      transfer.push(buf);
    }
  }
  return transfer;
}

export function handleMeshRequest(request: MeshWorkerRequest): HandledRequest {
  if (request.type !== 'BUILD_MESH') {
    return {
      response: { id: request.id, type: 'ERROR', error: `Unknown request type: ${String(request.type)}` },
      transfer: [],
    };
  }
  try {
    const meshData = buildTerrainMesh(request.source, request.region, request.options);
    return {
      response: { id: request.id, type: 'MESH_READY', meshData },
      transfer: meshTransferables(meshData),
    };
  } catch (e) {
    return {
      response: { id: request.id, type: 'ERROR', error: e instanceof Error ? e.message : String(e) },
      transfer: [],
    };
  }
}
