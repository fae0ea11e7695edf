/**
 * Duct Registry — in-memory named design store.
 *
 * Every build stores its design here and returns a structured readback so
 * the caller always knows the current state. Meshes are cached per design
 * until it is rebuilt or deleted.
 */

import type { SDFReadback, TriangleMesh, MeshReport } from '@fanduct/sdf-kernel';
import type { DuctDesign, DuctParams, RenderMethod } from '@fanduct/duct';

export interface DuctEntry {
  id: string;
  design: DuctDesign;
}

export interface DuctResult {
  duct_id: string;
  type: 'duct';
  length_mm: number;
  readback: SDFReadback;
  params: DuctParams;
}

export interface CachedMesh {
  mesh: TriangleMesh;
  report: MeshReport;
  method: RenderMethod;
  resolution_mm: number;
}

let nextId = 1;

const ducts = new Map<string, DuctEntry>();
const meshCache = new Map<string, CachedMesh>();

function summarize(entry: DuctEntry): DuctResult {
  return {
    duct_id: entry.id,
    type: 'duct',
    length_mm: entry.design.length,
    readback: entry.design.solid.readback(),
    params: entry.design.params,
  };
}

/** Store a design and return its ID + readback. A named design replaces any earlier one of that name. */
export function create(design: DuctDesign, name?: string): DuctResult {
  if (name !== undefined && !/^[a-zA-Z0-9_-]+$/.test(name)) {
    throw new Error(
      `Invalid duct name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  let id = name ?? `duct_${nextId++}`;
  while (name === undefined && ducts.has(id)) {
    id = `duct_${nextId++}`;
  }
  // Stale once the design behind it changes
  meshCache.delete(id);
  const entry = { id, design };
  ducts.set(id, entry);
  return summarize(entry);
}

/** Retrieve a design or throw a clear error. */
export function get(id: string): DuctEntry {
  const entry = ducts.get(id);
  if (!entry) {
    const available = [...ducts.keys()];
    throw new Error(
      `Duct "${id}" not found. Available ducts: [${available.join(', ')}]`
    );
  }
  return entry;
}

/** Remove a design and its cached mesh. */
export function remove(id: string): void {
  if (!ducts.has(id)) {
    throw new Error(`Duct "${id}" not found, cannot delete.`);
  }
  ducts.delete(id);
  meshCache.delete(id);
}

export function has(id: string): boolean {
  return ducts.has(id);
}

export function list(): DuctResult[] {
  return [...ducts.values()].map(summarize);
}

// ─── Mesh cache ─────────────────────────────────────────────────

export function cacheMesh(id: string, cached: CachedMesh): void {
  get(id);
  meshCache.set(id, cached);
}

/** Cached mesh for a design, or null. */
export function getMesh(id: string): CachedMesh | null {
  return meshCache.get(id) ?? null;
}

/** Clear all designs and meshes (for testing). */
export function clear(): void {
  ducts.clear();
  meshCache.clear();
  nextId = 1;
}
