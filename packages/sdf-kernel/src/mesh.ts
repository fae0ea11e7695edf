/**
 * Triangle mesh types and mesh inspection.
 *
 * `inspectMesh` answers the question a slicer asks before it accepts a
 * model: is this a closed, manifold, consistently oriented solid?
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { sub, cross, dot, length } from './vec3.js';

export interface TriangleMesh {
  /** Vertex positions, shared between the triangles that meet there. */
  vertices: Vec3[];
  /** Triangle indices into vertices[], groups of 3. */
  indices: number[];
  vertexCount: number;
  triangleCount: number;
  bounds: BoundingBox;
}

export interface MeshReport {
  triangleCount: number;
  vertexCount: number;
  edgeCount: number;
  /** Edges used by one triangle only: holes and gaps. */
  boundaryEdges: number;
  /** Edges used by three or more triangles. */
  nonManifoldEdges: number;
  /** Edges whose two triangles traverse them in the same direction. */
  misorientedEdges: number;
  /** Triangles with (near) zero area. Harmless to slicers, reported for completeness. */
  degenerateTriangles: number;
  /** Groups of triangles connected through shared vertices. */
  components: number;
  /** V − E + F over the referenced vertices. */
  eulerCharacteristic: number;
  /** Handles per component for a closed oriented mesh, null otherwise. */
  genus: number | null;
  closed: boolean;
  manifold: boolean;
  oriented: boolean;
  /** Closed, manifold and oriented: a printable solid. */
  watertight: boolean;
  /** Enclosed volume in mm³ (positive when normals face outward). */
  volume: number;
  surfaceArea: number;
  bounds: BoundingBox;
}

/** Bounds of a vertex list; all zeros when empty. */
export function computeBounds(vertices: Vec3[]): BoundingBox {
  if (vertices.length === 0) return { min: [0, 0, 0], max: [0, 0, 0] };
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const v of vertices) {
    for (let i = 0; i < 3; i++) {
      if (v[i] < min[i]) min[i] = v[i];
      if (v[i] > max[i]) max[i] = v[i];
    }
  }
  return { min, max };
}

const DEGENERATE_AREA = 1e-12;

export function inspectMesh(mesh: TriangleMesh): MeshReport {
  const { vertices, indices, triangleCount } = mesh;
  if (indices.length !== triangleCount * 3) {
    throw new Error(
      `Mesh data inconsistent: indices.length (${indices.length}) !== triangleCount * 3 (${triangleCount * 3})`
    );
  }
  const n = vertices.length;

  // Undirected edge → [uses, net direction]. +1 for a→b with a < b, −1 for b→a.
  const edges = new Map<number, [number, number]>();
  const useEdge = (a: number, b: number) => {
    const key = a < b ? a * n + b : b * n + a;
    const dir = a < b ? 1 : -1;
    const entry = edges.get(key);
    if (entry) {
      entry[0]++;
      entry[1] += dir;
    } else {
      edges.set(key, [1, dir]);
    }
  };

  const parent = new Int32Array(n).map((_, i) => i);
  const find = (x: number): number => {
    while (parent[x] !== x) {
      parent[x] = parent[parent[x]];
      x = parent[x];
    }
    return x;
  };
  const join = (a: number, b: number) => {
    const ra = find(a), rb = find(b);
    if (ra !== rb) parent[ra] = rb;
  };

  const referenced = new Uint8Array(n);
  let volume = 0;
  let surfaceArea = 0;
  let degenerateTriangles = 0;

  for (let t = 0; t < triangleCount; t++) {
    const a = indices[t * 3], b = indices[t * 3 + 1], c = indices[t * 3 + 2];
    for (const idx of [a, b, c]) {
      if (idx < 0 || idx >= n || !Number.isInteger(idx)) {
        throw new Error(`Triangle ${t} references vertex ${idx}, mesh has ${n} vertices`);
      }
      referenced[idx] = 1;
    }
    useEdge(a, b);
    useEdge(b, c);
    useEdge(c, a);
    join(a, b);
    join(b, c);

    const va = vertices[a], vb = vertices[b], vc = vertices[c];
    const area = length(cross(sub(vb, va), sub(vc, va))) / 2;
    if (area < DEGENERATE_AREA) degenerateTriangles++;
    surfaceArea += area;
    volume += dot(va, cross(vb, vc)) / 6;
  }

  let boundaryEdges = 0;
  let nonManifoldEdges = 0;
  let misorientedEdges = 0;
  for (const [uses, net] of edges.values()) {
    if (uses === 1) boundaryEdges++;
    else if (uses > 2) nonManifoldEdges++;
    else if (net !== 0) misorientedEdges++;
  }

  let vertexCount = 0;
  const roots = new Set<number>();
  for (let i = 0; i < n; i++) {
    if (!referenced[i]) continue;
    vertexCount++;
    roots.add(find(i));
  }

  const components = roots.size;
  const edgeCount = edges.size;
  const eulerCharacteristic = vertexCount - edgeCount + triangleCount;
  const closed = triangleCount > 0 && boundaryEdges === 0;
  const manifold = nonManifoldEdges === 0;
  const oriented = misorientedEdges === 0;
  const watertight = closed && manifold && oriented;

  return {
    triangleCount,
    vertexCount,
    edgeCount,
    boundaryEdges,
    nonManifoldEdges,
    misorientedEdges,
    degenerateTriangles,
    components,
    eulerCharacteristic,
    genus: watertight ? (2 * components - eulerCharacteristic) / 2 : null,
    closed,
    manifold,
    oriented,
    watertight,
    volume,
    surfaceArea,
    bounds: mesh.bounds,
  };
}
