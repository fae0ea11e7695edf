/**
 * Marching Cubes — isosurface extraction from an SDF on a regular grid.
 *
 * Each grid cube is split into six tetrahedra that share the cube's main
 * diagonal (the Freudenthal split). Neighbouring cubes split their common
 * faces the same way, so the surface pieces meet edge to edge and the
 * output has no cracks and no ambiguous cases.
 *
 * Algorithm:
 *   1. Sample the SDF at every grid point (one evaluation per point)
 *   2. For each tetrahedron, classify its 4 corners as inside (< 0) or not
 *   3. Emit 1 triangle (1 or 3 corners inside) or 2 (2 inside)
 *   4. Share one vertex per crossed grid edge, keyed by the edge's endpoints
 *
 * Triangles are wound so their normals point from inside to outside.
 */

import type { SDF } from './sdf.js';
import type { TriangleMesh } from './mesh.js';
import { computeBounds } from './mesh.js';
import { type Vec3, type BoundingBox, sub, cross, dot, isFiniteBounds } from './vec3.js';

/** Upper bound on grid samples; beyond this the grid would not fit in memory. */
export const MAX_GRID_POINTS = 40_000_000;

// Corner c of a cube sits at (c & 1, (c >> 1) & 1, (c >> 2) & 1).
const TETRAHEDRA: ReadonlyArray<readonly [number, number, number, number]> = [
  [0, 1, 3, 7],
  [0, 1, 5, 7],
  [0, 2, 3, 7],
  [0, 2, 6, 7],
  [0, 4, 5, 7],
  [0, 4, 6, 7],
];

/**
 * Mesh an SDF by sampling it on a grid of `resolution` mm cells.
 *
 * @param bounds - Region to sample (default: the shape's bounds)
 * @param padding - Extra margin around the bounds (default: one cell)
 */
export function marchingCubes(
  shape: SDF,
  resolution: number,
  bounds: BoundingBox = shape.bounds(),
  padding = resolution,
): TriangleMesh {
  if (!(resolution > 0)) throw new Error('Resolution must be positive');
  if (!isFiniteBounds(bounds)) {
    throw new Error(`Cannot mesh ${shape.name}: its bounds are not finite. Intersect it with a bounded shape first.`);
  }

  const origin: Vec3 = [bounds.min[0] - padding, bounds.min[1] - padding, bounds.min[2] - padding];
  const nx = Math.max(1, Math.ceil((bounds.max[0] + padding - origin[0]) / resolution));
  const ny = Math.max(1, Math.ceil((bounds.max[1] + padding - origin[1]) / resolution));
  const nz = Math.max(1, Math.ceil((bounds.max[2] + padding - origin[2]) / resolution));

  const px = nx + 1, py = ny + 1, pz = nz + 1;
  const total = px * py * pz;
  if (total > MAX_GRID_POINTS) {
    throw new Error(
      `Grid too large: ${px}×${py}×${pz} = ${total} samples (max ${MAX_GRID_POINTS}). ` +
      `Use a coarser resolution than ${resolution} mm.`
    );
  }

  // 1. Sample
  const values = new Float64Array(total);
  for (let k = 0; k < pz; k++) {
    const z = origin[2] + k * resolution;
    for (let j = 0; j < py; j++) {
      const y = origin[1] + j * resolution;
      const row = (k * py + j) * px;
      for (let i = 0; i < px; i++) {
        values[row + i] = shape.evaluate([origin[0] + i * resolution, y, z]);
      }
    }
  }

  const pointAt = (index: number): Vec3 => {
    const i = index % px;
    const j = Math.floor(index / px) % py;
    const k = Math.floor(index / (px * py));
    return [origin[0] + i * resolution, origin[1] + j * resolution, origin[2] + k * resolution];
  };

  const vertices: Vec3[] = [];
  const indices: number[] = [];
  const edgeVertex = new Map<number, number>();

  // 4. One vertex per crossed grid edge (a inside, b outside)
  const vertexOn = (a: number, b: number): number => {
    const key = a < b ? a * total + b : b * total + a;
    const existing = edgeVertex.get(key);
    if (existing !== undefined) return existing;
    const va = values[a];
    const vb = values[b];
    const t = va / (va - vb); // va < 0 <= vb, so the denominator is never 0
    const pa = pointAt(a);
    const pb = pointAt(b);
    const idx = vertices.length;
    vertices.push([
      pa[0] + t * (pb[0] - pa[0]),
      pa[1] + t * (pb[1] - pa[1]),
      pa[2] + t * (pb[2] - pa[2]),
    ]);
    edgeVertex.set(key, idx);
    return idx;
  };

  // Emit triangle (a0,b0), (a1,b1), (a2,b2), each pair an inside→outside edge.
  // Winding is decided on the edge midpoints, which never coincide, then
  // applied to the interpolated vertices.
  const emit = (inside: number, e0: [number, number], e1: [number, number], e2: [number, number]) => {
    const m0 = midpoint(pointAt(e0[0]), pointAt(e0[1]));
    const m1 = midpoint(pointAt(e1[0]), pointAt(e1[1]));
    const m2 = midpoint(pointAt(e2[0]), pointAt(e2[1]));
    const n = cross(sub(m1, m0), sub(m2, m0));
    const outward = dot(n, sub(m0, pointAt(inside))) > 0;
    const i0 = vertexOn(e0[0], e0[1]);
    const i1 = vertexOn(e1[0], e1[1]);
    const i2 = vertexOn(e2[0], e2[1]);
    if (outward) indices.push(i0, i1, i2);
    else indices.push(i0, i2, i1);
  };

  // 2–3. Polygonize each tetrahedron
  const corner = new Array<number>(8);
  for (let k = 0; k < nz; k++) {
    for (let j = 0; j < ny; j++) {
      for (let i = 0; i < nx; i++) {
        const base = (k * py + j) * px + i;
        for (let c = 0; c < 8; c++) {
          corner[c] = base + (c & 1) + ((c >> 1) & 1) * px + ((c >> 2) & 1) * px * py;
        }
        for (const tet of TETRAHEDRA) {
          const inside: number[] = [];
          const outside: number[] = [];
          for (const c of tet) {
            const g = corner[c];
            if (values[g] < 0) inside.push(g);
            else outside.push(g);
          }
          if (inside.length === 0 || inside.length === 4) continue;

          if (inside.length === 1) {
            const a = inside[0];
            emit(a, [a, outside[0]], [a, outside[1]], [a, outside[2]]);
          } else if (inside.length === 3) {
            const b = outside[0];
            emit(inside[0], [inside[0], b], [inside[1], b], [inside[2], b]);
          } else {
            // Quad ac, ad, bd, bc around the tetrahedron, split along ac–bd
            const [a, b] = inside;
            const [c, d] = outside;
            emit(a, [a, c], [a, d], [b, d]);
            emit(a, [a, c], [b, d], [b, c]);
          }
        }
      }
    }
  }

  const triangleCount = indices.length / 3;
  return {
    vertices,
    indices,
    vertexCount: vertices.length,
    triangleCount,
    bounds: computeBounds(vertices),
  };
}

function midpoint(a: Vec3, b: Vec3): Vec3 {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2, (a[2] + b[2]) / 2];
}
