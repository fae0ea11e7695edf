/**
 * Station loft — the duct shell meshed directly from its stations.
 *
 * Each station contributes an outer ring (the morph section, `segments`
 * points at equal angles) and an inner ring one wall in along the outer
 * surface's normal. Where the section twists that normal leans out of the
 * station plane, and so does the inner ring.
 * Consecutive rings are joined with quads and the ends closed with annular
 * caps, giving a closed tube. No base plate or holes: this is the shell on
 * its own, for quick previews and for comparing against the implicit mesh.
 *
 *   ring j ──▶ j+1
 *     a ─── b        station i
 *     │     │
 *     d ─── c        station i+1
 */

import { addScaled, computeBounds, sweep, type Vec3, type TriangleMesh } from '@fanduct/sdf-kernel';
import { resolveParams, type DuctParams } from './params.js';
import { ductPath } from './duct.js';
import { morphProfile, sectionAt, MorphSection, twistAt } from './morph.js';

export interface LoftOptions {
  /** Rings along the spine, at least 2. Default 48. */
  stations?: number;
  /** Points per ring, at least 3. Default 96. */
  segments?: number;
}

/** Two triangles for the quad a-b-c-d. */
function addQuad(indices: number[], a: number, b: number, c: number, d: number, flipped = false): void {
  if (flipped) {
    indices.push(a, d, c);
    indices.push(a, c, b);
  } else {
    indices.push(a, b, c);
    indices.push(a, c, d);
  }
}

export function loftStations(overrides: Partial<DuctParams> = {}, options: LoftOptions = {}): TriangleMesh {
  const stations = options.stations ?? 48;
  const segments = options.segments ?? 96;
  if (!Number.isInteger(stations) || stations < 2) {
    throw new Error(`Loft stations must be an integer of at least 2 (got ${stations})`);
  }
  if (!Number.isInteger(segments) || segments < 3) {
    throw new Error(`Loft segments must be an integer of at least 3 (got ${segments})`);
  }

  const params = resolveParams(overrides);
  const path = ductPath(params);
  const surface = sweep(path, new MorphSection(params), { twist: twistAt(params), capped: false });
  const wall = params.wallThickness;
  const vertices = new Array<Vec3>(2 * stations * segments);

  for (let i = 0; i < stations; i++) {
    const progress = i / (stations - 1);
    const frame = path.frameAt(progress * path.length);
    const rad = sectionAt(params, progress).twist * Math.PI / 180;
    const c = Math.cos(rad);
    const s = Math.sin(rad);

    const profile = morphProfile(params, progress);
    const reach = profile.circumradius() + 1;
    for (let j = 0; j < segments; j++) {
      const theta = (2 * Math.PI * j) / segments;
      const r = profile.boundaryAlong(theta, reach);
      const x = r * Math.cos(theta);
      const y = r * Math.sin(theta);
      const u = x * c - y * s;
      const v = x * s + y * c;
      const point = addScaled(addScaled(frame.point, frame.normal, u), frame.binormal, v);
      vertices[i * segments + j] = point;
      vertices[stations * segments + i * segments + j] = addScaled(point, surface.normal(point), -wall);
    }
  }

  const outer = (i: number, j: number) => i * segments + (j % segments);
  const inner = (i: number, j: number) => stations * segments + i * segments + (j % segments);

  const indices: number[] = [];
  for (let i = 0; i < stations - 1; i++) {
    for (let j = 0; j < segments; j++) {
      addQuad(indices, outer(i, j), outer(i, j + 1), outer(i + 1, j + 1), outer(i + 1, j));
      addQuad(indices, inner(i, j), inner(i, j + 1), inner(i + 1, j + 1), inner(i + 1, j), true);
    }
  }

  // Annular caps: the intake faces back down the spine, the egress forward
  const last = stations - 1;
  for (let j = 0; j < segments; j++) {
    addQuad(indices, outer(0, j), outer(0, j + 1), inner(0, j + 1), inner(0, j), true);
    addQuad(indices, outer(last, j), outer(last, j + 1), inner(last, j + 1), inner(last, j));
  }

  return {
    vertices,
    indices,
    vertexCount: vertices.length,
    triangleCount: indices.length / 3,
    bounds: computeBounds(vertices),
  };
}
