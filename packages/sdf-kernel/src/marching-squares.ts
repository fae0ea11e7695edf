/**
 * Marching Squares — 2D contour extraction from SDF cross-sections.
 *
 * Given a 2D scalar field (an SDF evaluated on a plane),
 * extracts zero-isosurface contours as ordered polyline loops.
 *
 * Loops run counter-clockwise around material, so outlines have a positive
 * `loopArea` and holes a negative one.
 *
 * Algorithm:
 *   1. Evaluate SDF on a regular grid
 *   2. Classify each cell (4 corners) into one of 16 cases
 *   3. Emit edge segments with linear interpolation
 *   4. Stitch segments into ordered loops via endpoint hashing
 */

import type { SDF } from './sdf.js';
import type { Vec2, Vec3 } from './vec3.js';
import { addScaled } from './vec3.js';

export interface ContourLoop {
  points: Vec2[];
  closed: boolean;
}

export interface ContourBounds {
  uMin: number;
  uMax: number;
  vMin: number;
  vMax: number;
}

// ─── Marching Squares Core ─────────────────────────────────────

/**
 * Extract zero-isosurface contours from a 2D scalar field.
 *
 * @param evaluate - (u, v) => signed distance value
 * @param bounds - Rectangular evaluation region
 * @param cellSize - Grid cell size in mm
 * @returns Array of contour loops (outer + inner)
 */
export function extractContours(
  evaluate: (u: number, v: number) => number,
  bounds: ContourBounds,
  cellSize: number,
): ContourLoop[] {
  if (!(cellSize > 0)) throw new Error('cellSize must be positive');

  const nu = Math.ceil((bounds.uMax - bounds.uMin) / cellSize);
  const nv = Math.ceil((bounds.vMax - bounds.vMin) / cellSize);

  if (nu <= 0 || nv <= 0) return [];

  // Evaluate grid values (nu+1 × nv+1 grid)
  const cols = nu + 1;
  const rows = nv + 1;
  const values = new Float64Array(cols * rows);

  for (let iv = 0; iv < rows; iv++) {
    const v = bounds.vMin + iv * cellSize;
    for (let iu = 0; iu < cols; iu++) {
      values[iv * cols + iu] = evaluate(bounds.uMin + iu * cellSize, v);
    }
  }

  // Extract segments from each cell
  const segments: [Vec2, Vec2][] = [];

  for (let iv = 0; iv < nv; iv++) {
    for (let iu = 0; iu < nu; iu++) {
      const u0 = bounds.uMin + iu * cellSize;
      const v0 = bounds.vMin + iv * cellSize;
      const u1 = u0 + cellSize;
      const v1 = v0 + cellSize;

      // Corner values: BL, BR, TR, TL (bottom-left origin)
      const vBL = values[iv * cols + iu];
      const vBR = values[iv * cols + iu + 1];
      const vTR = values[(iv + 1) * cols + iu + 1];
      const vTL = values[(iv + 1) * cols + iu];

      // Case index: bit 0 = BL, bit 1 = BR, bit 2 = TR, bit 3 = TL
      // Inside (negative SDF) = 1, outside (positive) = 0
      const caseIndex =
        (vBL < 0 ? 1 : 0) |
        (vBR < 0 ? 2 : 0) |
        (vTR < 0 ? 4 : 0) |
        (vTL < 0 ? 8 : 0);

      if (caseIndex === 0 || caseIndex === 15) continue; // All outside or all inside

      // Bottom edge: BL-BR, Right edge: BR-TR, Top edge: TL-TR, Left edge: BL-TL
      const bottom: Vec2 = [lerp(u0, u1, vBL, vBR), v0];
      const right: Vec2 = [u1, lerp(v0, v1, vBR, vTR)];
      const top: Vec2 = [lerp(u0, u1, vTL, vTR), v1];
      const left: Vec2 = [u0, lerp(v0, v1, vBL, vTL)];

      // 16-case lookup table, material on the left of each segment
      switch (caseIndex) {
        case 1:  segments.push([bottom, left]); break;
        case 2:  segments.push([right, bottom]); break;
        case 3:  segments.push([right, left]); break;
        case 4:  segments.push([top, right]); break;
        case 5:  // Saddle: BL+TR inside
          segments.push([top, left]);
          segments.push([bottom, right]);
          break;
        case 6:  segments.push([top, bottom]); break;
        case 7:  segments.push([top, left]); break;
        case 8:  segments.push([left, top]); break;
        case 9:  segments.push([bottom, top]); break;
        case 10: // Saddle: BR+TL inside
          segments.push([right, bottom]);
          segments.push([left, top]);
          break;
        case 11: segments.push([right, top]); break;
        case 12: segments.push([left, right]); break;
        case 13: segments.push([bottom, right]); break;
        case 14: segments.push([left, bottom]); break;
      }
    }
  }

  return stitchContours(segments);
}

/**
 * Slice a 3D field on a plane.
 *
 * The plane passes through `origin` and is spanned by `uAxis` and `vAxis`
 * (unit, perpendicular). Loops come back in plane coordinates over
 * [−halfSize, halfSize]².
 */
export function sectionPlane(
  shape: SDF,
  origin: Vec3,
  uAxis: Vec3,
  vAxis: Vec3,
  halfSize: number,
  cellSize: number,
): ContourLoop[] {
  if (!(halfSize > 0)) throw new Error('halfSize must be positive');
  return extractContours(
    (u, v) => shape.evaluate(addScaled(addScaled(origin, uAxis, u), vAxis, v)),
    { uMin: -halfSize, uMax: halfSize, vMin: -halfSize, vMax: halfSize },
    cellSize,
  );
}

/** Signed area of a polygon (shoelace); positive when counter-clockwise. */
export function loopArea(points: Vec2[]): number {
  let area = 0;
  for (let i = 0; i < points.length; i++) {
    const [x0, y0] = points[i];
    const [x1, y1] = points[(i + 1) % points.length];
    area += x0 * y1 - x1 * y0;
  }
  return area / 2;
}

// ─── Linear Interpolation ──────────────────────────────────────

/** Interpolate between a and b where the zero crossing is, based on signed distance values. */
function lerp(a: number, b: number, va: number, vb: number): number {
  const denom = va - vb;
  if (Math.abs(denom) < 1e-12) return (a + b) / 2;
  const t = va / denom;
  return a + t * (b - a);
}

// ─── Contour Stitching ─────────────────────────────────────────

/**
 * Stitch directed line segments into ordered polyline loops.
 * Uses endpoint hashing to find the segment that starts where the last one ended.
 */
function stitchContours(segments: [Vec2, Vec2][]): ContourLoop[] {
  if (segments.length === 0) return [];

  const PRECISION = 6;
  const key = (p: Vec2) => `${p[0].toFixed(PRECISION)},${p[1].toFixed(PRECISION)}`;

  // Start point → segments starting there
  const starting = new Map<string, number[]>();
  for (let i = 0; i < segments.length; i++) {
    const k = key(segments[i][0]);
    const list = starting.get(k);
    if (list) list.push(i);
    else starting.set(k, [i]);
  }

  // Open chains (clipped by the grid edge) must be walked from their head
  const ending = new Set(segments.map((s) => key(s[1])));
  const heads: number[] = [];
  const rest: number[] = [];
  for (let i = 0; i < segments.length; i++) {
    (ending.has(key(segments[i][0])) ? rest : heads).push(i);
  }

  const used = new Uint8Array(segments.length);
  const loops: ContourLoop[] = [];

  for (const start of [...heads, ...rest]) {
    if (used[start]) continue;
    used[start] = 1;

    const points: Vec2[] = [segments[start][0], segments[start][1]];
    const firstKey = key(points[0]);
    let currentKey = key(points[1]);

    // Walk forward until the loop closes or runs off the grid
    while (currentKey !== firstKey) {
      const next = (starting.get(currentKey) ?? []).find((s) => !used[s]);
      if (next === undefined) break;
      used[next] = 1;
      const nextPt = segments[next][1];
      points.push(nextPt);
      currentKey = key(nextPt);
    }

    const closed = currentKey === firstKey;
    // Drop the duplicate closing point
    if (closed) points.pop();

    if (points.length >= 2) {
      loops.push({ points, closed });
    }
  }

  return loops;
}
