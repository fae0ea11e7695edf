/**
 * SDF2D — 2D signed distance fields for cross-section geometry.
 *
 * Profiles are the cross-sections of extrusions and sweeps:
 *   extrude(roundedRect2d(140, 140, 8), 4)
 *
 * Combine with Extrude (linear) in sdf.ts or Sweep (along a spine)
 * in sweep.ts to create 3D solids from 2D cross-sections.
 */

import type { Vec2 } from './vec3.js';
import { len2d } from './vec3.js';

// ─── Bounding box ──────────────────────────────────────────────

export interface BoundingBox2D { min: Vec2; max: Vec2; }

// ─── Base class ────────────────────────────────────────────────

export abstract class SDF2D {
  /** Evaluate signed distance at point (x, y). Negative = inside. */
  abstract evaluate(x: number, y: number): number;

  /** Human-readable name for readback. */
  abstract get name(): string;

  /** Axis-aligned bounding box of the 2D shape. */
  abstract bounds2d(): BoundingBox2D;

  /** Test if point is inside (or on boundary of) the 2D shape. */
  contains(x: number, y: number): boolean {
    return this.evaluate(x, y) <= 0;
  }

  /**
   * Distance from the origin to the boundary along the ray at `angle` (radians).
   *
   * Bisection on the field, so the profile must be star-shaped about the
   * origin: the ray leaves the shape exactly once.
   */
  boundaryAlong(angle: number, maxRadius: number, tolerance = 1e-9): number {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    if (this.evaluate(0, 0) > 0) {
      throw new Error(`${this.name}: origin is outside the profile, cannot trace its boundary`);
    }
    if (this.evaluate(c * maxRadius, s * maxRadius) <= 0) {
      throw new Error(`${this.name}: boundary lies beyond maxRadius ${maxRadius}`);
    }
    let lo = 0;
    let hi = maxRadius;
    while (hi - lo > tolerance) {
      const mid = (lo + hi) * 0.5;
      if (this.evaluate(c * mid, s * mid) <= 0) lo = mid;
      else hi = mid;
    }
    return (lo + hi) * 0.5;
  }
}

// ─── RoundedRect2D — exact ─────────────────────────────────────

/**
 * Exact distance to a rectangle of half-extents (halfW, halfH) whose corners
 * are rounded with radius r. r = halfW = halfH gives a circle, r = 0 a
 * sharp rectangle.
 */
export function roundedRectDistance(x: number, y: number, halfW: number, halfH: number, r: number): number {
  const qx = Math.abs(x) - halfW + r;
  const qy = Math.abs(y) - halfH + r;
  return len2d(Math.max(qx, 0), Math.max(qy, 0)) + Math.min(Math.max(qx, qy), 0) - r;
}

/** Distance from the center to the farthest boundary point (a corner arc). */
export function roundedRectCircumradius(halfW: number, halfH: number, r: number): number {
  return len2d(halfW - r, halfH - r) + r;
}

/** 2D rectangle with rounded corners, centered at origin. */
export class RoundedRect2D extends SDF2D {
  readonly kind = 'roundedRect2d' as const;
  readonly halfW: number;
  readonly halfH: number;

  constructor(readonly width: number, readonly height: number, readonly cornerRadius = 0) {
    super();
    if (width <= 0 || height <= 0) throw new Error('RoundedRect2D dimensions must be positive');
    this.halfW = width / 2;
    this.halfH = height / 2;
    const maxR = Math.min(this.halfW, this.halfH);
    if (cornerRadius < 0 || cornerRadius > maxR) {
      throw new Error(
        `RoundedRect2D corner radius ${cornerRadius} out of range: must be within [0, ${maxR}] ` +
        `(half the smaller side)`
      );
    }
  }

  get name(): string {
    return `roundedRect2d(${this.width}, ${this.height}, r=${this.cornerRadius})`;
  }

  evaluate(x: number, y: number): number {
    return roundedRectDistance(x, y, this.halfW, this.halfH, this.cornerRadius);
  }

  bounds2d(): BoundingBox2D {
    return { min: [-this.halfW, -this.halfH], max: [this.halfW, this.halfH] };
  }

  circumradius(): number {
    return roundedRectCircumradius(this.halfW, this.halfH, this.cornerRadius);
  }
}
