/**
 * SDF Node — the core of the kernel.
 *
 * Every shape is an SDF node. Nodes compose via booleans and transforms:
 *
 *   extrude(roundedRect2d(140, 140, 8), 4).subtract(cylinder(2.25, 6).at(62, 62, 2))
 *
 * Evaluation is exact where the primitives are; booleans give bounds on the
 * true distance, which is all the mesher needs.
 */

import {
  type Vec3, type BoundingBox,
  vec3, add, sub, dot, length, normalize, len2d, unionBounds, intersectBounds,
} from './vec3.js';
import type { SDF2D } from './sdf2d.js';

// ─── Base class ────────────────────────────────────────────────

export abstract class SDF {
  /** Evaluate signed distance at point p. Negative = inside. */
  abstract evaluate(p: Vec3): number;

  /** Human-readable name for readback. */
  abstract get name(): string;

  /**
   * Axis-aligned box containing every point where evaluate(p) <= 0.
   * Exact for primitives, conservative for composites. May be infinite
   * for unbounded nodes (half-spaces, open sweeps).
   */
  abstract bounds(): BoundingBox;

  // ─── Gradient (surface normal) ─────────────────────────────

  /**
   * Field gradient via central differences. Override for analytical.
   * Unit length for an exact distance field; longer where the field
   * underestimates distance, as a twisted sweep does.
   */
  gradient(p: Vec3, eps = 1e-6): Vec3 {
    const dx = this.evaluate([p[0] + eps, p[1], p[2]]) - this.evaluate([p[0] - eps, p[1], p[2]]);
    const dy = this.evaluate([p[0], p[1] + eps, p[2]]) - this.evaluate([p[0], p[1] - eps, p[2]]);
    const dz = this.evaluate([p[0], p[1], p[2] + eps]) - this.evaluate([p[0], p[1], p[2] - eps]);
    const inv = 1 / (2 * eps);
    return [dx * inv, dy * inv, dz * inv];
  }

  /** Surface normal at a point (normalized gradient). */
  normal(p: Vec3): Vec3 {
    return normalize(this.gradient(p));
  }

  // ─── Queries ───────────────────────────────────────────────

  /** Test if point is inside (or on surface of) the shape. */
  contains(p: Vec3): boolean {
    return this.evaluate(p) <= 0;
  }

  /** Structured readback: name, bounds, size, center. */
  readback(): SDFReadback {
    const b = this.bounds();
    const size: Vec3 = [b.max[0] - b.min[0], b.max[1] - b.min[1], b.max[2] - b.min[2]];
    return {
      name: this.name,
      bounds: b,
      size,
      center: [(b.min[0] + b.max[0]) / 2, (b.min[1] + b.max[1]) / 2, (b.min[2] + b.max[2]) / 2],
    };
  }

  // ─── Boolean operations (fluent) ───────────────────────────

  subtract(other: SDF): SDF { return new Subtract(this, other); }
  intersect(other: SDF): SDF { return new Intersect(this, other); }

  /** Union with a rounded blend of radius k where the shapes meet. */
  smoothUnion(other: SDF, k: number): SDF { return new SmoothUnion(this, other, k); }

  // ─── Transform operations (fluent) ─────────────────────────

  translate(x: number, y: number, z: number): SDF { return new Translate(this, [x, y, z]); }

  /** Translate — alias for .translate() */
  at(x: number, y: number, z: number): SDF { return this.translate(x, y, z); }

  /** The part of this shape deeper than `depth` below its surface. */
  inset(depth: number): SDF { return new Inset(this, depth); }
}

// ─── Readback type ─────────────────────────────────────────────

export interface SDFReadback {
  name: string;
  bounds: BoundingBox;
  size: Vec3;
  center: Vec3;
}

const UNBOUNDED: BoundingBox = {
  min: [-Infinity, -Infinity, -Infinity],
  max: [Infinity, Infinity, Infinity],
};

// ─── Primitives ────────────────────────────────────────────────

export class Cylinder extends SDF {
  readonly kind = 'cylinder' as const;
  constructor(readonly radius: number, readonly height: number) {
    super();
    if (radius <= 0 || height <= 0) throw new Error('Cylinder radius and height must be positive');
  }
  get name() { return `cylinder(r=${this.radius}, h=${this.height})`; }
  evaluate(p: Vec3): number {
    const halfH = this.height / 2;
    const dr = len2d(p[0], p[1]) - this.radius;
    const dz = Math.abs(p[2]) - halfH;
    return Math.min(Math.max(dr, dz), 0) + len2d(Math.max(dr, 0), Math.max(dz, 0));
  }
  bounds(): BoundingBox {
    const r = this.radius, hh = this.height / 2;
    return { min: vec3(-r, -r, -hh), max: vec3(r, r, hh) };
  }
}

/** Half-space. Points where dot(p, normal) < offset are inside. */
export class Plane extends SDF {
  readonly kind = 'plane' as const;
  private readonly n: Vec3;
  constructor(normal: Vec3, readonly offset: number) {
    super();
    if (length(normal) === 0) throw new Error('Plane normal must be non-zero');
    this.n = normalize(normal);
  }
  get name() { return `plane([${this.n}], ${this.offset})`; }
  evaluate(p: Vec3): number {
    return dot(p, this.n) - this.offset;
  }
  gradient(_p: Vec3): Vec3 { return this.n; }
  /** Bounded along the normal's axis when the normal is axis-aligned, infinite otherwise. */
  bounds(): BoundingBox {
    const axis = this.n.findIndex(c => Math.abs(c) === 1);
    if (axis < 0) return UNBOUNDED;
    const min: Vec3 = [...UNBOUNDED.min];
    const max: Vec3 = [...UNBOUNDED.max];
    if (this.n[axis] > 0) max[axis] = this.offset;
    else min[axis] = -this.offset;
    return { min, max };
  }
}

// ─── Boolean operations ────────────────────────────────────────

export class Subtract extends SDF {
  readonly kind = 'subtract' as const;
  constructor(readonly a: SDF, readonly b: SDF) { super(); }
  get name() { return `subtract(${this.a.name}, ${this.b.name})`; }
  evaluate(p: Vec3): number {
    return Math.max(this.a.evaluate(p), -this.b.evaluate(p));
  }
  bounds(): BoundingBox {
    return this.a.bounds(); // Conservative: result fits within A
  }
}

export class Intersect extends SDF {
  readonly kind = 'intersect' as const;
  constructor(readonly a: SDF, readonly b: SDF) { super(); }
  get name() { return `intersect(${this.a.name}, ${this.b.name})`; }
  evaluate(p: Vec3): number {
    return Math.max(this.a.evaluate(p), this.b.evaluate(p));
  }
  bounds(): BoundingBox { return intersectBounds(this.a.bounds(), this.b.bounds()); }
}

// Polynomial smooth min
function smin(a: number, b: number, k: number): number {
  if (k <= 0) return Math.min(a, b);
  const h = Math.max(k - Math.abs(a - b), 0) / k;
  return Math.min(a, b) - h * h * k * 0.25;
}

export class SmoothUnion extends SDF {
  readonly kind = 'smoothUnion' as const;
  constructor(readonly a: SDF, readonly b: SDF, readonly k: number) { super(); }
  get name() { return `smoothUnion(${this.a.name}, ${this.b.name}, k=${this.k})`; }
  evaluate(p: Vec3): number {
    return smin(this.a.evaluate(p), this.b.evaluate(p), this.k);
  }
  bounds(): BoundingBox {
    const b = unionBounds(this.a.bounds(), this.b.bounds());
    const pad = Math.max(this.k, 0) / 2;
    return {
      min: [b.min[0] - pad, b.min[1] - pad, b.min[2] - pad],
      max: [b.max[0] + pad, b.max[1] + pad, b.max[2] + pad],
    };
  }
}

// ─── Transforms ────────────────────────────────────────────────

export class Translate extends SDF {
  readonly kind = 'translate' as const;
  constructor(readonly child: SDF, readonly offset: Vec3) { super(); }
  get name() { return `${this.child.name}.translate(${this.offset})`; }
  evaluate(p: Vec3): number {
    return this.child.evaluate(sub(p, this.offset));
  }
  bounds(): BoundingBox {
    const cb = this.child.bounds();
    return { min: add(cb.min, this.offset), max: add(cb.max, this.offset) };
  }
}

/**
 * Inset: points more than `depth` inside the child, with depth measured in
 * 3D. The child's value is divided by its gradient length, so a field that
 * only measures distance within a cross-section plane (a twisted or tapering
 * sweep) still gives a wall of the full depth.
 */
export class Inset extends SDF {
  readonly kind = 'inset' as const;
  constructor(readonly child: SDF, readonly depth: number) {
    super();
    if (!(depth > 0)) throw new Error(`Inset depth must be positive (got ${depth})`);
  }
  get name() { return `${this.child.name}.inset(${this.depth})`; }
  evaluate(p: Vec3): number {
    const d = this.child.evaluate(p);
    if (d >= 0) return d + this.depth;
    // Clamped at 1: medial points have a vanishing central difference
    const g = Math.max(length(this.child.gradient(p)), 1);
    return d / g + this.depth;
  }
  bounds(): BoundingBox { return this.child.bounds(); }
}

// ─── 2D → 3D Bridge ────────────────────────────────────────────

/**
 * Linear extrude: create a 3D solid by extruding a 2D profile along Z.
 * Centered: extends from -height/2 to +height/2.
 *
 * Uses Quilez's exact extrusion formula (not naive max) which correctly
 * handles edge/corner distances where the profile meets the caps.
 */
export class Extrude extends SDF {
  readonly kind = 'extrude' as const;
  private readonly halfH: number;

  constructor(readonly profile: SDF2D, readonly height: number) {
    super();
    if (height <= 0) throw new Error('Extrude height must be positive');
    this.halfH = height / 2;
  }

  get name() { return `extrude(${this.profile.name}, h=${this.height})`; }

  evaluate(p: Vec3): number {
    return capDistance(this.profile.evaluate(p[0], p[1]), Math.abs(p[2]) - this.halfH);
  }

  bounds(): BoundingBox {
    const b2 = this.profile.bounds2d();
    return {
      min: vec3(b2.min[0], b2.min[1], -this.halfH),
      max: vec3(b2.max[0], b2.max[1], this.halfH),
    };
  }
}

/**
 * Combine a cross-section distance d with a distance w past the end caps
 * (negative between them), treating (d, w) as a 2D point and measuring to
 * the quadrant where both are <= 0.
 */
export function capDistance(d: number, w: number): number {
  return Math.min(Math.max(d, w), 0) + len2d(Math.max(d, 0), Math.max(w, 0));
}
