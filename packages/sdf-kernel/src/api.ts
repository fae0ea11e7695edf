/**
 * Fluent API — the DSL surface for scripts and tools.
 *
 *   extrude(roundedRect2d(140, 140, 8), 4).subtract(cylinder(2.25, 10).at(62.25, 62.25, 0))
 *
 * All functions return SDF nodes. Composition is just method chaining.
 */

import { SDF, Cylinder, Plane, Extrude } from './sdf.js';
import { type SDF2D, RoundedRect2D } from './sdf2d.js';
import { BendPath, type BendPathOptions, type SweepPath } from './path.js';
import { Sweep, type SweepSection, type SweepOptions } from './sweep.js';
import type { Vec3 } from './vec3.js';

// ─── Primitive constructors ─────────────────────────────────

/** Cylinder centered at origin, aligned along Z. */
export function cylinder(radius: number, height: number): SDF {
  return new Cylinder(radius, height);
}

/** Infinite half-space. Points where dot(p, normal) < offset are inside. */
export function plane(normal: Vec3, offset: number): SDF {
  return new Plane(normal, offset);
}

// ─── Standalone boolean constructors ─────────────────────────

export function subtract(from: SDF, ...cutters: SDF[]): SDF {
  return cutters.reduce((a, b) => a.subtract(b), from);
}

// ─── 2D Profile constructors ──────────────────────────────────

/** 2D rectangle with rounded corners, centered at origin. */
export function roundedRect2d(width: number, height: number, cornerRadius = 0): SDF2D {
  return new RoundedRect2D(width, height, cornerRadius);
}

// ─── 2D → 3D constructors ─────────────────────────────────────

/** Extrude a 2D profile along Z by height (centered at z=0). */
export function extrude(profile: SDF2D, height: number): SDF {
  return new Extrude(profile, height);
}

/** Rise, bend toward +X, run: the spine of a bent duct. Angle in degrees. */
export function bendPath(options: BendPathOptions): BendPath {
  return new BendPath(options);
}

/** Sweep a progress-indexed cross-section along a spine. */
export function sweep(path: SweepPath, section: SweepSection, options?: SweepOptions): Sweep {
  return new Sweep(path, section, options);
}
