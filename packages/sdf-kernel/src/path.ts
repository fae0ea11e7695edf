/**
 * BendPath — the spine a sweep follows.
 *
 * A planar spine in the XZ plane:
 *
 *   rise  — straight from the origin along +Z
 *   bend  — circular arc of `radius` through `angle` degrees, turning toward +X
 *   run   — straight along the exit tangent
 *
 * The frame along the spine is rotation-minimizing for free: the binormal is
 * the bend axis (+Y) everywhere, the normal lies in the bend plane and
 * starts out as +X.
 */

import { type Vec3, type BoundingBox, addScaled, sub, dot } from './vec3.js';

export interface SpineFrame {
  /** Arc length this frame was taken at. */
  arcLength: number;
  point: Vec3;
  tangent: Vec3;
  normal: Vec3;
  binormal: Vec3;
}

export interface SpineProjection {
  /** Arc length of the nearest spine point; below 0 or above length past the ends. */
  arcLength: number;
  /** Offset from the spine along the frame normal. */
  u: number;
  /** Offset from the spine along the frame binormal. */
  v: number;
  /** Leftover offset along the tangent where no piece's interior was nearest. 0 almost everywhere. */
  axial: number;
}

/** Anything a sweep can follow. */
export interface SweepPath {
  readonly length: number;
  frameAt(arcLength: number): SpineFrame;
  project(p: Vec3): SpineProjection;
  /** Box around the spine itself, from 0 to length. */
  spineBounds(): BoundingBox;
}

export interface BendPathOptions {
  rise: number;
  radius: number;
  /** Degrees, 0 to 180. */
  angle: number;
  run: number;
}

const BINORMAL: Vec3 = [0, 1, 0];

export class BendPath implements SweepPath {
  readonly rise: number;
  readonly radius: number;
  readonly angle: number;
  readonly run: number;
  readonly length: number;
  private readonly theta: number;
  private readonly center: Vec3;
  private readonly exitPoint: Vec3;
  private readonly exitTangent: Vec3;
  private readonly exitNormal: Vec3;

  constructor({ rise, radius, angle, run }: BendPathOptions) {
    if (rise < 0 || run < 0) throw new Error('BendPath rise and run must be non-negative');
    if (radius <= 0) throw new Error('BendPath radius must be positive');
    if (angle < 0 || angle > 180) throw new Error(`BendPath angle must be within [0, 180] degrees (got ${angle})`);
    this.rise = rise;
    this.radius = radius;
    this.angle = angle;
    this.run = run;
    this.theta = angle * Math.PI / 180;
    this.center = [radius, 0, rise];
    this.length = rise + radius * this.theta + run;
    this.exitPoint = this.arcPoint(this.theta);
    this.exitTangent = arcTangent(this.theta);
    this.exitNormal = arcNormal(this.theta);
  }

  get name(): string {
    return `bendPath(rise=${this.rise}, R=${this.radius}, ${this.angle}°, run=${this.run})`;
  }

  /** Arc length where the bend ends and the run begins. */
  get bendEnd(): number {
    return this.rise + this.radius * this.theta;
  }

  frameAt(arcLength: number): SpineFrame {
    if (arcLength <= this.rise) {
      return {
        arcLength,
        point: [0, 0, arcLength],
        tangent: [0, 0, 1],
        normal: [1, 0, 0],
        binormal: BINORMAL,
      };
    }
    if (arcLength < this.bendEnd) {
      const phi = (arcLength - this.rise) / this.radius;
      return {
        arcLength,
        point: this.arcPoint(phi),
        tangent: arcTangent(phi),
        normal: arcNormal(phi),
        binormal: BINORMAL,
      };
    }
    return {
      arcLength,
      point: addScaled(this.exitPoint, this.exitTangent, arcLength - this.bendEnd),
      tangent: this.exitTangent,
      normal: this.exitNormal,
      binormal: BINORMAL,
    };
  }

  project(p: Vec3): SpineProjection {
    // Rise, extended to -∞ below the start.
    const zr = Math.min(p[2], this.rise);
    let best: SpineProjection = { arcLength: zr, u: p[0], v: p[1], axial: p[2] - zr };
    let bestDist = p[0] * p[0] + p[1] * p[1] + best.axial * best.axial;

    // Bend: the nearest arc point lies on the ray from the center through p.
    if (this.theta > 0) {
      const dx = p[0] - this.center[0];
      const dz = p[2] - this.center[2];
      const phi = Math.atan2(dz, -dx);
      if (phi >= 0 && phi <= this.theta) {
        const d = sub(p, this.arcPoint(phi));
        const u = dot(d, arcNormal(phi));
        const dist = u * u + p[1] * p[1];
        if (dist < bestDist) {
          bestDist = dist;
          best = { arcLength: this.rise + this.radius * phi, u, v: p[1], axial: 0 };
        }
      }
    }

    // Run, extended to +∞ past the exit.
    const d = sub(p, this.exitPoint);
    const q = dot(d, this.exitTangent);
    const t = Math.max(q, 0);
    const u = dot(d, this.exitNormal);
    const axial = q - t;
    const dist = u * u + p[1] * p[1] + axial * axial;
    if (dist < bestDist) {
      best = { arcLength: this.bendEnd + t, u, v: p[1], axial };
    }
    return best;
  }

  spineBounds(): BoundingBox {
    const min: Vec3 = [0, 0, 0];
    const max: Vec3 = [0, 0, 0];
    const include = (pt: Vec3) => {
      for (let i = 0; i < 3; i++) {
        if (pt[i] < min[i]) min[i] = pt[i];
        if (pt[i] > max[i]) max[i] = pt[i];
      }
    };
    include([0, 0, this.rise]);
    const steps = Math.max(1, Math.ceil(this.angle / 5));
    for (let i = 1; i <= steps; i++) include(this.arcPoint((i / steps) * this.theta));
    include(addScaled(this.exitPoint, this.exitTangent, this.run));
    return { min, max };
  }

  private arcPoint(phi: number): Vec3 {
    return [
      this.center[0] - this.radius * Math.cos(phi),
      0,
      this.center[2] + this.radius * Math.sin(phi),
    ];
  }
}

function arcTangent(phi: number): Vec3 {
  return [Math.sin(phi), 0, Math.cos(phi)];
}

function arcNormal(phi: number): Vec3 {
  return [Math.cos(phi), 0, -Math.sin(phi)];
}
