/**
 * Sweep — a cross-section that changes with progress, carried along a spine.
 *
 * For a point p the sweep projects onto the spine, reads the progress
 * (arc-length fraction) there, undoes the twist and evaluates the
 * cross-section at that progress. The field is continuous along the whole
 * spine, so consecutive cross-sections never leave a seam between them.
 *
 *   new Sweep(path, section, { twist: t => 90 * t, capped: true })
 */

import { SDF, capDistance } from './sdf.js';
import type { SweepPath } from './path.js';
import { type Vec3, type BoundingBox, clamp } from './vec3.js';

/** A cross-section family indexed by progress in [0, 1]. */
export interface SweepSection {
  /** Signed distance at (x, y) in the section plane at this progress. */
  evaluate(progress: number, x: number, y: number): number;
  /** Distance from the section origin to its farthest boundary point at this progress. */
  maxRadius(progress: number): number;
  readonly name: string;
}

export interface SweepOptions {
  /** Section rotation in degrees at each progress. Default none. */
  twist?: (progress: number) => number;
  /** Close both ends with planes normal to the spine. Default true. */
  capped?: boolean;
}

const BOUNDS_SAMPLES = 64;

export class Sweep extends SDF {
  readonly kind = 'sweep' as const;
  readonly capped: boolean;
  private readonly twist: ((progress: number) => number) | null;

  constructor(readonly path: SweepPath, readonly section: SweepSection, options: SweepOptions = {}) {
    super();
    if (path.length <= 0) throw new Error('Sweep path must have positive length');
    this.twist = options.twist ?? null;
    this.capped = options.capped ?? true;
  }

  get name() {
    return `sweep(${this.section.name}${this.twist ? ', twisted' : ''}${this.capped ? '' : ', open'})`;
  }

  /** Twist in degrees at a progress value. */
  twistAt(progress: number): number {
    return this.twist ? this.twist(progress) : 0;
  }

  evaluate(p: Vec3): number {
    const proj = this.path.project(p);
    const length = this.path.length;
    const progress = clamp(proj.arcLength / length, 0, 1);

    let x = proj.u;
    let y = proj.v;
    if (this.twist) {
      const rad = this.twist(progress) * Math.PI / 180;
      const c = Math.cos(rad);
      const s = Math.sin(rad);
      x = proj.u * c + proj.v * s;
      y = -proj.u * s + proj.v * c;
    }

    let d = this.section.evaluate(progress, x, y);
    if (proj.axial !== 0) d = Math.max(d, Math.abs(proj.axial));
    if (!this.capped) return d;

    const w = Math.max(-proj.arcLength, proj.arcLength - length);
    return capDistance(d, w);
  }

  /**
   * Capped: the sampled spine box padded by the largest section radius.
   * Open: unbounded, it runs on past both ends.
   */
  bounds(): BoundingBox {
    if (!this.capped) {
      return { min: [-Infinity, -Infinity, -Infinity], max: [Infinity, Infinity, Infinity] };
    }
    const min: Vec3 = [Infinity, Infinity, Infinity];
    const max: Vec3 = [-Infinity, -Infinity, -Infinity];
    for (let i = 0; i <= BOUNDS_SAMPLES; i++) {
      const progress = i / BOUNDS_SAMPLES;
      const { point } = this.path.frameAt(progress * this.path.length);
      // Half a sample step of slack
      const r = this.section.maxRadius(progress) + this.path.length / BOUNDS_SAMPLES / 2;
      for (let k = 0; k < 3; k++) {
        if (point[k] - r < min[k]) min[k] = point[k] - r;
        if (point[k] + r > max[k]) max[k] = point[k] + r;
      }
    }
    return { min, max };
  }
}
