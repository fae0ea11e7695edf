/**
 * Morph — the circle → rounded rectangle interpolation along the duct.
 *
 *   progress ──(morphStart..morphEnd, eased)──▶ morph ∈ [0, 1]
 *
 * At morph 0 the section is the intake circle (half-extents and corner radius
 * all equal the intake radius); at morph 1 it is the egress rounded
 * rectangle. Everything in between is a linear blend of those three numbers,
 * so every section is an exact rounded rectangle.
 */

import {
  RoundedRect2D, roundedRectDistance, roundedRectCircumradius, clamp, lerp,
  type SweepSection,
} from '@fanduct/sdf-kernel';
import type { DuctParams, Easing } from './params.js';

export function ease(easing: Easing, t: number): number {
  switch (easing) {
    case 'linear': return t;
    case 'smoothstep': return t * t * (3 - 2 * t);
    case 'cosine': return (1 - Math.cos(Math.PI * t)) / 2;
  }
}

/** Eased morph amount at a progress value. 0 before morphStart, 1 after morphEnd. */
export function morphAt(params: DuctParams, progress: number): number {
  const t = clamp((progress - params.morphStart) / (params.morphEnd - params.morphStart), 0, 1);
  return ease(params.easing, t);
}

export interface SectionShape {
  progress: number;
  morph: number;
  halfWidth: number;
  halfHeight: number;
  cornerRadius: number;
  /** Section rotation about the spine in degrees. */
  twist: number;
}

/** Outer cross-section at a progress value. */
export function sectionAt(params: DuctParams, progress: number): SectionShape {
  const morph = morphAt(params, progress);
  const r0 = params.intakeDiameter / 2;
  return {
    progress,
    morph,
    halfWidth: lerp(r0, params.egressWidth / 2, morph),
    halfHeight: lerp(r0, params.egressHeight / 2, morph),
    cornerRadius: lerp(r0, params.egressCornerRadius, morph),
    twist: params.twist * morph,
  };
}

/** The section as a 2D profile, untwisted. */
export function morphProfile(params: DuctParams, progress: number): RoundedRect2D {
  const s = sectionAt(params, progress);
  return new RoundedRect2D(2 * s.halfWidth, 2 * s.halfHeight, s.cornerRadius);
}

/**
 * The morphing section as a sweep cross-section. Twist is left to the sweep
 * (see `twistAt`), so this evaluates in the untwisted section frame.
 *
 * The value is a distance within the section plane only. Where the section
 * twists or tapers the surface leans out of that plane, so the wall is
 * not an in-plane inset of this: see `buildDuct`.
 */
export class MorphSection implements SweepSection {
  readonly name = 'morph';

  constructor(readonly params: DuctParams) {}

  evaluate(progress: number, x: number, y: number): number {
    const s = sectionAt(this.params, progress);
    return roundedRectDistance(x, y, s.halfWidth, s.halfHeight, s.cornerRadius);
  }

  maxRadius(progress: number): number {
    const s = sectionAt(this.params, progress);
    return roundedRectCircumradius(s.halfWidth, s.halfHeight, s.cornerRadius);
  }
}

/** Twist in degrees at a progress value, for the sweep. */
export function twistAt(params: DuctParams): (progress: number) => number {
  return (progress) => params.twist * morphAt(params, progress);
}
