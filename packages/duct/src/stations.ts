/**
 * Stations — sampled cross-sections along the spine.
 */

import type { Vec3 } from '@fanduct/sdf-kernel';
import { resolveParams, type DuctParams } from './params.js';
import { ductPath } from './duct.js';
import { sectionAt } from './morph.js';

export interface Station {
  index: number;
  progress: number;
  arcLength: number;
  center: Vec3;
  tangent: Vec3;
  normal: Vec3;
  binormal: Vec3;
  morph: number;
  /** Degrees. */
  twist: number;
  halfWidth: number;
  halfHeight: number;
  cornerRadius: number;
}

/** `count` stations evenly spaced in arc length, first at the intake, last at the egress. */
export function sampleStations(overrides: Partial<DuctParams> = {}, count = 24): Station[] {
  if (!Number.isInteger(count) || count < 2) {
    throw new Error(`Station count must be an integer of at least 2 (got ${count})`);
  }
  const params = resolveParams(overrides);
  const path = ductPath(params);

  const stations: Station[] = [];
  for (let index = 0; index < count; index++) {
    const progress = index / (count - 1);
    const frame = path.frameAt(progress * path.length);
    const s = sectionAt(params, progress);
    stations.push({
      index,
      progress,
      arcLength: frame.arcLength,
      center: frame.point,
      tangent: frame.tangent,
      normal: frame.normal,
      binormal: frame.binormal,
      morph: s.morph,
      twist: s.twist,
      halfWidth: s.halfWidth,
      halfHeight: s.halfHeight,
      cornerRadius: s.cornerRadius,
    });
  }
  return stations;
}
